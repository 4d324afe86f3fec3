import { describe, it, expect } from 'vitest';
import { defaultAnalyticsConfig } from '../../src/config/index.js';
import { ConcurrencyError } from '../../src/core/errors.js';
import type { Source } from '../../src/core/types.js';
import {
  CredibilityModel,
  applyOutcome,
  credibility,
  type SourceStore,
} from '../../src/services/credibilityModel.js';

const cfg = defaultAnalyticsConfig().credibility;

function source(alpha = 2, beta = 2): Source {
  return { id: 's1', name: 'Feed', sourceType: 'rss', credibilityAlpha: alpha, credibilityBeta: beta, version: 0 };
}

class MemorySourceStore implements SourceStore {
  casCalls = 0;
  constructor(
    public current: Source,
    private beforeCas: (store: MemorySourceStore) => void = () => {},
  ) {}

  get(): Source {
    return { ...this.current };
  }

  compareAndSet(_id: string, expectedVersion: number, alpha: number, beta: number): boolean {
    this.casCalls++;
    this.beforeCas(this);
    if (this.current.version !== expectedVersion) return false;
    this.current = { ...this.current, credibilityAlpha: alpha, credibilityBeta: beta, version: expectedVersion + 1 };
    return true;
  }
}

describe('credibility posterior', () => {
  it('is the Beta mean', () => {
    expect(credibility(source())).toBe(0.5);
    expect(credibility(source(16, 1))).toBeCloseTo(16 / 17, 10);
  });

  it('rises after a true positive and falls after a false positive, staying in (0, 1)', () => {
    let s = source();
    for (let i = 0; i < 50; i++) {
      const before = credibility(s);
      s = { ...s, ...applyOutcome(s, 'TruePositive') };
      expect(credibility(s)).toBeGreaterThan(before);
      expect(credibility(s)).toBeLessThan(1);
    }
    for (let i = 0; i < 200; i++) {
      const before = credibility(s);
      s = { ...s, ...applyOutcome(s, 'FalsePositive') };
      expect(credibility(s)).toBeLessThan(before);
      expect(credibility(s)).toBeGreaterThan(0);
    }
  });

  it('caps pseudo-counts when configured', () => {
    expect(applyOutcome(source(3, 2), 'TruePositive', 3)).toEqual({ credibilityAlpha: 3, credibilityBeta: 2 });
    expect(applyOutcome(source(3, 2), 'FalsePositive', 3)).toEqual({ credibilityAlpha: 3, credibilityBeta: 3 });
  });
});

describe('CredibilityModel.update', () => {
  it('commits on the first compare-and-set when uncontended', () => {
    const store = new MemorySourceStore(source());
    const updated = new CredibilityModel(store, cfg).update('s1', 'TruePositive');
    expect(updated).toMatchObject({ credibilityAlpha: 3, credibilityBeta: 2, version: 1 });
    expect(store.casCalls).toBe(1);
  });

  it('re-reads after losing a race so neither increment is lost', () => {
    let raced = false;
    const store = new MemorySourceStore(source(), (s) => {
      if (raced) return;
      raced = true;
      // a concurrent TruePositive lands between our read and our write
      s.current = { ...s.current, credibilityAlpha: s.current.credibilityAlpha + 1, version: s.current.version + 1 };
    });
    const updated = new CredibilityModel(store, cfg).update('s1', 'FalsePositive');
    expect(store.casCalls).toBe(2);
    expect(updated).toMatchObject({ credibilityAlpha: 3, credibilityBeta: 3, version: 2 });
    expect(store.current).toMatchObject({ credibilityAlpha: 3, credibilityBeta: 3, version: 2 });
  });

  it('reports a ConcurrencyError once the retry budget is spent', () => {
    const store = new MemorySourceStore(source(), (s) => {
      s.current = { ...s.current, version: s.current.version + 1 };
    });
    const model = new CredibilityModel(store, { ...cfg, maxRetries: 3 });
    expect(() => model.update('s1', 'TruePositive')).toThrow(ConcurrencyError);
    expect(store.casCalls).toBe(3);
  });
});
