import { describe, it, expect } from 'vitest';
import { defaultAnalyticsConfig } from '../../src/config/index.js';
import {
  DedupEngine,
  computeContentHash,
  dedupe,
  normalizeText,
  type DedupStore,
  type PoolEntry,
} from '../../src/services/dedupEngine.js';

const cfg = defaultAnalyticsConfig().dedup;
const at = (iso: string) => new Date(iso);

function entry(id: string, title: string, content: string, publishedAt: string, dupOf?: string): PoolEntry {
  return {
    id,
    title,
    contentHash: computeContentHash(title, content),
    publishedAt: at(publishedAt),
    isDuplicateOf: dupOf ?? null,
  };
}

describe('normalizeText', () => {
  it('strips tags, collapses whitespace and lower-cases', () => {
    expect(normalizeText('<b>Hello</b>   World ')).toBe('hello world');
  });

  it('truncates to the configured length', () => {
    expect(normalizeText('a'.repeat(300))).toHaveLength(200);
    expect(normalizeText('abcdef', 3)).toBe('abc');
  });

  it('treats missing text as empty', () => {
    expect(normalizeText(null)).toBe('');
    expect(normalizeText(undefined)).toBe('');
  });
});

describe('dedupe', () => {
  const title = 'Ransomware group claims attack on regional hospital';
  const content = 'Leak site post lists patient records.';

  it('flags identical normalized text as a fingerprint duplicate regardless of fuzzy settings', () => {
    const pool = [entry('a1', title, content, '2026-03-10T08:00:00Z')];
    const strict = { ...cfg, fuzzyThreshold: 1, maxCandidates: 1 };
    const decision = dedupe(
      { title: `  <p>${title.toUpperCase()}</p>`, content, publishedAt: at('2026-03-10T09:00:00Z') },
      pool,
      strict,
    );
    expect(decision).toMatchObject({
      isDuplicate: true,
      duplicateOf: 'a1',
      confidence: 1,
      path: 'fingerprint',
    });
  });

  it('prefers the fingerprint index over the pool', () => {
    const index = { findByContentHash: () => 'canonical-7' };
    const decision = dedupe({ title, content, publishedAt: at('2026-03-10T09:00:00Z') }, [], cfg, index);
    expect(decision.duplicateOf).toBe('canonical-7');
    expect(decision.path).toBe('fingerprint');
  });

  it('matches near-identical titles on the same day', () => {
    const pool = [entry('a1', title, 'different body', '2026-03-10T08:00:00Z')];
    const decision = dedupe(
      { title: `${title}s`, content: 'another body', publishedAt: at('2026-03-10T20:00:00Z') },
      pool,
      cfg,
    );
    // 2 * 51 / (51 + 52)
    expect(decision).toMatchObject({ isDuplicate: true, duplicateOf: 'a1', confidence: 0.99, path: 'fuzzy_title' });
  });

  it('ignores candidates from another day', () => {
    const pool = [entry('a1', title, 'different body', '2026-03-09T23:00:00Z')];
    const decision = dedupe({ title, content: 'another body', publishedAt: at('2026-03-10T01:00:00Z') }, pool, cfg);
    expect(decision.path).toBe('none');
    expect(decision.isDuplicate).toBe(false);
  });

  it('never matches against alerts already marked duplicate', () => {
    const pool = [entry('a2', title, content, '2026-03-10T08:00:00Z', 'a1')];
    const decision = dedupe({ title, content, publishedAt: at('2026-03-10T09:00:00Z') }, pool, cfg);
    expect(decision.isDuplicate).toBe(false);
    expect(decision.path).toBe('none');
  });

  it('only compares the most recent maxCandidates alerts', () => {
    const pool = [
      entry('older', title, 'x', '2026-03-10T01:00:00Z'),
      entry('newer', 'Unrelated weather bulletin', 'y', '2026-03-10T05:00:00Z'),
    ];
    const candidate = { title: `${title}s`, content: 'z', publishedAt: at('2026-03-10T06:00:00Z') };
    expect(dedupe(candidate, pool, { ...cfg, maxCandidates: 1 }).path).toBe('none');
    expect(dedupe(candidate, pool, cfg).duplicateOf).toBe('older');
  });

  it('returns the empty path for blank text and for a blank title', () => {
    const noText = dedupe({ title: '  ', content: '<br/>', publishedAt: at('2026-03-10T00:00:00Z') }, [], cfg);
    expect(noText.path).toBe('empty');
    const noTitle = dedupe({ title: '', content: 'body only', publishedAt: at('2026-03-10T00:00:00Z') }, [], cfg);
    expect(noTitle).toMatchObject({ isDuplicate: false, path: 'empty', confidence: 0 });
  });
});

describe('DedupEngine', () => {
  it('reads the same-day pool from its store', () => {
    const calls: Array<[string, number]> = [];
    const store: DedupStore = {
      findByContentHash: () => null,
      listSameDay: (day, limit) => {
        calls.push([day, limit]);
        return [entry('a1', 'Phishing kit targets payroll portal', 'x', '2026-03-10T02:00:00Z')];
      },
    };
    const decision = new DedupEngine(store, cfg).check({
      title: 'Phishing kit targets payroll portal!',
      content: 'y',
      publishedAt: at('2026-03-10T03:00:00Z'),
    });
    expect(calls).toEqual([['2026-03-10', 200]]);
    expect(decision.path).toBe('fuzzy_title');
    expect(decision.duplicateOf).toBe('a1');
  });
});
