import { describe, it, expect } from 'vitest';
import { defaultAnalyticsConfig } from '../../src/config/index.js';
import { ValidationError } from '../../src/core/errors.js';
import type { CorrelationCandidate, TypedEntity } from '../../src/core/types.js';
import { CorrelationEngine, UnionFind, linkAlerts, pairEvidence } from '../../src/services/correlationEngine.js';
import { stableSetId } from '../../src/utils/hashing.js';

const analytics = defaultAnalyticsConfig();
const cfg = analytics.correlation;
const bands = analytics.scoring.severityBands;

const shared: TypedEntity[] = [
  { type: 'device_id', value: 'lptp-553' },
  { type: 'vendor_id', value: 'sc-001' },
];

function candidate(overrides: Partial<CorrelationCandidate> & Pick<CorrelationCandidate, 'id'>): CorrelationCandidate {
  return {
    title: '',
    content: '',
    sourceId: `src-${overrides.id}`,
    sourceType: 'rss',
    matchedTerm: '',
    publishedAt: new Date('2026-03-14T10:00:00Z'),
    entities: [],
    ors: 0,
    ...overrides,
  };
}

const alertA = candidate({
  id: 'alert-a',
  title: 'Laptop beacon observed',
  sourceId: 'src-edr',
  sourceType: 'edr',
  publishedAt: new Date('2026-03-14T10:00:00Z'),
  entities: shared,
  ors: 55,
});
const alertB = candidate({
  id: 'alert-b',
  title: 'Vendor portal login anomaly',
  sourceId: 'src-idp',
  sourceType: 'identity',
  publishedAt: new Date('2026-03-14T10:10:00Z'),
  entities: [
    { type: 'device_id', value: 'LPTP-553' },
    { type: 'vendor_id', value: 'sc-001' },
  ],
  ors: 72,
});
const alertC = candidate({
  id: 'alert-c',
  title: 'Weather update',
  sourceId: 'src-news',
  sourceType: 'news',
  publishedAt: new Date('2026-03-14T11:00:00Z'),
  ors: 20,
});
const window = { start: new Date('2026-03-14T09:00:00Z'), end: new Date('2026-03-14T12:00:00Z') };

describe('pairEvidence', () => {
  it('links shared device and vendor ids across sources ten minutes apart', () => {
    expect(pairEvidence(alertB, alertA, cfg)).toEqual({
      leftAlertId: 'alert-a',
      rightAlertId: 'alert-b',
      score: 0.7,
      reasonCodes: ['cross_source_corroboration', 'shared_non_actor_entity', 'tight_temporal_proximity'],
      linked: true,
    });
  });

  it('does not award bonuses without substantive evidence', () => {
    const e = pairEvidence(alertA, alertC, cfg);
    expect(e.score).toBe(0);
    expect(e.reasonCodes).toEqual([]);
    expect(e.linked).toBe(false);
  });

  it('keeps a same-source pair below the default threshold', () => {
    const left = candidate({ id: 'x1', title: 'Scanner hits on login page', sourceId: 'feed-1' });
    const right = candidate({
      id: 'x2',
      title: 'Outage report for payments',
      sourceId: 'feed-1',
      publishedAt: new Date('2026-03-14T10:05:00Z'),
    });
    expect(pairEvidence(left, right, cfg)).toMatchObject({
      score: 0.3,
      reasonCodes: ['shared_source_fingerprint', 'tight_temporal_proximity'],
      linked: false,
    });
  });

  it('counts a matched term only inside the term window', () => {
    const actor: TypedEntity[] = [{ type: 'actor_handle', value: 'n0ctis' }];
    const left = candidate({ id: 't1', title: 'Forum post one', matchedTerm: 'Data Leak', entities: actor });
    const near = candidate({
      id: 't2',
      title: 'Channel message two',
      matchedTerm: 'data leak',
      entities: actor,
      publishedAt: new Date('2026-03-14T15:00:00Z'),
    });
    const far = { ...near, id: 't3', publishedAt: new Date('2026-03-16T10:00:00Z') };
    expect(pairEvidence(left, near, cfg)).toMatchObject({
      score: 0.9,
      reasonCodes: ['matched_term_temporal_overlap', 'shared_actor_handle'],
    });
    expect(pairEvidence(left, far, cfg).reasonCodes).toEqual(['shared_actor_handle']);
  });

  it('grades linguistic overlap', () => {
    const left = candidate({ id: 'l1', title: 'credential stuffing wave against retail accounts' });
    const right = candidate({
      id: 'l2',
      title: 'credential stuffing wave against retail logins',
      publishedAt: new Date('2026-03-14T13:00:00Z'),
    });
    // 5 shared of 7 distinct words
    expect(pairEvidence(left, right, cfg).reasonCodes).toEqual(['linguistic_overlap_high']);
  });

  it('does not link unrelated non-Latin alerts from one feed', () => {
    const fire = candidate({ id: 'ru-1', title: 'Пожар на складе в порту', sourceId: 'src-tg', sourceType: 'telegram' });
    const tariff = candidate({
      id: 'ru-2',
      title: 'Новый тариф на электроэнергию',
      sourceId: 'src-tg',
      sourceType: 'telegram',
      publishedAt: new Date('2026-03-14T10:05:00Z'),
    });
    expect(pairEvidence(fire, tariff, cfg)).toMatchObject({
      score: 0.3,
      reasonCodes: ['shared_source_fingerprint', 'tight_temporal_proximity'],
      linked: false,
    });
    expect(linkAlerts([fire, tariff], window, cfg, bands).threads).toEqual([]);
  });

  it('grades overlap between non-Latin texts by their words', () => {
    const left = candidate({ id: 'ru-3', title: 'Пожар на складе в порту Одессы' });
    const right = candidate({
      id: 'ru-4',
      title: 'Пожар на складе в порту',
      publishedAt: new Date('2026-03-14T13:00:00Z'),
    });
    // 5 shared of 6 distinct words
    expect(pairEvidence(left, right, cfg).reasonCodes).toEqual(['linguistic_overlap_high']);
  });

  it('awards no overlap when either side has no words', () => {
    const left = candidate({ id: 'p1', title: '!!!', sourceId: 'feed-9' });
    const right = candidate({ id: 'p2', title: '???', sourceId: 'feed-9', publishedAt: new Date('2026-03-14T13:00:00Z') });
    expect(pairEvidence(left, right, cfg).reasonCodes).toEqual(['shared_source_fingerprint']);
  });

  it('honours an explicit edge threshold', () => {
    expect(pairEvidence(alertA, alertB, cfg, 0.75).linked).toBe(false);
  });
});

describe('linkAlerts', () => {
  it('forms one thread from the linked pair and leaves the singleton out', () => {
    const result = linkAlerts([alertC, alertB, alertA], window, cfg, bands);
    expect(result).toMatchObject({
      truncated: false,
      alertsConsidered: 3,
      alertsDropped: 0,
      pairsEvaluated: 3,
      pairBudgetExhausted: false,
    });
    expect(result.threads).toHaveLength(1);
    const [thread] = result.threads;
    expect(thread).toMatchObject({
      threadId: stableSetId('soi', ['alert-a', 'alert-b'], '2026-03-14T09:00:00.000Z|2026-03-14T12:00:00.000Z'),
      label: 'Entity device_id:lptp-553',
      memberAlertIds: ['alert-a', 'alert-b'],
      threadConfidence: 0.7,
      reasonCodes: ['cross_source_corroboration', 'shared_non_actor_entity', 'tight_temporal_proximity'],
      recommendedTier: 'High',
      maxOrs: 72,
      sourceTypes: ['edr', 'identity'],
      startTs: alertA.publishedAt,
      endTs: alertB.publishedAt,
    });
    expect(thread.evidence).toHaveLength(1);
    expect(thread.threadId).toMatch(/^soi-[0-9a-f]{16}$/);
  });

  it('is idempotent for the same input and window', () => {
    const first = linkAlerts([alertA, alertB, alertC], window, cfg, bands);
    const second = linkAlerts([alertC, alertA, alertB], window, cfg, bands);
    expect(second).toEqual(first);
  });

  it('keeps the most recent alerts when over the cap and reports it', () => {
    const result = linkAlerts([alertA, alertB, alertC], window, { ...cfg, maxAlerts: 2 }, bands);
    expect(result).toMatchObject({ truncated: true, alertsConsidered: 2, alertsDropped: 1, pairsEvaluated: 1 });
    expect(result.threads).toEqual([]);
  });

  it('skips pairs further apart than the window and stops at the pair budget', () => {
    const late = { ...alertC, id: 'alert-d', publishedAt: new Date('2026-03-14T11:59:00Z') };
    expect(linkAlerts([alertA, alertB, late], window, { ...cfg, windowHours: 1 }, bands).pairsEvaluated).toBe(1);
    const budgeted = linkAlerts([alertA, alertB, alertC], window, { ...cfg, maxPairChecks: 1 }, bands);
    expect(budgeted).toMatchObject({ pairsEvaluated: 1, pairBudgetExhausted: true });
    expect(budgeted.threads).toHaveLength(1);
  });

  it('ignores alerts outside the window and honours minClusterSize', () => {
    const outside = { ...alertB, publishedAt: new Date('2026-03-14T08:59:59Z') };
    expect(linkAlerts([alertA, outside], window, cfg, bands).alertsConsidered).toBe(1);
    expect(linkAlerts([alertA, alertB], window, cfg, bands, { minClusterSize: 3 }).threads).toEqual([]);
  });

  it('returns no threads for an empty pool', () => {
    expect(linkAlerts([], window, cfg, bands)).toEqual({
      threads: [],
      truncated: false,
      alertsConsidered: 0,
      alertsDropped: 0,
      pairsEvaluated: 0,
      pairBudgetExhausted: false,
    });
  });

  it('rejects an inverted window and bad options', () => {
    expect(() => linkAlerts([], { start: window.end, end: window.start }, cfg, bands)).toThrow(ValidationError);
    expect(() => linkAlerts([], window, cfg, bands, { minClusterSize: 1 })).toThrow(ValidationError);
    expect(() => linkAlerts([], window, cfg, bands, { edgeThreshold: 1.5 })).toThrow(ValidationError);
  });
});

describe('CorrelationEngine', () => {
  it('runs the same linkage with metrics', () => {
    const engine = new CorrelationEngine(cfg, bands);
    expect(engine.run([alertA, alertB], window)).toEqual(linkAlerts([alertA, alertB], window, cfg, bands));
  });
});

describe('UnionFind', () => {
  it('merges transitively', () => {
    const uf = new UnionFind(['a', 'b', 'c', 'd', 'e']);
    uf.union('a', 'b');
    uf.union('c', 'd');
    uf.union('b', 'c');
    expect(uf.find('a')).toBe(uf.find('d'));
    expect(uf.find('e')).toBe('e');
  });
});
