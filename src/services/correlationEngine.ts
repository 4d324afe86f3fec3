import type { CorrelationConfig } from '../config/index.js';
import { ValidationError } from '../core/errors.js';
import {
  NON_ACTOR_ENTITY_TYPES,
  type CorrelationCandidate,
  type CorrelationResult,
  type PairEvidence,
  type ReasonCode,
  type Thread,
  type TypedEntity,
} from '../core/types.js';
import {
  correlationLatencySeconds,
  correlationRunsTotal,
  correlationThreadsTotal,
} from '../metrics/index.js';
import { stableSetId } from '../utils/hashing.js';
import { getLogger } from '../utils/logging.js';
import { byCodeUnit } from '../utils/ordering.js';
import { setJaccard, tokenize } from '../utils/similarity.js';
import { hoursBetween } from '../utils/time.js';
import { severityFor, type SeverityBands } from './riskScoring.js';

export interface CorrelationWindow {
  start: Date;
  end: Date;
}

export interface CorrelationOptions {
  minClusterSize?: number;
  edgeThreshold?: number;
}

// Fixed evaluation order keeps the floating-point sum reproducible
const SUBSTANTIVE_CODES: ReasonCode[] = [
  'shared_actor_handle',
  'shared_poi_hit',
  'shared_non_actor_entity',
  'matched_term_temporal_overlap',
  'shared_source_fingerprint',
  'linguistic_overlap_high',
  'linguistic_overlap_medium',
];

const NON_ACTOR = new Set<string>(NON_ACTOR_ENTITY_TYPES);

const round3 = (v: number) => Math.round(v * 1000) / 1000;

/** Disjoint-set over alert ids: union by rank, iterative path compression. */
export class UnionFind {
  private parent = new Map<string, string>();
  private rank = new Map<string, number>();

  constructor(items: Iterable<string>) {
    for (const item of items) {
      this.parent.set(item, item);
      this.rank.set(item, 0);
    }
  }

  find(item: string): string {
    let root = item;
    for (let p = this.parent.get(root); p !== undefined && p !== root; p = this.parent.get(root)) {
      root = p;
    }
    let node = item;
    while (node !== root) {
      const next = this.parent.get(node) ?? root;
      this.parent.set(node, root);
      node = next;
    }
    return root;
  }

  union(left: string, right: string): void {
    const rootLeft = this.find(left);
    const rootRight = this.find(right);
    if (rootLeft === rootRight) return;
    const rankLeft = this.rank.get(rootLeft) ?? 0;
    const rankRight = this.rank.get(rootRight) ?? 0;
    if (rankLeft < rankRight) {
      this.parent.set(rootLeft, rootRight);
    } else if (rankLeft > rankRight) {
      this.parent.set(rootRight, rootLeft);
    } else {
      this.parent.set(rootRight, rootLeft);
      this.rank.set(rootLeft, rankLeft + 1);
    }
  }
}

function entityKeys(entities: TypedEntity[], accept: (type: string) => boolean): Set<string> {
  const keys = new Set<string>();
  for (const e of entities) {
    const value = e.value.trim().toLowerCase();
    if (value && accept(e.type)) keys.add(`${e.type}:${value}`);
  }
  return keys;
}

function intersects(a: Set<string>, b: Set<string>): boolean {
  for (const v of a) if (b.has(v)) return true;
  return false;
}

/**
 * Evidence for one alert pair. Reason codes are non-exclusive; the
 * cross-source and tight-temporal bonuses only apply on top of at least one
 * substantive code.
 */
export function pairEvidence(
  left: CorrelationCandidate,
  right: CorrelationCandidate,
  cfg: CorrelationConfig,
  edgeThreshold = cfg.edgeThreshold,
): PairEvidence {
  const fired = new Set<ReasonCode>();
  const gapHours = Math.abs(hoursBetween(left.publishedAt, right.publishedAt));

  const isType = (t: string) => (type: string) => type === t;
  if (intersects(entityKeys(left.entities, isType('actor_handle')), entityKeys(right.entities, isType('actor_handle')))) {
    fired.add('shared_actor_handle');
  }
  if (intersects(entityKeys(left.entities, isType('poi')), entityKeys(right.entities, isType('poi')))) {
    fired.add('shared_poi_hit');
  }
  const nonActor = (type: string) => NON_ACTOR.has(type);
  if (intersects(entityKeys(left.entities, nonActor), entityKeys(right.entities, nonActor))) {
    fired.add('shared_non_actor_entity');
  }
  const leftTerm = left.matchedTerm.trim().toLowerCase();
  if (leftTerm && leftTerm === right.matchedTerm.trim().toLowerCase() && gapHours <= cfg.termWindowHours) {
    fired.add('matched_term_temporal_overlap');
  }
  if (left.sourceId === right.sourceId) fired.add('shared_source_fingerprint');

  const leftWords = tokenize(`${left.title} ${left.content}`);
  const rightWords = tokenize(`${right.title} ${right.content}`);
  if (leftWords.size > 0 && rightWords.size > 0) {
    const similarity = setJaccard(leftWords, rightWords);
    if (similarity >= cfg.linguisticBands.high) fired.add('linguistic_overlap_high');
    else if (similarity >= cfg.linguisticBands.medium) fired.add('linguistic_overlap_medium');
  }

  const codes = SUBSTANTIVE_CODES.filter((c) => fired.has(c));
  if (codes.length > 0) {
    if (left.sourceType !== right.sourceType) codes.push('cross_source_corroboration');
    if (gapHours * 60 <= cfg.tightWindowMinutes) codes.push('tight_temporal_proximity');
  }

  let sum = 0;
  for (const code of codes) sum += cfg.weights[code];
  const score = round3(Math.max(0, Math.min(1, sum)));
  const [a, b] = byCodeUnit(left.id, right.id) <= 0 ? [left, right] : [right, left];
  return {
    leftAlertId: a.id,
    rightAlertId: b.id,
    score,
    reasonCodes: [...codes].sort(byCodeUnit),
    linked: score >= edgeThreshold,
  };
}

function threadLabel(members: CorrelationCandidate[]): string {
  const counts = new Map<string, number>();
  for (const m of members) {
    const labels = new Set<string>();
    for (const e of m.entities) {
      const value = e.value.trim().toLowerCase();
      if (!value) continue;
      if (e.type === 'actor_handle') labels.add(`Actor ${value}`);
      else if (e.type === 'poi') labels.add(`POI ${value}`);
      else if (NON_ACTOR.has(e.type)) labels.add(`Entity ${e.type}:${value}`);
    }
    const term = m.matchedTerm.trim().toLowerCase();
    if (term) labels.add(`Term ${term}`);
    for (const l of labels) counts.set(l, (counts.get(l) ?? 0) + 1);
  }
  const ranked = [...counts.entries()]
    .filter(([, c]) => c >= 2)
    .sort((x, y) => y[1] - x[1] || byCodeUnit(x[0], y[0]));
  return ranked.length > 0 ? ranked[0][0] : 'SOI Thread';
}

/**
 * Pairwise linkage + union-find clustering over one time window. Input over
 * `maxAlerts` is cut to the most recent alerts and reported as truncated.
 */
export function linkAlerts(
  candidates: CorrelationCandidate[],
  window: CorrelationWindow,
  cfg: CorrelationConfig,
  bands: SeverityBands,
  opts: CorrelationOptions = {},
): CorrelationResult {
  if (Number.isNaN(window.start.getTime()) || Number.isNaN(window.end.getTime())) {
    throw new ValidationError('Correlation window bounds must be valid dates');
  }
  if (window.end < window.start) {
    throw new ValidationError('Correlation window end is before its start');
  }
  const minClusterSize = opts.minClusterSize ?? cfg.minClusterSize;
  const edgeThreshold = opts.edgeThreshold ?? cfg.edgeThreshold;
  if (!Number.isInteger(minClusterSize) || minClusterSize < 2) {
    throw new ValidationError(`minClusterSize must be an integer >= 2, got ${minClusterSize}`);
  }
  if (!(edgeThreshold >= 0 && edgeThreshold <= 1)) {
    throw new ValidationError(`edgeThreshold must be within [0, 1], got ${edgeThreshold}`);
  }

  const inWindow = candidates
    .filter((c) => c.publishedAt >= window.start && c.publishedAt <= window.end)
    .sort((a, b) => b.publishedAt.getTime() - a.publishedAt.getTime() || byCodeUnit(a.id, b.id));
  const kept = inWindow.slice(0, cfg.maxAlerts);
  const truncated = inWindow.length > kept.length;
  const ordered = [...kept].sort(
    (a, b) => a.publishedAt.getTime() - b.publishedAt.getTime() || byCodeUnit(a.id, b.id),
  );

  const uf = new UnionFind(ordered.map((c) => c.id));
  const edges: PairEvidence[] = [];
  let pairsEvaluated = 0;
  let pairBudgetExhausted = false;
  outer: for (let i = 0; i < ordered.length; i++) {
    for (let j = i + 1; j < ordered.length; j++) {
      if (hoursBetween(ordered[j].publishedAt, ordered[i].publishedAt) > cfg.windowHours) break;
      if (pairsEvaluated >= cfg.maxPairChecks) {
        pairBudgetExhausted = true;
        break outer;
      }
      pairsEvaluated++;
      const evidence = pairEvidence(ordered[i], ordered[j], cfg, edgeThreshold);
      if (evidence.linked) {
        edges.push(evidence);
        uf.union(evidence.leftAlertId, evidence.rightAlertId);
      }
    }
  }

  const byId = new Map(ordered.map((c) => [c.id, c]));
  const components = new Map<string, string[]>();
  for (const c of ordered) {
    const root = uf.find(c.id);
    const list = components.get(root) ?? [];
    list.push(c.id);
    components.set(root, list);
  }
  const edgesByRoot = new Map<string, PairEvidence[]>();
  for (const e of edges) {
    const root = uf.find(e.leftAlertId);
    const list = edgesByRoot.get(root) ?? [];
    list.push(e);
    edgesByRoot.set(root, list);
  }

  const windowSalt = `${window.start.toISOString()}|${window.end.toISOString()}`;
  const threads: Thread[] = [];
  for (const [root, ids] of components) {
    if (ids.length < minClusterSize) continue;
    const memberIds = [...ids].sort(byCodeUnit);
    const members = memberIds.flatMap((id) => {
      const c = byId.get(id);
      return c ? [c] : [];
    });
    const evidence = (edgesByRoot.get(root) ?? []).sort(
      (x, y) => byCodeUnit(x.leftAlertId, y.leftAlertId) || byCodeUnit(x.rightAlertId, y.rightAlertId),
    );
    const scores = evidence.map((e) => e.score);
    const confidence =
      cfg.confidenceAggregate === 'max'
        ? Math.max(...scores)
        : scores.reduce((s, v) => s + v, 0) / scores.length;
    const reasonCodes = [...new Set(evidence.flatMap((e) => e.reasonCodes))].sort(byCodeUnit);
    const maxOrs = Math.max(...members.map((m) => m.ors));
    const times = members.map((m) => m.publishedAt.getTime());
    threads.push({
      threadId: stableSetId('soi', memberIds, windowSalt),
      label: threadLabel(members),
      memberAlertIds: memberIds,
      threadConfidence: round3(confidence),
      reasonCodes,
      recommendedTier: severityFor(maxOrs, bands),
      maxOrs: round3(maxOrs),
      sourceTypes: [...new Set(members.map((m) => m.sourceType))].sort(byCodeUnit),
      startTs: new Date(Math.min(...times)),
      endTs: new Date(Math.max(...times)),
      evidence,
    });
  }
  threads.sort((a, b) => b.maxOrs - a.maxOrs || byCodeUnit(a.threadId, b.threadId));

  return {
    threads,
    truncated,
    alertsConsidered: kept.length,
    alertsDropped: inWindow.length - kept.length,
    pairsEvaluated,
    pairBudgetExhausted,
  };
}

export class CorrelationEngine {
  constructor(
    private cfg: CorrelationConfig,
    private bands: SeverityBands,
  ) {}

  run(
    candidates: CorrelationCandidate[],
    window: CorrelationWindow,
    opts: CorrelationOptions = {},
  ): CorrelationResult {
    const start = process.hrtime.bigint();
    const result = linkAlerts(candidates, window, this.cfg, this.bands, opts);
    const seconds = Number(process.hrtime.bigint() - start) / 1e9;
    correlationLatencySeconds.observe(seconds);
    correlationRunsTotal.inc({ truncated: String(result.truncated) });
    correlationThreadsTotal.inc(result.threads.length);
    if (result.truncated || result.pairBudgetExhausted) {
      getLogger().warn(
        {
          alertsDropped: result.alertsDropped,
          pairsEvaluated: result.pairsEvaluated,
          pairBudgetExhausted: result.pairBudgetExhausted,
        },
        'correlation input bounded',
      );
    }
    return result;
  }
}
