import type { AnomalyConfig, ThreatConfig } from '../config/index.js';
import type { ThreatAssessment, ThreatFlags, TypedEntity } from '../core/types.js';
import { DAY_MS, addDays, dayKey } from '../utils/time.js';
import { zScore } from './anomalyDetector.js';

export interface SubjectMention {
  alertId: string;
  title: string;
  content: string;
  publishedAt: Date;
  entities: TypedEntity[];
}

const LEAKAGE_PATTERNS = [
  /\b(i\s+will|we\s+will|going\s+to|plan\s+to|intend\s+to)\b/i,
  /\b(tomorrow|tonight|next\s+week|at\s+\d{1,2}(:\d{2})?)\b/i,
];
const PATHWAY_PATTERNS = [
  /\b(route|entrance|badge|schedule|residence|home address|weapon|gun|rifle)\b/i,
  /\b(venue|parking|security gate|access)\b/i,
];
const TIME_PATTERNS = [
  /\b(on\s+\w+day|at\s+\d{1,2}(:\d{2})?|between\s+\d{1,2})\b/i,
  /\b(today|tomorrow|this\s+week|next\s+week)\b/i,
];
const LOCATION_PATTERNS = [
  /\b\d+\s+\w+\s+(street|st|avenue|ave|road|rd|boulevard|blvd)\b/i,
  /\b(hotel|airport|headquarters|hq|campus|office|residence|venue|stadium)\b/i,
];

const matchesAny = (patterns: RegExp[], text: string) => patterns.some((p) => p.test(text));

export function hasLocationReference(mention: SubjectMention): boolean {
  if (mention.entities.some((e) => e.type === 'location')) return true;
  return matchesAny(LOCATION_PATTERNS, `${mention.title} ${mention.content}`);
}

export function hasTimeReference(text: string): boolean {
  return matchesAny(TIME_PATTERNS, text);
}

/**
 * Energy burst: today's mention count against the preceding
 * `baselineDays` of per-day counts (days with mentions only).
 */
export function energyBurstZ(
  dayCounts: Map<string, number>,
  today: string,
  anomaly: Pick<AnomalyConfig, 'baselineDays' | 'minHistoryDays' | 'stdFloor'>,
): number | null {
  const from = addDays(today, -anomaly.baselineDays);
  const baseline = [...dayCounts.entries()]
    .filter(([day]) => day >= from && day < today)
    .map(([, count]) => count);
  if (baseline.length < anomaly.minHistoryDays) return null;
  return zScore(baseline, dayCounts.get(today) ?? 0, anomaly.stdFloor);
}

/**
 * Threat Assessment Score for one subject over a trailing window that ends
 * at the close of `now`'s UTC day. Each active behavioral flag contributes
 * its fixed weight; the sum is bounded to 100.
 */
export function assessThreat(
  subject: string,
  mentions: SubjectMention[],
  now: Date,
  cfg: ThreatConfig,
  anomaly: AnomalyConfig,
): ThreatAssessment {
  const today = dayKey(now);
  const windowEnd = new Date(Date.parse(`${addDays(today, 1)}T00:00:00Z`));
  const windowStart = new Date(windowEnd.getTime() - cfg.windowDays * DAY_MS);
  const inWindow = mentions.filter(
    (m) => m.publishedAt >= windowStart && m.publishedAt < windowEnd,
  );

  const dayCounts = new Map<string, number>();
  const flags: ThreatFlags = {
    fixation: false,
    energyBurst: false,
    leakage: false,
    pathway: false,
    targetingSpecificity: false,
  };
  for (const m of inWindow) {
    const day = dayKey(m.publishedAt);
    dayCounts.set(day, (dayCounts.get(day) ?? 0) + 1);
    const text = `${m.title} ${m.content}`;
    if (matchesAny(LEAKAGE_PATTERNS, text)) flags.leakage = true;
    if (matchesAny(PATHWAY_PATTERNS, text)) flags.pathway = true;
    if (hasLocationReference(m) && hasTimeReference(text)) flags.targetingSpecificity = true;
  }
  flags.fixation = dayCounts.size >= cfg.fixationMinDays;
  const z = energyBurstZ(dayCounts, today, anomaly);
  flags.energyBurst = z !== null && z >= cfg.energyZThreshold;

  const w = cfg.weights;
  const raw =
    (flags.fixation ? w.fixation : 0) +
    (flags.energyBurst ? w.energyBurst : 0) +
    (flags.leakage ? w.leakage : 0) +
    (flags.pathway ? w.pathway : 0) +
    (flags.targetingSpecificity ? w.targetingSpecificity : 0);

  return {
    subject,
    windowStart,
    windowEnd,
    flags,
    score: Math.max(0, Math.min(100, Math.round(raw * 1000) / 1000)),
    energyZ: z === null ? 0 : Math.round(z * 1000) / 1000,
    distinctDays: dayCounts.size,
    hits: inWindow.length,
  };
}
