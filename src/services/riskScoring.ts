import type { ScoringConfig } from '../config/index.js';
import { ValidationError } from '../core/errors.js';
import type {
  AlertContext,
  Keyword,
  ScoreBreakdown,
  Severity,
  Source,
  TypedEntity,
} from '../core/types.js';
import { recencyFactor } from '../utils/time.js';
import { credibility } from './credibilityModel.js';

export interface ScoringInput {
  alert: {
    id: string;
    publishedAt: Date;
    entities: TypedEntity[];
    context: AlertContext;
  };
  keyword: Pick<Keyword, 'weight' | 'category'>;
  source: Pick<Source, 'credibilityAlpha' | 'credibilityBeta'>;
  frequency: { factor: number; z: number | null };
  now: Date;
}

export type SeverityBands = ScoringConfig['severityBands'];

const round3 = (v: number) => Math.round(v * 1000) / 1000;
const clamp = (min: number, max: number, v: number) => Math.max(min, Math.min(max, v));

/** Bands are inclusive on their lower bound. */
export function severityFor(score: number, bands: SeverityBands): Severity {
  if (score >= bands.critical) return 'Critical';
  if (score >= bands.high) return 'High';
  if (score >= bands.medium) return 'Medium';
  return 'Low';
}

export function categoryFactor(category: string, cfg: ScoringConfig): number {
  const boost = cfg.categoryBoosts[category.trim().toLowerCase()] ?? 0;
  return clamp(0, cfg.caps.category, boost);
}

export function proximityFactor(context: AlertContext, cfg: ScoringConfig): number {
  if (context.proximity.length === 0) return 0;
  let raw = 0;
  if (context.proximity.some((p) => p.withinRadius)) {
    raw = 15;
  } else {
    const nearest = Math.min(...context.proximity.map((p) => p.distanceMiles));
    if (nearest <= 5) raw = 10;
    else if (nearest <= 15) raw = 6;
    else if (nearest <= 30) raw = 3;
  }
  return clamp(0, cfg.caps.proximity, raw);
}

export function eventFactor(context: AlertContext, cfg: ScoringConfig): number {
  if (context.upcomingEventDistancesMiles.length === 0) return 0;
  const nearest = Math.min(...context.upcomingEventDistancesMiles);
  let raw = 0;
  if (nearest <= 10) raw = 8;
  else if (nearest <= 25) raw = 4;
  return clamp(0, cfg.caps.event, raw);
}

export function poiFactor(entities: TypedEntity[], cfg: ScoringConfig): number {
  const hits = new Set(entities.filter((e) => e.type === 'poi').map((e) => e.value)).size;
  if (hits <= 0) return 0;
  return clamp(0, cfg.caps.poi, Math.min(12, 6 + hits * 2));
}

/** The multiplicative core plus recency, before contextual bonuses. */
export function coreScore(
  keywordWeight: number,
  frequency: number,
  sourceCredibility: number,
  recency: number,
  cfg: Pick<ScoringConfig, 'coreMultiplier' | 'recencyMultiplier'>,
): number {
  return (
    keywordWeight * frequency * sourceCredibility * cfg.coreMultiplier +
    recency * cfg.recencyMultiplier
  );
}

export function composeScore(
  core: number,
  contextual: Pick<ScoreBreakdown, 'categoryFactor' | 'proximityFactor' | 'eventFactor' | 'poiFactor'>,
): number {
  return clamp(
    0,
    100,
    core +
      contextual.categoryFactor +
      contextual.proximityFactor +
      contextual.eventFactor +
      contextual.poiFactor,
  );
}

function assertScorable(input: ScoringInput): void {
  const issues: string[] = [];
  const { weight } = input.keyword;
  if (!Number.isFinite(weight) || weight < 0.1 || weight > 5) {
    issues.push(`keyword weight ${weight} outside [0.1, 5.0]`);
  }
  const { credibilityAlpha: a, credibilityBeta: b } = input.source;
  if (!(a > 0) || !(b > 0)) issues.push(`credibility alpha/beta must be > 0 (got ${a}, ${b})`);
  if (!Number.isFinite(input.frequency.factor) || input.frequency.factor < 1) {
    issues.push(`frequency factor ${input.frequency.factor} below 1`);
  }
  if (Number.isNaN(input.alert.publishedAt.getTime())) issues.push('publishedAt is not a valid date');
  if (Number.isNaN(input.now.getTime())) issues.push('now is not a valid date');
  if (issues.length) throw new ValidationError(`Cannot score alert ${input.alert.id}: ${issues.join('; ')}`, issues);
}

/**
 * Operational Risk Score. Pure in its inputs: the same alert, keyword
 * snapshot, source posterior, frequency factor and `now` always yield the
 * same breakdown.
 */
export function scoreAlert(input: ScoringInput, cfg: ScoringConfig): ScoreBreakdown {
  assertScorable(input);
  const sourceCredibility = credibility(input.source);
  const recency = recencyFactor(
    input.alert.publishedAt,
    input.now,
    cfg.recencyWindowHours,
    cfg.recencyFloor,
  );
  const contextual = {
    categoryFactor: categoryFactor(input.keyword.category, cfg),
    proximityFactor: proximityFactor(input.alert.context, cfg),
    eventFactor: eventFactor(input.alert.context, cfg),
    poiFactor: poiFactor(input.alert.entities, cfg),
  };
  const core = coreScore(input.keyword.weight, input.frequency.factor, sourceCredibility, recency, cfg);
  const finalScore = round3(composeScore(core, contextual));
  return {
    alertId: input.alert.id,
    keywordWeight: input.keyword.weight,
    sourceCredibility: round3(sourceCredibility),
    credibilityAlpha: input.source.credibilityAlpha,
    credibilityBeta: input.source.credibilityBeta,
    frequencyFactor: input.frequency.factor,
    frequencyZ: input.frequency.z,
    recencyFactor: round3(recency),
    ...contextual,
    finalScore,
    severity: severityFor(finalScore, cfg.severityBands),
    computedAt: input.now,
  };
}
