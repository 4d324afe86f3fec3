import type { AnomalyConfig, ScoringConfig, UncertaintyConfig } from '../config/index.js';
import { ValidationError } from '../core/errors.js';
import type { ScoreBreakdown, UncertaintyInterval } from '../core/types.js';
import { uncertaintySamplesTotal } from '../metrics/index.js';
import { randomSeed } from '../utils/hashing.js';
import { beta, gaussian, mulberry32, uniform } from '../utils/random.js';
import { composeScore, coreScore } from './riskScoring.js';

export interface IntervalOptions {
  samples?: number;
  seed?: number;
  /** Per-keyword weight uncertainty; falls back to the configured sigma. */
  keywordSigma?: number | null;
}

const round3 = (v: number) => Math.round(v * 1000) / 1000;

/** Linear interpolation between closest ranks of an ascending array. */
export function percentile(sorted: number[], q: number): number {
  if (sorted.length === 0) return 0;
  if (q <= 0) return sorted[0];
  if (q >= 1) return sorted[sorted.length - 1];
  const idx = (sorted.length - 1) * q;
  const lower = Math.floor(idx);
  const upper = Math.ceil(idx);
  if (lower === upper) return sorted[lower];
  const weight = idx - lower;
  return sorted[lower] * (1 - weight) + sorted[upper] * weight;
}

/**
 * Monte Carlo interval for an ORS breakdown. Source credibility is drawn
 * from its Beta posterior, keyword weight from a clamped normal, and the
 * frequency factor is perturbed by bounded uniform noise. Recency and the
 * contextual bonuses keep their point values.
 */
export function scoreInterval(
  breakdown: ScoreBreakdown,
  cfg: UncertaintyConfig,
  scoring: ScoringConfig,
  anomaly: Pick<AnomalyConfig, 'maxFactor'>,
  opts: IntervalOptions = {},
): UncertaintyInterval {
  const n = opts.samples ?? cfg.defaultSamples;
  if (!Number.isInteger(n) || n < 1 || n > cfg.maxSamples) {
    throw new ValidationError(`samples must be an integer in [1, ${cfg.maxSamples}], got ${n}`);
  }
  const seed = (opts.seed ?? randomSeed()) >>> 0;
  const rng = mulberry32(seed);

  const alpha = Math.max(breakdown.credibilityAlpha, 0.01);
  const betaParam = Math.max(breakdown.credibilityBeta, 0.01);
  const sigma = Math.max(opts.keywordSigma ?? cfg.keywordSigma, 0.01);
  const noise = cfg.frequencyNoise;

  const samples: number[] = new Array<number>(n);
  for (let i = 0; i < n; i++) {
    const cred = beta(rng, alpha, betaParam);
    const weight = Math.min(5, Math.max(0.1, gaussian(rng, breakdown.keywordWeight, sigma)));
    const freq = Math.min(
      anomaly.maxFactor,
      Math.max(1, breakdown.frequencyFactor * (1 + uniform(rng, -noise, noise))),
    );
    samples[i] = composeScore(
      coreScore(weight, freq, cred, breakdown.recencyFactor, scoring),
      breakdown,
    );
  }
  samples.sort((a, b) => a - b);
  const mean = samples.reduce((s, v) => s + v, 0) / n;
  const variance = samples.reduce((s, v) => s + (v - mean) ** 2, 0) / n;
  uncertaintySamplesTotal.inc(n);

  return {
    n,
    p05: round3(percentile(samples, 0.05)),
    p50: round3(percentile(samples, 0.5)),
    p95: round3(percentile(samples, 0.95)),
    mean: round3(mean),
    std: round3(Math.sqrt(variance)),
    method: cfg.method,
    seed,
  };
}
