import type { AnomalyConfig } from '../config/index.js';
import type { FrequencyBucket, FrequencyResult } from '../core/types.js';
import { getLogger } from '../utils/logging.js';
import { byCodeUnit } from '../utils/ordering.js';
import { addDays } from '../utils/time.js';

export interface FrequencyStore {
  history(keywordId: string, fromDay: string, toDayExclusive: string): FrequencyBucket[];
  countOn(keywordId: string, day: string): number;
  listForDay(day: string): Array<{ keywordId: string; term: string; category: string; count: number }>;
}

export interface SpikeReport {
  keywordId: string;
  term: string;
  category: string;
  todayCount: number;
  avg7d: number;
  spikeRatio: number;
  zScore: number | null;
}

const round = (v: number, places = 3) => Math.round(v * 10 ** places) / 10 ** places;

export function meanAndPopulationStd(counts: number[]): { mean: number; std: number } {
  if (counts.length === 0) return { mean: 0, std: 0 };
  const mean = counts.reduce((s, c) => s + c, 0) / counts.length;
  const variance = counts.reduce((s, c) => s + (c - mean) ** 2, 0) / counts.length;
  return { mean, std: Math.sqrt(variance) };
}

/** z of `today` against a baseline, with the std floored at `stdFloor`. */
export function zScore(baseline: number[], today: number, stdFloor: number): number {
  const { mean, std } = meanAndPopulationStd(baseline);
  return (today - mean) / Math.max(std, stdFloor);
}

/** Piecewise-linear: z <= 0 -> 1, z >= zCeiling -> maxFactor. */
export function zToMultiplier(z: number, cfg: Pick<AnomalyConfig, 'zCeiling' | 'maxFactor'>): number {
  if (z <= 0) return 1;
  if (z >= cfg.zCeiling) return cfg.maxFactor;
  return 1 + ((cfg.maxFactor - 1) * z) / cfg.zCeiling;
}

/**
 * Spike multiplier for a keyword given its baseline day counts (today
 * excluded). Fewer than `minHistoryDays` baseline rows takes the ratio path
 * instead of the z-score path. Both are bounded to [1, maxFactor].
 */
export function frequencyFactor(
  baselineCounts: number[],
  todayCount: number,
  cfg: AnomalyConfig,
): FrequencyResult {
  const { mean, std } = meanAndPopulationStd(baselineCounts);
  if (baselineCounts.length < cfg.minHistoryDays) {
    const ratio = todayCount / Math.max(mean, 1);
    return {
      factor: round(Math.min(cfg.maxFactor, Math.max(1, ratio))),
      path: 'ratio',
      todayCount,
      mean,
      std: null,
      z: null,
      historyDays: baselineCounts.length,
    };
  }
  const clampedStd = Math.max(std, cfg.stdFloor);
  const z = (todayCount - mean) / clampedStd;
  return {
    factor: round(zToMultiplier(z, cfg)),
    path: 'zscore',
    todayCount,
    mean,
    std: clampedStd,
    z: round(z),
    historyDays: baselineCounts.length,
  };
}

export class AnomalyDetector {
  constructor(
    private store: FrequencyStore,
    private cfg: AnomalyConfig,
  ) {}

  baseline(keywordId: string, today: string): number[] {
    return this.store
      .history(keywordId, addDays(today, -this.cfg.baselineDays), today)
      .map((b) => b.count);
  }

  factorFor(keywordId: string, today: string): FrequencyResult {
    const result = frequencyFactor(
      this.baseline(keywordId, today),
      this.store.countOn(keywordId, today),
      this.cfg,
    );
    getLogger().debug({ keywordId, day: today, ...result }, 'frequency-factor');
    return result;
  }

  detectSpikes(today: string): SpikeReport[] {
    const spikes: SpikeReport[] = [];
    for (const row of this.store.listForDay(today)) {
      const baseline = this.baseline(row.keywordId, today);
      const { mean } = meanAndPopulationStd(baseline);
      const avg = mean > 0 ? mean : 1;
      const ratio = row.count / avg;
      if (ratio < this.cfg.spikeRatio) continue;
      spikes.push({
        keywordId: row.keywordId,
        term: row.term,
        category: row.category,
        todayCount: row.count,
        avg7d: round(avg, 1),
        spikeRatio: round(ratio, 1),
        zScore:
          baseline.length >= this.cfg.minHistoryDays
            ? round(zScore(baseline, row.count, this.cfg.stdFloor), 2)
            : null,
      });
    }
    return spikes.sort((a, b) => b.spikeRatio - a.spikeRatio || byCodeUnit(a.term, b.term));
  }
}
