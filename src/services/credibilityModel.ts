import type { CredibilityConfig } from '../config/index.js';
import { ConcurrencyError } from '../core/errors.js';
import type { FeedbackOutcome, Source } from '../core/types.js';
import { credibilityCasRetriesTotal, credibilityUpdatesTotal } from '../metrics/index.js';
import { getLogger } from '../utils/logging.js';

/** Read / compare-and-set contract over a source's (alpha, beta) pair. */
export interface SourceStore {
  get(id: string): Source;
  compareAndSet(id: string, expectedVersion: number, alpha: number, beta: number): boolean;
}

/** Posterior mean of Beta(alpha, beta). */
export function credibility(source: Pick<Source, 'credibilityAlpha' | 'credibilityBeta'>): number {
  return source.credibilityAlpha / (source.credibilityAlpha + source.credibilityBeta);
}

export function applyOutcome(
  source: Source,
  outcome: FeedbackOutcome,
  maxPseudoCount?: number,
): Pick<Source, 'credibilityAlpha' | 'credibilityBeta'> {
  let alpha = source.credibilityAlpha;
  let beta = source.credibilityBeta;
  if (outcome === 'TruePositive') alpha += 1;
  else beta += 1;
  if (maxPseudoCount !== undefined) {
    alpha = Math.min(alpha, maxPseudoCount);
    beta = Math.min(beta, maxPseudoCount);
  }
  return { credibilityAlpha: alpha, credibilityBeta: beta };
}

export class CredibilityModel {
  constructor(
    private store: SourceStore,
    private cfg: CredibilityConfig,
  ) {}

  /**
   * Applies one classification outcome. The read-modify-write is retried on
   * a version conflict up to `maxRetries` times.
   */
  update(sourceId: string, outcome: FeedbackOutcome): Source {
    for (let attempt = 1; attempt <= this.cfg.maxRetries; attempt++) {
      const current = this.store.get(sourceId);
      const next = applyOutcome(current, outcome, this.cfg.maxPseudoCount);
      if (
        this.store.compareAndSet(
          sourceId,
          current.version,
          next.credibilityAlpha,
          next.credibilityBeta,
        )
      ) {
        credibilityUpdatesTotal.inc({ outcome });
        getLogger().debug(
          { sourceId, outcome, attempt, alpha: next.credibilityAlpha, beta: next.credibilityBeta },
          'credibility-updated',
        );
        return { ...current, ...next, version: current.version + 1 };
      }
      credibilityCasRetriesTotal.inc();
    }
    getLogger().warn({ sourceId, outcome, attempts: this.cfg.maxRetries }, 'credibility update conflict');
    throw new ConcurrencyError(
      `Credibility update for source ${sourceId} lost ${this.cfg.maxRetries} compare-and-set races`,
      this.cfg.maxRetries,
    );
  }
}
