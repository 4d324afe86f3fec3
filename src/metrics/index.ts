import { Counter, Histogram, Registry, collectDefaultMetrics } from 'prom-client';

export const registry = new Registry();
collectDefaultMetrics({ register: registry });

export const alertsIngestedTotal = new Counter({
  name: 'alerts_ingested_total',
  help: 'Total alerts ingested',
  labelNames: ['outcome'] as const, // outcome=canonical|duplicate
  registers: [registry],
});

export const duplicatesTotal = new Counter({
  name: 'duplicates_total',
  help: 'Duplicate decisions by matching path',
  labelNames: ['path'] as const, // path=fingerprint|fuzzy_title|none|empty
  registers: [registry],
});

export const scoresComputedTotal = new Counter({
  name: 'scores_computed_total',
  help: 'Total operational risk scores computed',
  labelNames: ['severity'] as const,
  registers: [registry],
});

export const credibilityUpdatesTotal = new Counter({
  name: 'credibility_updates_total',
  help: 'Source credibility updates applied from analyst feedback',
  labelNames: ['outcome'] as const,
  registers: [registry],
});

// Lost compare-and-set attempts (each one re-read and retried)
export const credibilityCasRetriesTotal = new Counter({
  name: 'credibility_cas_retries_total',
  help: 'Credibility compare-and-set conflicts that triggered a retry',
  registers: [registry],
});

export const uncertaintySamplesTotal = new Counter({
  name: 'uncertainty_samples_total',
  help: 'Monte Carlo samples drawn for score intervals',
  registers: [registry],
});

export const correlationRunsTotal = new Counter({
  name: 'correlation_runs_total',
  help: 'Correlation runs',
  labelNames: ['truncated'] as const, // truncated=true|false
  registers: [registry],
});

export const correlationThreadsTotal = new Counter({
  name: 'correlation_threads_total',
  help: 'Threads emitted by correlation runs',
  registers: [registry],
});

export const correlationLatencySeconds = new Histogram({
  name: 'correlation_latency_seconds',
  help: 'Latency of one correlation run (seconds)',
  buckets: [0.005, 0.01, 0.05, 0.1, 0.25, 0.5, 1, 2, 5],
  registers: [registry],
});
