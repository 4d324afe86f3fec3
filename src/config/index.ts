import { z } from 'zod';
import fs from 'fs';
import path from 'path';
import dotenv from 'dotenv';

dotenv.config();

const positive = z.number().positive();
const fraction = z.number().min(0).max(1);

const DedupConfigSchema = z.object({
  fuzzyThreshold: fraction.default(0.85),
  maxCandidates: z.number().int().positive().default(200),
  maxNormalizedLength: z.number().int().positive().default(200),
});

const CredibilityConfigSchema = z.object({
  priorAlpha: positive.default(2),
  priorBeta: positive.default(2),
  maxRetries: z.number().int().min(1).default(5),
  maxPseudoCount: positive.optional(),
});

const AnomalyConfigSchema = z.object({
  baselineDays: z.number().int().min(1).default(7),
  minHistoryDays: z.number().int().min(1).default(3),
  stdFloor: positive.default(0.5),
  zCeiling: positive.default(4),
  maxFactor: z.number().min(1).default(4),
  spikeRatio: positive.default(2),
});

const ScoringConfigSchema = z.object({
  coreMultiplier: positive.default(20),
  recencyMultiplier: z.number().min(0).default(10),
  recencyWindowHours: positive.default(168),
  recencyFloor: fraction.default(0.1),
  severityBands: z
    .object({
      critical: z.number().default(90),
      high: z.number().default(70),
      medium: z.number().default(40),
    })
    .default({}),
  caps: z
    .object({
      category: z.number().min(0).default(10),
      proximity: z.number().min(0).default(15),
      event: z.number().min(0).default(8),
      poi: z.number().min(0).default(12),
    })
    .default({}),
  categoryBoosts: z.record(z.number().min(0)).default({
    protective_intel: 10,
    poi: 9,
    insider_workplace: 8,
    protest_disruption: 7,
    travel_risk: 6,
    threat_actor: 2.5,
    malware: 2.5,
    vulnerability: 2.5,
    supply_chain: 2.5,
    cti_optional: 2,
    ioc: 1.5,
  }),
  defaultKeywordWeight: z.number().min(0.1).max(5).default(1),
});

const UncertaintyConfigSchema = z.object({
  defaultSamples: z.number().int().positive().default(500),
  maxSamples: z.number().int().positive().default(20000),
  keywordSigma: positive.default(0.25),
  frequencyNoise: fraction.default(0.15),
  method: z.string().min(1).default('monte_carlo_beta_normal_v2'),
});

const ThreatConfigSchema = z.object({
  weights: z
    .object({
      fixation: z.number().min(0).default(25),
      energyBurst: z.number().min(0).default(20),
      leakage: z.number().min(0).default(20),
      pathway: z.number().min(0).default(20),
      targetingSpecificity: z.number().min(0).default(15),
    })
    .default({}),
  windowDays: z.number().int().positive().default(14),
  fixationMinDays: z.number().int().min(2).default(2),
  energyZThreshold: z.number().default(2),
});

const CorrelationConfigSchema = z.object({
  windowHours: positive.default(72),
  termWindowHours: positive.default(24),
  tightWindowMinutes: positive.default(30),
  edgeThreshold: fraction.default(0.5),
  minClusterSize: z.number().int().min(2).default(2),
  maxAlerts: z.number().int().positive().default(500),
  maxPairChecks: z.number().int().positive().default(250000),
  confidenceAggregate: z.enum(['mean', 'max']).default('mean'),
  weights: z
    .object({
      shared_actor_handle: fraction.default(0.6),
      shared_poi_hit: fraction.default(0.5),
      shared_non_actor_entity: fraction.default(0.45),
      matched_term_temporal_overlap: fraction.default(0.3),
      shared_source_fingerprint: fraction.default(0.2),
      cross_source_corroboration: fraction.default(0.15),
      tight_temporal_proximity: fraction.default(0.1),
      linguistic_overlap_medium: fraction.default(0.1),
      linguistic_overlap_high: fraction.default(0.2),
    })
    .default({}),
  linguisticBands: z
    .object({
      medium: fraction.default(0.35),
      high: fraction.default(0.6),
    })
    .default({}),
});

const PoiConfigSchema = z.object({
  allowSingleToken: z.boolean().default(false),
  fuzzyThreshold: fraction.default(0.9),
  contextWindow: z.number().int().min(0).default(80),
});

const AnalyticsConfigSchema = z.object({
  dedup: DedupConfigSchema.default({}),
  credibility: CredibilityConfigSchema.default({}),
  anomaly: AnomalyConfigSchema.default({}),
  scoring: ScoringConfigSchema.default({}),
  uncertainty: UncertaintyConfigSchema.default({}),
  threat: ThreatConfigSchema.default({}),
  correlation: CorrelationConfigSchema.default({}),
  poi: PoiConfigSchema.default({}),
});

const ConfigSchema = z.object({
  database: z.object({
    provider: z.literal('sqlite'),
    url: z.string().min(1),
  }),
  logging: z.object({
    level: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
    json: z.boolean().default(true),
  }),
  analytics: AnalyticsConfigSchema,
});

export type AppConfig = z.infer<typeof ConfigSchema>;
export type AnalyticsConfig = AppConfig['analytics'];
export type DedupConfig = AnalyticsConfig['dedup'];
export type CredibilityConfig = AnalyticsConfig['credibility'];
export type AnomalyConfig = AnalyticsConfig['anomaly'];
export type ScoringConfig = AnalyticsConfig['scoring'];
export type UncertaintyConfig = AnalyticsConfig['uncertainty'];
export type ThreatConfig = AnalyticsConfig['threat'];
export type CorrelationConfig = AnalyticsConfig['correlation'];
export type PoiConfig = AnalyticsConfig['poi'];

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object') {
    for (const child of Object.values(value)) deepFreeze(child);
    Object.freeze(value);
  }
  return value;
}

const RecordSchema = z.record(z.unknown());

function asRecord(value: unknown): Record<string, unknown> {
  const parsed = RecordSchema.safeParse(value);
  return parsed.success ? parsed.data : {};
}

function envInt(name: string): number | undefined {
  const raw = process.env[name];
  if (!raw) return undefined;
  const n = parseInt(raw, 10);
  return Number.isNaN(n) ? undefined : n;
}

function envFlag(name: string): boolean | undefined {
  const raw = process.env[name];
  if (!raw) return undefined;
  return ['1', 'true', 'yes'].includes(raw.trim().toLowerCase());
}

/** Defaults for every analytics knob, for callers that run the engines without a config file. */
export function defaultAnalyticsConfig(): AnalyticsConfig {
  return deepFreeze(AnalyticsConfigSchema.parse({}));
}

export function loadConfig(configPath = 'threadwatch.config.json'): AppConfig {
  const full = path.resolve(process.cwd(), configPath);
  let fileRaw: Record<string, unknown> = {};
  if (fs.existsSync(full)) {
    try {
      fileRaw = asRecord(JSON.parse(fs.readFileSync(full, 'utf8')));
    } catch (e) {
      throw new Error(`Failed to parse config file ${full}: ${(e as Error).message}`);
    }
  }
  const fileAnalytics = asRecord(fileRaw.analytics);
  const maxAlerts = envInt('CORRELATION_MAX_ALERTS');
  const samples = envInt('UNCERTAINTY_SAMPLES');
  const singleTokenPoi = envFlag('ENABLE_SINGLE_TOKEN_POI');
  const merged = {
    database: {
      provider: 'sqlite',
      url: process.env.DATABASE_URL || 'file:./data/threadwatch.db',
      ...asRecord(fileRaw.database),
    },
    logging: {
      level: process.env.LOG_LEVEL || 'info',
      json: process.env.LOG_JSON !== '0',
      ...asRecord(fileRaw.logging),
    },
    analytics: {
      ...fileAnalytics,
      correlation: {
        ...(maxAlerts ? { maxAlerts } : {}),
        ...asRecord(fileAnalytics.correlation),
      },
      uncertainty: {
        ...(samples ? { defaultSamples: samples } : {}),
        ...asRecord(fileAnalytics.uncertainty),
      },
      poi: {
        ...(singleTokenPoi === undefined ? {} : { allowSingleToken: singleTokenPoi }),
        ...asRecord(fileAnalytics.poi),
      },
    },
  };
  return deepFreeze(ConfigSchema.parse(merged));
}
