// Domain model interfaces, decoupled from the storage row shapes

export type Severity = 'Critical' | 'High' | 'Medium' | 'Low';
export type FeedbackOutcome = 'TruePositive' | 'FalsePositive';

export const NON_ACTOR_ENTITY_TYPES = [
  'domain',
  'ipv4',
  'url',
  'user_id',
  'device_id',
  'vendor_id',
] as const;

export type EntityType =
  | 'actor_handle'
  | 'poi'
  | 'location'
  | 'cve'
  | 'md5'
  | 'sha1'
  | 'sha256'
  | (typeof NON_ACTOR_ENTITY_TYPES)[number];

export interface TypedEntity {
  type: EntityType;
  value: string;
}

export interface ProximityHit {
  distanceMiles: number;
  withinRadius: boolean;
}

// Precomputed by the geocoding/event collaborators before the alert reaches the core
export interface AlertContext {
  proximity: ProximityHit[];
  upcomingEventDistancesMiles: number[];
}

export interface Alert {
  id: string;
  title: string;
  content: string;
  url?: string | null;
  sourceId: string;
  keywordId?: string | null;
  matchedTerm: string;
  publishedAt: Date;
  contentHash: string;
  entities: TypedEntity[];
  context: AlertContext;
  isDuplicateOf?: string | null;
  duplicateConfidence?: number | null;
  createdAt: Date;
}

export interface Source {
  id: string;
  name: string;
  sourceType: string;
  credibilityAlpha: number;
  credibilityBeta: number;
  version: number; // CAS token
}

export interface Keyword {
  id: string;
  term: string;
  weight: number; // [0.1, 5.0]
  category: string;
  weightSigma?: number | null;
}

export interface Poi {
  id: string;
  name: string;
  org: string | null;
  role: string | null;
  sensitivity: number; // 1..5
  active: boolean;
  aliases: string[];
}

/** One active alias joined with its POI, as the matcher consumes it. */
export interface PoiAlias {
  poiId: string;
  poiName: string;
  alias: string;
  aliasType: string;
  sensitivity: number;
}

export type PoiMatchType = 'exact' | 'supporting_single_token' | 'fuzzy';

export interface PoiHit {
  poiId: string;
  poiName: string;
  matchType: PoiMatchType;
  matchValue: string;
  matchScore: number;
  context: string;
}

export interface FrequencyBucket {
  keywordId: string;
  date: string; // YYYY-MM-DD (UTC)
  count: number;
}

export interface DuplicateDecision {
  isDuplicate: boolean;
  duplicateOf: string | null;
  confidence: number;
  path: 'fingerprint' | 'fuzzy_title' | 'none' | 'empty';
  contentHash: string;
}

export interface FrequencyResult {
  factor: number;
  path: 'zscore' | 'ratio';
  todayCount: number;
  mean: number;
  std: number | null;
  z: number | null;
  historyDays: number;
}

export interface ScoreBreakdown {
  alertId: string;
  keywordWeight: number;
  sourceCredibility: number;
  credibilityAlpha: number;
  credibilityBeta: number;
  frequencyFactor: number;
  frequencyZ: number | null;
  recencyFactor: number;
  categoryFactor: number;
  proximityFactor: number;
  eventFactor: number;
  poiFactor: number;
  finalScore: number;
  severity: Severity;
  computedAt: Date;
}

export interface UncertaintyInterval {
  n: number;
  p05: number;
  p50: number;
  p95: number;
  mean: number;
  std: number;
  method: string;
  seed: number;
}

export interface ThreatFlags {
  fixation: boolean;
  energyBurst: boolean;
  leakage: boolean;
  pathway: boolean;
  targetingSpecificity: boolean;
}

export interface ThreatAssessment {
  subject: string;
  windowStart: Date;
  windowEnd: Date;
  flags: ThreatFlags;
  score: number;
  energyZ: number;
  distinctDays: number;
  hits: number;
}

export type ReasonCode =
  | 'shared_actor_handle'
  | 'shared_poi_hit'
  | 'shared_non_actor_entity'
  | 'matched_term_temporal_overlap'
  | 'shared_source_fingerprint'
  | 'cross_source_corroboration'
  | 'tight_temporal_proximity'
  | 'linguistic_overlap_medium'
  | 'linguistic_overlap_high';

export interface PairEvidence {
  leftAlertId: string;
  rightAlertId: string;
  score: number;
  reasonCodes: ReasonCode[];
  linked: boolean;
}

// What the correlation engine needs per alert, read as one consistent snapshot
export interface CorrelationCandidate {
  id: string;
  title: string;
  content: string;
  sourceId: string;
  sourceType: string;
  matchedTerm: string;
  publishedAt: Date;
  entities: TypedEntity[];
  ors: number;
}

export interface Thread {
  threadId: string;
  label: string;
  memberAlertIds: string[];
  threadConfidence: number;
  reasonCodes: ReasonCode[];
  recommendedTier: Severity;
  maxOrs: number;
  sourceTypes: string[];
  startTs: Date;
  endTs: Date;
  evidence: PairEvidence[];
}

export interface CorrelationResult {
  threads: Thread[];
  truncated: boolean;
  alertsConsidered: number;
  alertsDropped: number;
  pairsEvaluated: number;
  pairBudgetExhausted: boolean;
}
