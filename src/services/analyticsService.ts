import type Database from 'better-sqlite3';
import { loadConfig, type AnalyticsConfig } from '../config/index.js';
import { ValidationError } from '../core/errors.js';
import type {
  Alert,
  CorrelationResult,
  DuplicateDecision,
  FeedbackOutcome,
  FrequencyResult,
  Keyword,
  Poi,
  PoiHit,
  ScoreBreakdown,
  Source,
  ThreatAssessment,
  UncertaintyInterval,
} from '../core/types.js';
import {
  correlationRequestSchema,
  feedbackOutcomeSchema,
  intervalRequestSchema,
  keywordInputSchema,
  newAlertSchema,
  parseOrThrow,
  poiInputSchema,
  sourceInputSchema,
} from '../core/validation.js';
import { getDb } from '../db/client.js';
import { EventBus } from '../events/eventBus.js';
import { alertsIngestedTotal, scoresComputedTotal } from '../metrics/index.js';
import { AlertRepository } from '../repositories/alertRepository.js';
import { DispositionRepository } from '../repositories/dispositionRepository.js';
import { FrequencyRepository } from '../repositories/frequencyRepository.js';
import { KeywordRepository } from '../repositories/keywordRepository.js';
import { PoiRepository } from '../repositories/poiRepository.js';
import { ScoreRepository } from '../repositories/scoreRepository.js';
import { SourceRepository } from '../repositories/sourceRepository.js';
import { getLogger } from '../utils/logging.js';
import { DAY_MS, addDays, dayKey, isDayKey } from '../utils/time.js';
import { AnomalyDetector, type SpikeReport } from './anomalyDetector.js';
import { CorrelationEngine, type CorrelationWindow } from './correlationEngine.js';
import { CredibilityModel } from './credibilityModel.js';
import { DedupEngine } from './dedupEngine.js';
import { extractIocs, mergeEntities } from './entityExtraction.js';
import { matchPois, poiEntities } from './poiMatching.js';
import { scoreAlert } from './riskScoring.js';
import { assessThreat } from './threatAssessment.js';
import { scoreInterval } from './uncertaintyEngine.js';

export interface AnalyticsEvents {
  [event: string]: unknown;
  credibilityUpdated: { source: Source; alertId: string; outcome: FeedbackOutcome };
  alertScored: { breakdown: ScoreBreakdown };
  correlationCompleted: { window: CorrelationWindow; result: CorrelationResult };
}

export interface AnalyticsServiceOptions {
  db?: Database.Database;
  config?: AnalyticsConfig;
  clock?: () => Date;
  bus?: EventBus<AnalyticsEvents>;
  /** Re-score a source's alerts after its credibility changes. Defaults to true. */
  rescoreOnFeedback?: boolean;
}

export interface IngestResult {
  alert: Alert;
  decision: DuplicateDecision;
  poiHits: PoiHit[];
  score: ScoreBreakdown | null;
}

export interface ScoreRequest {
  samples?: number;
  seed?: number;
  now?: Date;
}

export interface ScoreResult {
  breakdown: ScoreBreakdown;
  interval?: UncertaintyInterval;
}

const NEUTRAL_FREQUENCY: Pick<FrequencyResult, 'factor' | 'z'> = { factor: 1, z: null };

/**
 * Orchestrates the engines over the repositories: ingest (dedup, entity
 * extraction, frequency increment, scoring), feedback, correlation and the
 * listing/assessment reads.
 */
export class AnalyticsService {
  readonly sources: SourceRepository;
  readonly keywords: KeywordRepository;
  readonly alerts: AlertRepository;
  readonly frequency: FrequencyRepository;
  readonly scores: ScoreRepository;
  readonly dispositions: DispositionRepository;
  readonly pois: PoiRepository;
  private readonly cfg: AnalyticsConfig;
  private readonly clock: () => Date;
  private readonly bus: EventBus<AnalyticsEvents>;
  private readonly dedup: DedupEngine;
  private readonly credibility: CredibilityModel;
  private readonly anomaly: AnomalyDetector;
  private readonly correlation: CorrelationEngine;
  private readonly detach: Array<() => void> = [];

  constructor(opts: AnalyticsServiceOptions = {}) {
    const db = opts.db ?? getDb();
    this.cfg = opts.config ?? loadConfig().analytics;
    this.clock = opts.clock ?? (() => new Date());
    this.bus = opts.bus ?? new EventBus<AnalyticsEvents>();
    this.sources = new SourceRepository(db);
    this.keywords = new KeywordRepository(db);
    this.alerts = new AlertRepository(db);
    this.frequency = new FrequencyRepository(db);
    this.scores = new ScoreRepository(db);
    this.dispositions = new DispositionRepository(db);
    this.pois = new PoiRepository(db);
    this.dedup = new DedupEngine(this.alerts, this.cfg.dedup);
    this.credibility = new CredibilityModel(this.sources, this.cfg.credibility);
    this.anomaly = new AnomalyDetector(this.frequency, this.cfg.anomaly);
    this.correlation = new CorrelationEngine(this.cfg.correlation, this.cfg.scoring.severityBands);

    if (opts.rescoreOnFeedback ?? true) {
      this.detach.push(
        this.bus.on('credibilityUpdated', async ({ source }) => {
          try {
            await this.rescoreSource(source.id);
          } catch (err) {
            getLogger().error({ err, sourceId: source.id }, 'Failed to rescore source alerts');
          }
        }),
      );
    }
  }

  /** Removes the listeners this service put on the bus. */
  dispose(): void {
    for (const off of this.detach.splice(0)) off();
  }

  get eventBus() {
    return this.bus;
  }

  registerSource(input: unknown): Source {
    const data = parseOrThrow(sourceInputSchema, input, 'source');
    return this.sources.create({
      id: data.id,
      name: data.name,
      sourceType: data.sourceType,
      credibilityAlpha: data.credibilityAlpha ?? this.cfg.credibility.priorAlpha,
      credibilityBeta: data.credibilityBeta ?? this.cfg.credibility.priorBeta,
    });
  }

  registerPoi(input: unknown): Poi {
    const data = parseOrThrow(poiInputSchema, input, 'poi');
    const poi = this.pois.create(data);
    getLogger().info({ poiId: poi.id, aliases: poi.aliases.length }, 'poi-registered');
    return poi;
  }

  upsertKeyword(input: unknown): Keyword {
    const data = parseOrThrow(keywordInputSchema, input, 'keyword');
    return this.keywords.upsert(data);
  }

  async ingestAlert(input: unknown, opts: { now?: Date } = {}): Promise<IngestResult> {
    const data = parseOrThrow(newAlertSchema, input, 'alert');
    const source = this.sources.get(data.sourceId);
    const keyword = data.matchedTerm ? this.keywords.getByTerm(data.matchedTerm) : null;

    const decision = this.dedup.check(data);
    const text = `${data.title}\n${data.content}`;
    const poiHits = decision.isDuplicate ? [] : matchPois(text, this.pois.listActiveAliases(), this.cfg.poi);
    const entities = decision.isDuplicate
      ? []
      : mergeEntities(data.entities, extractIocs(text), poiEntities(poiHits));
    const alert = this.alerts.create({
      id: data.id,
      title: data.title,
      content: data.content,
      url: data.url,
      sourceId: source.id,
      keywordId: keyword?.id ?? null,
      matchedTerm: data.matchedTerm,
      publishedAt: data.publishedAt,
      contentHash: decision.contentHash,
      context: data.context,
      isDuplicateOf: decision.duplicateOf,
      duplicateConfidence: decision.isDuplicate ? decision.confidence : null,
      entities,
    });
    if (poiHits.length > 0) this.pois.recordHits(alert.id, poiHits);
    alertsIngestedTotal.inc({ outcome: decision.isDuplicate ? 'duplicate' : 'canonical' });
    getLogger().info(
      {
        alertId: alert.id,
        sourceId: source.id,
        duplicateOf: decision.duplicateOf,
        path: decision.path,
        entities: entities.length,
        poiHits: poiHits.length,
      },
      'alert-ingested',
    );
    if (decision.isDuplicate) return { alert, decision, poiHits, score: null };

    if (keyword) this.frequency.increment(keyword.id, dayKey(alert.publishedAt));
    const { breakdown } = await this.scoreAlert(alert.id, { now: opts.now });
    return { alert, decision, poiHits, score: breakdown };
  }

  /** Scores (and persists) one alert; samples or seed also request an interval. */
  async scoreAlert(alertId: string, req: ScoreRequest = {}): Promise<ScoreResult> {
    const { samples, seed } = parseOrThrow(
      intervalRequestSchema,
      { samples: req.samples, seed: req.seed },
      'score request',
    );
    const alert = this.alerts.get(alertId);
    if (alert.isDuplicateOf) {
      throw new ValidationError(`Alert ${alertId} is a duplicate of ${alert.isDuplicateOf}; score the canonical alert`);
    }
    const keyword = alert.keywordId ? this.keywords.get(alert.keywordId) : null;
    const source = this.sources.get(alert.sourceId);
    const frequency = keyword
      ? this.anomaly.factorFor(keyword.id, dayKey(alert.publishedAt))
      : NEUTRAL_FREQUENCY;

    const breakdown = scoreAlert(
      {
        alert,
        keyword: {
          weight: keyword?.weight ?? this.cfg.scoring.defaultKeywordWeight,
          category: keyword?.category ?? 'general',
        },
        source,
        frequency: { factor: frequency.factor, z: frequency.z },
        now: req.now ?? this.clock(),
      },
      this.cfg.scoring,
    );
    this.scores.record(breakdown);
    scoresComputedTotal.inc({ severity: breakdown.severity });
    getLogger().info(
      { alertId, finalScore: breakdown.finalScore, severity: breakdown.severity },
      'alert-scored',
    );
    await this.bus.emit('alertScored', { breakdown });

    if (samples === undefined && seed === undefined) return { breakdown };
    const interval = scoreInterval(breakdown, this.cfg.uncertainty, this.cfg.scoring, this.cfg.anomaly, {
      samples,
      seed,
      keywordSigma: keyword?.weightSigma,
    });
    return { breakdown, interval };
  }

  /** Commits the outcome to the source's posterior, then notifies listeners. */
  async classifyFeedback(alertId: string, outcome: unknown): Promise<Source> {
    const parsedOutcome = parseOrThrow(feedbackOutcomeSchema, outcome, 'feedback');
    const alert = this.alerts.get(alertId);
    const source = this.credibility.update(alert.sourceId, parsedOutcome);
    this.dispositions.record(alert.id, source.id, parsedOutcome);
    getLogger().info(
      {
        alertId,
        sourceId: source.id,
        outcome: parsedOutcome,
        alpha: source.credibilityAlpha,
        beta: source.credibilityBeta,
      },
      'feedback-applied',
    );
    await this.bus.emit('credibilityUpdated', { source, alertId, outcome: parsedOutcome });
    return source;
  }

  async runCorrelation(request: unknown): Promise<CorrelationResult> {
    const req = parseOrThrow(correlationRequestSchema, request, 'correlation request');
    const window: CorrelationWindow = { start: req.windowStart, end: req.windowEnd };
    const candidates = this.alerts.snapshotWindow(window.start, window.end);
    const result = this.correlation.run(candidates, window, {
      minClusterSize: req.minClusterSize,
      edgeThreshold: req.edgeThreshold,
    });
    getLogger().info(
      {
        windowStart: window.start.toISOString(),
        windowEnd: window.end.toISOString(),
        alertsConsidered: result.alertsConsidered,
        threads: result.threads.length,
        truncated: result.truncated,
      },
      'correlation-run',
    );
    await this.bus.emit('correlationCompleted', { window, result });
    return result;
  }

  detectSpikes(day?: string): SpikeReport[] {
    const target = day ?? dayKey(this.clock());
    if (!isDayKey(target)) throw new ValidationError(`day must be YYYY-MM-DD, got "${target}"`);
    return this.anomaly.detectSpikes(target);
  }

  async rescoreAll(now?: Date): Promise<number> {
    const alerts = this.alerts.listNonDuplicate();
    for (const alert of alerts) {
      await this.scoreAlert(alert.id, { now });
    }
    getLogger().info({ rescored: alerts.length }, 'rescore-all');
    return alerts.length;
  }

  async rescoreSource(sourceId: string, now?: Date): Promise<number> {
    const alerts = this.alerts.listBySource(sourceId, { excludeDuplicates: true });
    for (const alert of alerts) {
      await this.scoreAlert(alert.id, { now });
    }
    getLogger().debug({ sourceId, rescored: alerts.length }, 'rescore-source');
    return alerts.length;
  }

  /** TAS over canonical alerts naming the subject as a POI (entity or text). */
  assessSubject(subject: string, now: Date = this.clock()): ThreatAssessment {
    const trimmed = subject.trim();
    if (!trimmed) throw new ValidationError('subject must not be empty');
    const windowEnd = new Date(Date.parse(`${addDays(dayKey(now), 1)}T00:00:00Z`));
    const windowStart = new Date(windowEnd.getTime() - this.cfg.threat.windowDays * DAY_MS);
    const mentions = this.alerts.listMentioning('poi', trimmed, windowStart, windowEnd).map((a) => ({
      alertId: a.id,
      title: a.title,
      content: a.content,
      publishedAt: a.publishedAt,
      entities: a.entities,
    }));
    const assessment = assessThreat(trimmed, mentions, now, this.cfg.threat, this.cfg.anomaly);
    getLogger().info(
      { subject: trimmed, score: assessment.score, hits: assessment.hits },
      'subject-assessed',
    );
    return assessment;
  }
}
