import type Database from 'better-sqlite3';
import { getDb } from '../db/client.js';
import type { ScoreBreakdown, Severity } from '../core/types.js';
import { RepositoryError } from './errors.js';

interface ScoreRow {
  alert_id: string;
  keyword_weight: number;
  source_credibility: number;
  credibility_alpha: number;
  credibility_beta: number;
  frequency_factor: number;
  frequency_z: number | null;
  recency_factor: number;
  category_factor: number;
  proximity_factor: number;
  event_factor: number;
  poi_factor: number;
  final_score: number;
  severity: Severity;
  computed_at: string;
}

function map(row: ScoreRow): ScoreBreakdown {
  return {
    alertId: row.alert_id,
    keywordWeight: row.keyword_weight,
    sourceCredibility: row.source_credibility,
    credibilityAlpha: row.credibility_alpha,
    credibilityBeta: row.credibility_beta,
    frequencyFactor: row.frequency_factor,
    frequencyZ: row.frequency_z,
    recencyFactor: row.recency_factor,
    categoryFactor: row.category_factor,
    proximityFactor: row.proximity_factor,
    eventFactor: row.event_factor,
    poiFactor: row.poi_factor,
    finalScore: row.final_score,
    severity: row.severity,
    computedAt: new Date(row.computed_at),
  };
}

export class ScoreRepository {
  constructor(private db: Database.Database = getDb()) {}

  /** Supersedes the current row (if any) and appends the new breakdown atomically. */
  record(b: ScoreBreakdown): void {
    const write = this.db.transaction(() => {
      const at = b.computedAt.toISOString();
      this.db
        .prepare('UPDATE alert_scores SET superseded_at = ? WHERE alert_id = ? AND superseded_at IS NULL')
        .run(at, b.alertId);
      this.db
        .prepare(
          `INSERT INTO alert_scores (alert_id, keyword_weight, source_credibility, credibility_alpha,
             credibility_beta, frequency_factor, frequency_z, recency_factor, category_factor,
             proximity_factor, event_factor, poi_factor, final_score, severity, computed_at)
           VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
        )
        .run(
          b.alertId,
          b.keywordWeight,
          b.sourceCredibility,
          b.credibilityAlpha,
          b.credibilityBeta,
          b.frequencyFactor,
          b.frequencyZ,
          b.recencyFactor,
          b.categoryFactor,
          b.proximityFactor,
          b.eventFactor,
          b.poiFactor,
          b.finalScore,
          b.severity,
          at,
        );
    });
    try {
      write();
    } catch (err) {
      throw new RepositoryError(`Failed to record score for alert ${b.alertId}`, err);
    }
  }

  latest(alertId: string): ScoreBreakdown | null {
    try {
      const row = this.db
        .prepare<[string], ScoreRow>(
          'SELECT * FROM alert_scores WHERE alert_id = ? AND superseded_at IS NULL ORDER BY id DESC LIMIT 1',
        )
        .get(alertId);
      return row ? map(row) : null;
    } catch (err) {
      throw new RepositoryError(`Failed to read score for alert ${alertId}`, err);
    }
  }

  history(alertId: string): ScoreBreakdown[] {
    try {
      return this.db
        .prepare<[string], ScoreRow>('SELECT * FROM alert_scores WHERE alert_id = ? ORDER BY id ASC')
        .all(alertId)
        .map(map);
    } catch (err) {
      throw new RepositoryError(`Failed to read score history for alert ${alertId}`, err);
    }
  }
}
