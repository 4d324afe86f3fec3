import type Database from 'better-sqlite3';
import { getDb } from '../db/client.js';
import type { FeedbackOutcome } from '../core/types.js';
import { RepositoryError } from './errors.js';

export interface Disposition {
  id: number;
  alertId: string;
  sourceId: string;
  outcome: FeedbackOutcome;
  createdAt: Date;
}

interface DispositionRow {
  id: number;
  alert_id: string;
  source_id: string;
  outcome: FeedbackOutcome;
  created_at: string;
}

export class DispositionRepository {
  constructor(private db: Database.Database = getDb()) {}

  record(alertId: string, sourceId: string, outcome: FeedbackOutcome): Disposition {
    try {
      const row = this.db
        .prepare<[string, string, string, string], DispositionRow>(
          `INSERT INTO dispositions (alert_id, source_id, outcome, created_at) VALUES (?, ?, ?, ?)
           RETURNING *`,
        )
        .get(alertId, sourceId, outcome, new Date().toISOString());
      if (!row) throw new Error('insert returned no row');
      return {
        id: row.id,
        alertId: row.alert_id,
        sourceId: row.source_id,
        outcome: row.outcome,
        createdAt: new Date(row.created_at),
      };
    } catch (err) {
      throw new RepositoryError(`Failed to record disposition for alert ${alertId}`, err);
    }
  }

  countForSource(sourceId: string): { truePositive: number; falsePositive: number } {
    try {
      const rows = this.db
        .prepare<[string], { outcome: FeedbackOutcome; n: number }>(
          'SELECT outcome, COUNT(*) AS n FROM dispositions WHERE source_id = ? GROUP BY outcome',
        )
        .all(sourceId);
      const counts = { truePositive: 0, falsePositive: 0 };
      for (const r of rows) {
        if (r.outcome === 'TruePositive') counts.truePositive = r.n;
        else counts.falsePositive = r.n;
      }
      return counts;
    } catch (err) {
      throw new RepositoryError(`Failed to count dispositions for source ${sourceId}`, err);
    }
  }
}
