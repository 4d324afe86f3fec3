import type Database from 'better-sqlite3';
import { getDb } from '../db/client.js';
import type { FrequencyBucket } from '../core/types.js';
import type { FrequencyStore } from '../services/anomalyDetector.js';
import { RepositoryError } from './errors.js';

interface BucketRow {
  keyword_id: string;
  date: string;
  count: number;
}

export class FrequencyRepository implements FrequencyStore {
  constructor(private db: Database.Database = getDb()) {}

  /** Atomic upsert-increment of one (keyword, day) bucket. Returns the new count. */
  increment(keywordId: string, day: string, by = 1): number {
    try {
      const row = this.db
        .prepare<[string, string, number], { count: number }>(
          `INSERT INTO keyword_frequency (keyword_id, date, count) VALUES (?, ?, ?)
           ON CONFLICT(keyword_id, date) DO UPDATE SET count = count + excluded.count
           RETURNING count`,
        )
        .get(keywordId, day, by);
      return row?.count ?? 0;
    } catch (err) {
      throw new RepositoryError(`Failed to increment frequency for keyword ${keywordId}`, err);
    }
  }

  history(keywordId: string, fromDay: string, toDayExclusive: string): FrequencyBucket[] {
    try {
      return this.db
        .prepare<[string, string, string], BucketRow>(
          `SELECT keyword_id, date, count FROM keyword_frequency
           WHERE keyword_id = ? AND date >= ? AND date < ?
           ORDER BY date ASC`,
        )
        .all(keywordId, fromDay, toDayExclusive)
        .map((r) => ({ keywordId: r.keyword_id, date: r.date, count: r.count }));
    } catch (err) {
      throw new RepositoryError(`Failed to read frequency history for keyword ${keywordId}`, err);
    }
  }

  countOn(keywordId: string, day: string): number {
    try {
      const row = this.db
        .prepare<[string, string], { count: number }>(
          'SELECT count FROM keyword_frequency WHERE keyword_id = ? AND date = ?',
        )
        .get(keywordId, day);
      return row?.count ?? 0;
    } catch (err) {
      throw new RepositoryError(`Failed to read frequency for keyword ${keywordId}`, err);
    }
  }

  listForDay(day: string): Array<{ keywordId: string; term: string; category: string; count: number }> {
    try {
      return this.db
        .prepare<[string], { keyword_id: string; term: string; category: string; count: number }>(
          `SELECT kf.keyword_id, k.term, k.category, kf.count
           FROM keyword_frequency kf JOIN keywords k ON k.id = kf.keyword_id
           WHERE kf.date = ?
           ORDER BY k.term ASC`,
        )
        .all(day)
        .map((r) => ({ keywordId: r.keyword_id, term: r.term, category: r.category, count: r.count }));
    } catch (err) {
      throw new RepositoryError(`Failed to list keyword frequencies for ${day}`, err);
    }
  }
}
