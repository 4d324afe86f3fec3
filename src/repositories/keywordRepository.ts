import type Database from 'better-sqlite3';
import { randomUUID } from 'crypto';
import { getDb } from '../db/client.js';
import type { Keyword } from '../core/types.js';
import { NotFoundError, RepositoryError } from './errors.js';

interface KeywordRow {
  id: string;
  term: string;
  weight: number;
  category: string;
  weight_sigma: number | null;
}

function map(row: KeywordRow): Keyword {
  return {
    id: row.id,
    term: row.term,
    weight: row.weight,
    category: row.category,
    weightSigma: row.weight_sigma,
  };
}

export interface UpsertKeywordInput {
  term: string;
  weight: number;
  category: string;
  weightSigma?: number | null;
}

export const normalizeTerm = (term: string) => term.trim().toLowerCase();

export class KeywordRepository {
  constructor(private db: Database.Database = getDb()) {}

  /** Inserts or replaces the configuration snapshot for a term. */
  upsert(data: UpsertKeywordInput): Keyword {
    const term = normalizeTerm(data.term);
    try {
      this.db
        .prepare(
          `INSERT INTO keywords (id, term, weight, category, weight_sigma)
           VALUES (?, ?, ?, ?, ?)
           ON CONFLICT(term) DO UPDATE SET
             weight = excluded.weight,
             category = excluded.category,
             weight_sigma = excluded.weight_sigma`,
        )
        .run(randomUUID(), term, data.weight, data.category, data.weightSigma ?? null);
    } catch (err) {
      throw new RepositoryError(`Failed to upsert keyword ${term}`, err);
    }
    const kw = this.getByTerm(term);
    if (!kw) throw new RepositoryError(`Keyword ${term} missing after upsert`);
    return kw;
  }

  get(id: string): Keyword {
    let row: KeywordRow | undefined;
    try {
      row = this.db.prepare<[string], KeywordRow>('SELECT * FROM keywords WHERE id = ?').get(id);
    } catch (err) {
      throw new RepositoryError(`Failed to get keyword ${id}`, err);
    }
    if (!row) throw new NotFoundError(`Keyword ${id} not found`);
    return map(row);
  }

  getByTerm(term: string): Keyword | null {
    try {
      const row = this.db
        .prepare<[string], KeywordRow>('SELECT * FROM keywords WHERE term = ?')
        .get(normalizeTerm(term));
      return row ? map(row) : null;
    } catch (err) {
      throw new RepositoryError(`Failed to look up keyword ${term}`, err);
    }
  }

  list(): Keyword[] {
    try {
      return this.db.prepare<[], KeywordRow>('SELECT * FROM keywords ORDER BY term ASC').all().map(map);
    } catch (err) {
      throw new RepositoryError('Failed to list keywords', err);
    }
  }
}
