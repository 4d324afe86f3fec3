import type Database from 'better-sqlite3';
import { randomUUID } from 'crypto';
import { getDb } from '../db/client.js';
import type { Source } from '../core/types.js';
import type { SourceStore } from '../services/credibilityModel.js';
import { NotFoundError, RepositoryError } from './errors.js';

interface SourceRow {
  id: string;
  name: string;
  source_type: string;
  credibility_alpha: number;
  credibility_beta: number;
  version: number;
}

function map(row: SourceRow): Source {
  return {
    id: row.id,
    name: row.name,
    sourceType: row.source_type,
    credibilityAlpha: row.credibility_alpha,
    credibilityBeta: row.credibility_beta,
    version: row.version,
  };
}

export interface CreateSourceInput {
  id?: string;
  name: string;
  sourceType: string;
  credibilityAlpha: number;
  credibilityBeta: number;
}

export class SourceRepository implements SourceStore {
  constructor(private db: Database.Database = getDb()) {}

  create(data: CreateSourceInput): Source {
    const id = data.id ?? randomUUID();
    try {
      this.db
        .prepare(
          `INSERT INTO sources (id, name, source_type, credibility_alpha, credibility_beta, version, created_at)
           VALUES (?, ?, ?, ?, ?, 0, ?)`,
        )
        .run(id, data.name, data.sourceType, data.credibilityAlpha, data.credibilityBeta, new Date().toISOString());
    } catch (err) {
      throw new RepositoryError('Failed to create source', err);
    }
    return this.get(id);
  }

  get(id: string): Source {
    let row: SourceRow | undefined;
    try {
      row = this.db.prepare<[string], SourceRow>('SELECT * FROM sources WHERE id = ?').get(id);
    } catch (err) {
      throw new RepositoryError(`Failed to get source ${id}`, err);
    }
    if (!row) throw new NotFoundError(`Source ${id} not found`);
    return map(row);
  }

  list(): Source[] {
    try {
      return this.db
        .prepare<[], SourceRow>('SELECT * FROM sources ORDER BY name ASC, id ASC')
        .all()
        .map(map);
    } catch (err) {
      throw new RepositoryError('Failed to list sources', err);
    }
  }

  /** Writes the pair only if nobody else bumped the version since it was read. */
  compareAndSet(id: string, expectedVersion: number, alpha: number, beta: number): boolean {
    try {
      const result = this.db
        .prepare(
          `UPDATE sources
           SET credibility_alpha = ?, credibility_beta = ?, version = version + 1
           WHERE id = ? AND version = ?`,
        )
        .run(alpha, beta, id, expectedVersion);
      return result.changes === 1;
    } catch (err) {
      throw new RepositoryError(`Failed to update credibility for source ${id}`, err);
    }
  }
}
