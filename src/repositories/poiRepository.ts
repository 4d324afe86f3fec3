import type Database from 'better-sqlite3';
import { randomUUID } from 'crypto';
import { getDb } from '../db/client.js';
import type { Poi, PoiAlias, PoiHit, PoiMatchType } from '../core/types.js';
import { NotFoundError, RepositoryError } from './errors.js';

interface PoiRow {
  id: string;
  name: string;
  org: string | null;
  role: string | null;
  sensitivity: number;
  active: number;
}

interface AliasRow {
  poi_id: string;
  poi_name: string;
  alias: string;
  alias_type: string;
  sensitivity: number;
}

interface HitRow {
  poi_id: string;
  poi_name: string;
  match_type: PoiMatchType;
  match_value: string;
  match_score: number;
  context: string | null;
}

export interface CreatePoiInput {
  id?: string;
  name: string;
  org?: string | null;
  role?: string | null;
  sensitivity?: number;
  aliases?: string[];
}

export class PoiRepository {
  constructor(private db: Database.Database = getDb()) {}

  /** Stores the POI with its name as the first alias, plus any extra aliases. */
  create(data: CreatePoiInput): Poi {
    const id = data.id ?? randomUUID();
    const insert = this.db.transaction(() => {
      this.db
        .prepare(
          `INSERT INTO pois (id, name, org, role, sensitivity, active, created_at)
           VALUES (?, ?, ?, ?, ?, 1, ?)`,
        )
        .run(id, data.name, data.org ?? null, data.role ?? null, data.sensitivity ?? 3, new Date().toISOString());
      const alias = this.db.prepare(
        `INSERT INTO poi_aliases (poi_id, alias, alias_type, active) VALUES (?, ?, ?, 1)
         ON CONFLICT(poi_id, alias) DO NOTHING`,
      );
      alias.run(id, data.name, 'name');
      for (const extra of data.aliases ?? []) alias.run(id, extra, 'alias');
    });
    try {
      insert();
    } catch (err) {
      throw new RepositoryError(`Failed to create POI ${data.name}`, err);
    }
    return this.get(id);
  }

  get(id: string): Poi {
    let row: PoiRow | undefined;
    let aliases: string[];
    try {
      row = this.db.prepare<[string], PoiRow>('SELECT * FROM pois WHERE id = ?').get(id);
      aliases = this.db
        .prepare<[string], { alias: string }>('SELECT alias FROM poi_aliases WHERE poi_id = ? AND active = 1 ORDER BY rowid')
        .all(id)
        .map((r) => r.alias);
    } catch (err) {
      throw new RepositoryError(`Failed to get POI ${id}`, err);
    }
    if (!row) throw new NotFoundError(`POI ${id} not found`);
    return {
      id: row.id,
      name: row.name,
      org: row.org,
      role: row.role,
      sensitivity: row.sensitivity,
      active: row.active === 1,
      aliases,
    };
  }

  /** Active aliases of active POIs, in a stable order. */
  listActiveAliases(): PoiAlias[] {
    try {
      return this.db
        .prepare<[], AliasRow>(
          `SELECT p.id AS poi_id, p.name AS poi_name, p.sensitivity, a.alias, a.alias_type
           FROM pois p
           JOIN poi_aliases a ON a.poi_id = p.id
           WHERE p.active = 1 AND a.active = 1
           ORDER BY p.id ASC, a.rowid ASC`,
        )
        .all()
        .map((r) => ({
          poiId: r.poi_id,
          poiName: r.poi_name,
          alias: r.alias,
          aliasType: r.alias_type,
          sensitivity: r.sensitivity,
        }));
    } catch (err) {
      throw new RepositoryError('Failed to list POI aliases', err);
    }
  }

  /** Upserts hits per (poi, alert, alias); a later match replaces type and score. */
  recordHits(alertId: string, hits: PoiHit[]): void {
    const write = this.db.transaction((rows: PoiHit[]) => {
      const stmt = this.db.prepare(
        `INSERT INTO poi_hits (poi_id, alert_id, match_type, match_value, match_score, context, created_at)
         VALUES (?, ?, ?, ?, ?, ?, ?)
         ON CONFLICT(poi_id, alert_id, match_value) DO UPDATE SET
           match_type = excluded.match_type,
           match_score = excluded.match_score,
           context = COALESCE(excluded.context, poi_hits.context)`,
      );
      const now = new Date().toISOString();
      for (const h of rows) stmt.run(h.poiId, alertId, h.matchType, h.matchValue, h.matchScore, h.context, now);
    });
    try {
      write(hits);
    } catch (err) {
      throw new RepositoryError(`Failed to record POI hits for alert ${alertId}`, err);
    }
  }

  listHits(alertId: string): PoiHit[] {
    try {
      return this.db
        .prepare<[string], HitRow>(
          `SELECT h.poi_id, p.name AS poi_name, h.match_type, h.match_value, h.match_score, h.context
           FROM poi_hits h JOIN pois p ON p.id = h.poi_id
           WHERE h.alert_id = ?
           ORDER BY h.match_score DESC, h.rowid ASC`,
        )
        .all(alertId)
        .map((r) => ({
          poiId: r.poi_id,
          poiName: r.poi_name,
          matchType: r.match_type,
          matchValue: r.match_value,
          matchScore: r.match_score,
          context: r.context ?? '',
        }));
    } catch (err) {
      throw new RepositoryError(`Failed to list POI hits for alert ${alertId}`, err);
    }
  }
}
