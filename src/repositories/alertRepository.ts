import type Database from 'better-sqlite3';
import { randomUUID } from 'crypto';
import { getDb } from '../db/client.js';
import type { Alert, AlertContext, CorrelationCandidate, EntityType, TypedEntity } from '../core/types.js';
import { alertContextSchema, isEntityType } from '../core/validation.js';
import type { DedupStore, PoolEntry } from '../services/dedupEngine.js';
import { containsPhrase } from '../utils/phrase.js';
import { addDays } from '../utils/time.js';
import { NotFoundError, RepositoryError } from './errors.js';

interface AlertRow {
  id: string;
  title: string;
  content: string;
  url: string | null;
  source_id: string;
  keyword_id: string | null;
  matched_term: string;
  published_at: string;
  content_hash: string;
  duplicate_of: string | null;
  duplicate_confidence: number | null;
  context_json: string;
  created_at: string;
}

interface EntityRow {
  alert_id: string;
  entity_type: string;
  entity_value: string;
}

interface SnapshotRow extends AlertRow {
  source_type: string;
  final_score: number | null;
}

const EMPTY_CONTEXT: AlertContext = { proximity: [], upcomingEventDistancesMiles: [] };

function parseContext(raw: string): AlertContext {
  let decoded: unknown;
  try {
    decoded = JSON.parse(raw);
  } catch {
    return EMPTY_CONTEXT;
  }
  const parsed = alertContextSchema.safeParse(decoded);
  return parsed.success ? parsed.data : EMPTY_CONTEXT;
}

function toEntity(row: EntityRow): TypedEntity | null {
  return isEntityType(row.entity_type) ? { type: row.entity_type, value: row.entity_value } : null;
}

function map(row: AlertRow, entities: TypedEntity[]): Alert {
  return {
    id: row.id,
    title: row.title,
    content: row.content,
    url: row.url,
    sourceId: row.source_id,
    keywordId: row.keyword_id,
    matchedTerm: row.matched_term,
    publishedAt: new Date(row.published_at),
    contentHash: row.content_hash,
    entities,
    context: parseContext(row.context_json),
    isDuplicateOf: row.duplicate_of,
    duplicateConfidence: row.duplicate_confidence,
    createdAt: new Date(row.created_at),
  };
}

export interface CreateAlertInput {
  id?: string;
  title: string;
  content: string;
  url?: string | null;
  sourceId: string;
  keywordId?: string | null;
  matchedTerm: string;
  publishedAt: Date;
  contentHash: string;
  context: AlertContext;
  isDuplicateOf?: string | null;
  duplicateConfidence?: number | null;
  entities?: TypedEntity[];
}

export class AlertRepository implements DedupStore {
  constructor(private db: Database.Database = getDb()) {}

  create(data: CreateAlertInput): Alert {
    const id = data.id ?? randomUUID();
    const insert = this.db.transaction(() => {
      this.db
        .prepare(
          `INSERT INTO alerts (id, title, content, url, source_id, keyword_id, matched_term, published_at,
             content_hash, duplicate_of, duplicate_confidence, context_json, created_at)
           VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
        )
        .run(
          id,
          data.title,
          data.content,
          data.url ?? null,
          data.sourceId,
          data.keywordId ?? null,
          data.matchedTerm,
          data.publishedAt.toISOString(),
          data.contentHash,
          data.isDuplicateOf ?? null,
          data.duplicateConfidence ?? null,
          JSON.stringify(data.context),
          new Date().toISOString(),
        );
      this.insertEntities(id, data.entities ?? []);
    });
    try {
      insert();
    } catch (err) {
      throw new RepositoryError('Failed to create alert', err);
    }
    return this.get(id);
  }

  private insertEntities(alertId: string, entities: TypedEntity[]) {
    const stmt = this.db.prepare(
      'INSERT OR IGNORE INTO alert_entities (alert_id, entity_type, entity_value) VALUES (?, ?, ?)',
    );
    for (const e of entities) stmt.run(alertId, e.type, e.value);
  }

  get(id: string): Alert {
    let row: AlertRow | undefined;
    try {
      row = this.db.prepare<[string], AlertRow>('SELECT * FROM alerts WHERE id = ?').get(id);
    } catch (err) {
      throw new RepositoryError(`Failed to get alert ${id}`, err);
    }
    if (!row) throw new NotFoundError(`Alert ${id} not found`);
    return map(row, this.entitiesFor([id]).get(id) ?? []);
  }

  findByContentHash(contentHash: string): string | null {
    try {
      const row = this.db
        .prepare<[string], { id: string }>(
          `SELECT id FROM alerts WHERE content_hash = ? AND duplicate_of IS NULL
           ORDER BY published_at ASC, id ASC LIMIT 1`,
        )
        .get(contentHash);
      return row?.id ?? null;
    } catch (err) {
      throw new RepositoryError('Failed to look up alert fingerprint', err);
    }
  }

  /** Canonical alerts of one UTC day, newest first. Duplicates never take a slot. */
  listSameDay(day: string, limit: number): PoolEntry[] {
    try {
      return this.db
        .prepare<[string, string, number], AlertRow>(
          `SELECT * FROM alerts WHERE published_at >= ? AND published_at < ? AND duplicate_of IS NULL
           ORDER BY published_at DESC, id ASC LIMIT ?`,
        )
        .all(`${day}T00:00:00.000Z`, `${addDays(day, 1)}T00:00:00.000Z`, limit)
        .map((r) => ({
          id: r.id,
          title: r.title,
          contentHash: r.content_hash,
          publishedAt: new Date(r.published_at),
          isDuplicateOf: r.duplicate_of,
        }));
    } catch (err) {
      throw new RepositoryError(`Failed to list alerts for ${day}`, err);
    }
  }

  listBySource(sourceId: string, opts: { excludeDuplicates?: boolean } = {}): Alert[] {
    const where = opts.excludeDuplicates ? 'AND duplicate_of IS NULL' : '';
    return this.listWhere(
      `source_id = ? ${where}`,
      [sourceId],
      `Failed to list alerts for source ${sourceId}`,
    );
  }

  listNonDuplicate(): Alert[] {
    return this.listWhere('duplicate_of IS NULL', [], 'Failed to list canonical alerts');
  }

  listInWindow(start: Date, end: Date): Alert[] {
    return this.listWhere(
      'published_at >= ? AND published_at <= ?',
      [start.toISOString(), end.toISOString()],
      'Failed to list alerts in window',
    );
  }

  /**
   * Canonical alerts linked to the entity, or naming it as a whole phrase in
   * title or content ("Ann" does not match "Annual").
   */
  listMentioning(type: EntityType, value: string, from: Date, to: Date): Alert[] {
    const wanted = value.trim().toLowerCase();
    return this.listWhere(
      'duplicate_of IS NULL AND published_at >= ? AND published_at < ?',
      [from.toISOString(), to.toISOString()],
      `Failed to list alerts mentioning ${type}:${value}`,
    ).filter(
      (a) =>
        a.entities.some((e) => e.type === type && e.value.toLowerCase() === wanted) ||
        containsPhrase(`${a.title}\n${a.content}`, value),
    );
  }

  /**
   * One consistent read of everything the correlation engine needs: canonical
   * alerts in the window with their source type, entities and current score.
   */
  snapshotWindow(start: Date, end: Date): CorrelationCandidate[] {
    const read = this.db.transaction((): CorrelationCandidate[] => {
      const rows = this.db
        .prepare<[string, string], SnapshotRow>(
          `SELECT a.*, s.source_type, sc.final_score
           FROM alerts a
           JOIN sources s ON s.id = a.source_id
           LEFT JOIN alert_scores sc ON sc.alert_id = a.id AND sc.superseded_at IS NULL
           WHERE a.duplicate_of IS NULL AND a.published_at >= ? AND a.published_at <= ?
           ORDER BY a.published_at ASC, a.id ASC`,
        )
        .all(start.toISOString(), end.toISOString());
      const entities = this.entitiesFor(rows.map((r) => r.id));
      return rows.map((r) => ({
        id: r.id,
        title: r.title,
        content: r.content,
        sourceId: r.source_id,
        sourceType: r.source_type,
        matchedTerm: r.matched_term,
        publishedAt: new Date(r.published_at),
        entities: entities.get(r.id) ?? [],
        ors: r.final_score ?? 0,
      }));
    });
    try {
      return read();
    } catch (err) {
      throw new RepositoryError('Failed to snapshot correlation window', err);
    }
  }

  private listWhere(where: string, params: Array<string | number>, failure: string): Alert[] {
    try {
      const rows = this.db
        .prepare<Array<string | number>, AlertRow>(
          `SELECT * FROM alerts WHERE ${where} ORDER BY published_at ASC, id ASC`,
        )
        .all(...params);
      const entities = this.entitiesFor(rows.map((r) => r.id));
      return rows.map((r) => map(r, entities.get(r.id) ?? []));
    } catch (err) {
      throw new RepositoryError(failure, err);
    }
  }

  entitiesFor(alertIds: string[]): Map<string, TypedEntity[]> {
    const out = new Map<string, TypedEntity[]>();
    if (alertIds.length === 0) return out;
    const stmt = this.db.prepare<[string], EntityRow>(
      'SELECT alert_id, entity_type, entity_value FROM alert_entities WHERE alert_id = ? ORDER BY entity_type, entity_value',
    );
    for (const id of alertIds) {
      const list: TypedEntity[] = [];
      for (const row of stmt.all(id)) {
        const entity = toEntity(row);
        if (entity) list.push(entity);
      }
      out.set(id, list);
    }
    return out;
  }
}
