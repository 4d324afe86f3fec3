import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import { loadConfig } from '../config/index.js';
import { getLogger } from '../utils/logging.js';
import { runMigrations } from './migrations.js';

let db: Database.Database | undefined;

/** `file:<path>` (relative to cwd) or `:memory:`. */
export function resolveDbPath(url: string): string {
  if (url === ':memory:' || url === 'file::memory:') return ':memory:';
  const match = /^file:(.*)$/.exec(url);
  const raw = match ? match[1] : url;
  return path.isAbsolute(raw) ? raw : path.resolve(process.cwd(), raw);
}

export function openDatabase(url: string): Database.Database {
  const dbPath = resolveDbPath(url);
  if (dbPath !== ':memory:') {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }
  const conn = new Database(dbPath);
  if (dbPath !== ':memory:') conn.pragma('journal_mode = WAL');
  conn.pragma('foreign_keys = ON');
  runMigrations(conn);
  getLogger().debug({ dbPath }, 'database opened');
  return conn;
}

export function getDb(): Database.Database {
  if (!db) {
    db = openDatabase(loadConfig().database.url);
  }
  return db;
}

export function closeDb(): void {
  if (db) {
    db.close();
    db = undefined;
  }
}
