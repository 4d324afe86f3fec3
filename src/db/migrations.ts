import type Database from 'better-sqlite3';

export function runMigrations(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS sources (
      id TEXT PRIMARY KEY,
      name TEXT NOT NULL,
      source_type TEXT NOT NULL,
      credibility_alpha REAL NOT NULL DEFAULT 2.0 CHECK (credibility_alpha > 0),
      credibility_beta REAL NOT NULL DEFAULT 2.0 CHECK (credibility_beta > 0),
      version INTEGER NOT NULL DEFAULT 0,
      created_at TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS keywords (
      id TEXT PRIMARY KEY,
      term TEXT NOT NULL UNIQUE,
      weight REAL NOT NULL CHECK (weight >= 0.1 AND weight <= 5.0),
      category TEXT NOT NULL DEFAULT 'general',
      weight_sigma REAL
    );

    CREATE TABLE IF NOT EXISTS alerts (
      id TEXT PRIMARY KEY,
      title TEXT NOT NULL,
      content TEXT NOT NULL DEFAULT '',
      url TEXT,
      source_id TEXT NOT NULL REFERENCES sources(id),
      keyword_id TEXT REFERENCES keywords(id),
      matched_term TEXT NOT NULL DEFAULT '',
      published_at TEXT NOT NULL,
      content_hash TEXT NOT NULL,
      duplicate_of TEXT REFERENCES alerts(id),
      duplicate_confidence REAL,
      context_json TEXT NOT NULL DEFAULT '{}',
      created_at TEXT NOT NULL
    );
    CREATE INDEX IF NOT EXISTS idx_alerts_content_hash ON alerts(content_hash);
    CREATE INDEX IF NOT EXISTS idx_alerts_published_at ON alerts(published_at);
    CREATE INDEX IF NOT EXISTS idx_alerts_source ON alerts(source_id);

    CREATE TABLE IF NOT EXISTS alert_entities (
      alert_id TEXT NOT NULL REFERENCES alerts(id),
      entity_type TEXT NOT NULL,
      entity_value TEXT NOT NULL,
      UNIQUE (alert_id, entity_type, entity_value)
    );
    CREATE INDEX IF NOT EXISTS idx_alert_entities_value ON alert_entities(entity_type, entity_value);

    CREATE TABLE IF NOT EXISTS pois (
      id TEXT PRIMARY KEY,
      name TEXT NOT NULL,
      org TEXT,
      role TEXT,
      sensitivity INTEGER NOT NULL DEFAULT 3 CHECK (sensitivity BETWEEN 1 AND 5),
      active INTEGER NOT NULL DEFAULT 1,
      created_at TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS poi_aliases (
      poi_id TEXT NOT NULL REFERENCES pois(id),
      alias TEXT NOT NULL,
      alias_type TEXT NOT NULL DEFAULT 'alias',
      active INTEGER NOT NULL DEFAULT 1,
      UNIQUE (poi_id, alias)
    );

    CREATE TABLE IF NOT EXISTS poi_hits (
      poi_id TEXT NOT NULL REFERENCES pois(id),
      alert_id TEXT NOT NULL REFERENCES alerts(id),
      match_type TEXT NOT NULL,
      match_value TEXT NOT NULL,
      match_score REAL NOT NULL,
      context TEXT,
      created_at TEXT NOT NULL,
      UNIQUE (poi_id, alert_id, match_value)
    );

    CREATE TABLE IF NOT EXISTS keyword_frequency (
      keyword_id TEXT NOT NULL REFERENCES keywords(id),
      date TEXT NOT NULL,
      count INTEGER NOT NULL DEFAULT 0,
      PRIMARY KEY (keyword_id, date)
    );

    CREATE TABLE IF NOT EXISTS alert_scores (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      alert_id TEXT NOT NULL REFERENCES alerts(id),
      keyword_weight REAL NOT NULL,
      source_credibility REAL NOT NULL,
      credibility_alpha REAL NOT NULL,
      credibility_beta REAL NOT NULL,
      frequency_factor REAL NOT NULL,
      frequency_z REAL,
      recency_factor REAL NOT NULL,
      category_factor REAL NOT NULL,
      proximity_factor REAL NOT NULL,
      event_factor REAL NOT NULL,
      poi_factor REAL NOT NULL,
      final_score REAL NOT NULL,
      severity TEXT NOT NULL,
      computed_at TEXT NOT NULL,
      superseded_at TEXT
    );
    CREATE INDEX IF NOT EXISTS idx_alert_scores_current ON alert_scores(alert_id, superseded_at);

    CREATE TABLE IF NOT EXISTS dispositions (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      alert_id TEXT NOT NULL REFERENCES alerts(id),
      source_id TEXT NOT NULL REFERENCES sources(id),
      outcome TEXT NOT NULL CHECK (outcome IN ('TruePositive', 'FalsePositive')),
      created_at TEXT NOT NULL
    );
  `);
}
