import Database from 'better-sqlite3';
import fs from 'node:fs';
import path from 'node:path';
import { getLogger } from '../../utils/logger.js';

let db: Database.Database | undefined;

export const METRICS_TABLE_SQL = `
  CREATE TABLE IF NOT EXISTS metrics (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    timestamp TEXT NOT NULL,
    post_id TEXT NOT NULL DEFAULT '',
    variant TEXT NOT NULL DEFAULT '',
    text TEXT NOT NULL DEFAULT '',
    sentiment_score REAL NOT NULL DEFAULT 0,
    sentiment_label TEXT NOT NULL DEFAULT 'neutral',
    impressions INTEGER NOT NULL DEFAULT 1,
    clicks INTEGER NOT NULL DEFAULT 0,
    likes INTEGER NOT NULL DEFAULT 0,
    comments INTEGER NOT NULL DEFAULT 0,
    ctr REAL,
    engagement_rate REAL,
    ab_test_id TEXT NOT NULL DEFAULT '',
    ab_winner TEXT NOT NULL DEFAULT '',
    ab_reason TEXT NOT NULL DEFAULT ''
  );
`;

const MIGRATIONS = [
  // Migration 000: Metrics log
  METRICS_TABLE_SQL,
  // Migration 001: Lookups by post and experiment
  `
  CREATE INDEX IF NOT EXISTS idx_metrics_post_id ON metrics(post_id);
  CREATE INDEX IF NOT EXISTS idx_metrics_ab_test_id ON metrics(ab_test_id);
  `,
];

/**
 * Open a connection and bring its schema up to date. Use ':memory:' for a
 * throwaway database.
 */
export function openDb(dbPath: string): Database.Database {
  const log = getLogger();
  if (dbPath !== ':memory:') {
    const dir = path.dirname(dbPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }

  const conn = new Database(dbPath);
  conn.pragma('journal_mode = WAL');

  // Run migrations
  conn.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      id INTEGER PRIMARY KEY,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    );
  `);

  const applied = new Set(
    conn.prepare<[], { id: number }>('SELECT id FROM _migrations').all().map(r => r.id)
  );

  MIGRATIONS.forEach((sql, i) => {
    if (!applied.has(i)) {
      log.info(`Running migration ${i}`);
      conn.exec(sql);
      conn.prepare('INSERT INTO _migrations (id) VALUES (?)').run(i);
    }
  });

  return conn;
}

/**
 * Process-wide connection for CLI commands.
 */
export function getDb(dbPath: string): Database.Database {
  if (db) return db;
  db = openDb(dbPath);
  return db;
}

export function closeDb(): void {
  if (db) {
    db.close();
    db = undefined;
  }
}
