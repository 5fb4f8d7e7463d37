import Database from 'better-sqlite3';
import { mkdirSync, existsSync } from 'node:fs';
import { dirname } from 'node:path';
import { AppError, PersistenceError } from '../lib/errors';
import type { Logger } from '../lib/logger';

export type Connection = Database.Database;

const ensureDirectory = (databasePath: string): void => {
  const dir = dirname(databasePath);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
};

/**
 * Open a connection for a single operation and close it afterwards, whatever
 * the outcome. Driver errors surface as PersistenceError.
 */
export const withConnection = <T>(databasePath: string, operation: string, fn: (db: Connection) => T): T => {
  let db: Connection | undefined;
  try {
    ensureDirectory(databasePath);
    db = new Database(databasePath);
    return fn(db);
  } catch (error) {
    if (error instanceof AppError) {
      throw error;
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new PersistenceError(`Database operation failed (${operation}): ${message}`, { operation }, { cause: error });
  } finally {
    db?.close();
  }
};

export const initializeSchema = (databasePath: string, logger: Logger): void => {
  withConnection(databasePath, 'initialize', db => {
    db.pragma('journal_mode = WAL');
    db.exec(`
      -- Analysis history, append-only
      CREATE TABLE IF NOT EXISTS repo_stats (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        owner TEXT NOT NULL,
        repo_name TEXT NOT NULL,
        total_commits INTEGER,
        total_contributors INTEGER,
        avg_commits_per_day REAL,
        analysis_period_days INTEGER,
        activity_index REAL DEFAULT 0.0,
        timestamp TEXT DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now')),
        additional_data TEXT -- JSON object
      );

      -- Key/value cache with absolute expiry
      CREATE TABLE IF NOT EXISTS github_cache (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        cache_key TEXT UNIQUE NOT NULL,
        data TEXT NOT NULL,
        created_at TEXT DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now')),
        expires_at TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_owner_repo ON repo_stats(owner, repo_name);
      CREATE INDEX IF NOT EXISTS idx_timestamp ON repo_stats(timestamp DESC);
      CREATE INDEX IF NOT EXISTS idx_cache_key ON github_cache(cache_key);
    `);
  });

  logger.info({ databasePath }, 'Database initialized');
};
