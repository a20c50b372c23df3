import Database from 'better-sqlite3';
import type { RunResult } from 'better-sqlite3';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import type { BaseSQLiteDatabase } from 'drizzle-orm/sqlite-core';
import { env } from '../config/env';
import { logger } from '../config/logger';
import { migrate } from './migrate';
import { schema } from './schema';

export type Db = BetterSQLite3Database<typeof schema>;

/** Either the database or an open transaction on it. DAL writes accept both. */
export type DbClient = BaseSQLiteDatabase<'sync', RunResult, typeof schema>;

export interface DatabaseHandle {
  db: Db;
  close: () => void;
}

/** Accepts `file:./dev.db`, a bare path or `:memory:`. */
export function toFilename(url: string): string {
  return url.startsWith('file:') ? url.slice('file:'.length) : url;
}

/**
 * Opens the SQLite database and creates the schema.
 * In test, each test file opens its own `:memory:` database.
 */
export function openDatabase(url: string = env.DATABASE_URL): DatabaseHandle {
  const filename = toFilename(url);
  const sqlite = new Database(filename);
  if (filename !== ':memory:') {
    sqlite.pragma('journal_mode = WAL');
  }
  sqlite.pragma('busy_timeout = 5000');
  migrate(sqlite);

  logger.debug({ filename }, 'Database opened');

  return {
    db: drizzle(sqlite, { schema }),
    close: () => sqlite.close(),
  };
}
