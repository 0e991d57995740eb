import { mkdirSync } from 'node:fs';
import path from 'node:path';

import Database from 'better-sqlite3';
import { type BetterSQLite3Database, drizzle } from 'drizzle-orm/better-sqlite3';

import { StorageConfig } from '../config';
import { StorageError } from '../utils/errors';
import { logger } from '../utils/logger';
import { schema } from './schema';

export type HealthDatabase = BetterSQLite3Database<typeof schema>;

export interface DatabaseHandle {
  db: HealthDatabase;
  sqlite: Database.Database;
  close: () => void;
}

const TABLE = StorageConfig.tableName;

function createTables(sqlite: Database.Database): void {
  sqlite
    .prepare(
      `
        CREATE TABLE IF NOT EXISTS ${TABLE} (
          date TEXT PRIMARY KEY NOT NULL,
          steps INTEGER NOT NULL,
          kcals REAL NOT NULL,
          km REAL NOT NULL,
          flights_climbed INTEGER NOT NULL DEFAULT 0,
          weight REAL,
          recorded_at TEXT NOT NULL
        )
      `,
    )
    .run();

  // Tables created before weight tracking lack the column
  try {
    sqlite.prepare(`ALTER TABLE ${TABLE} ADD COLUMN weight REAL`).run();
    logger.info('Added weight column to existing table', { table: TABLE });
  } catch (error: unknown) {
    if (!(error instanceof Error) || !error.message.includes('duplicate column name')) {
      throw error;
    }
  }
}

/**
 * Open (and create if needed) the SQLite database.
 * Pass ':memory:' for a private in-memory database.
 *
 * The default rollback journal is kept so the database is a single file the
 * backup job can copy.
 *
 * @throws StorageError if the file cannot be opened or the schema cannot be applied
 */
export function openDatabase(filename: string = StorageConfig.dbPath): DatabaseHandle {
  const inMemory = filename === ':memory:';

  try {
    if (!inMemory) {
      mkdirSync(path.dirname(path.resolve(filename)), { recursive: true });
    }

    const sqlite = new Database(filename);
    createTables(sqlite);

    logger.info('Database ready', { filename: inMemory ? filename : path.resolve(filename) });

    return {
      close: () => {
        sqlite.close();
      },
      db: drizzle(sqlite, { schema }),
      sqlite,
    };
  } catch (error) {
    throw new StorageError(`Failed to open database at ${filename}`, { cause: error });
  }
}
