import DatabaseConstructor from 'better-sqlite3';
import type { Database as BetterSqliteDatabase } from 'better-sqlite3';
import { drizzle } from 'drizzle-orm/better-sqlite3';
import type { BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import { migrate } from 'drizzle-orm/better-sqlite3/migrator';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { fileURLToPath } from 'node:url';

import { APP_ENV } from '../config.js';
import { logger } from '../logger.js';
import * as schema from './schema.js';

export type DatabaseClient = BetterSQLite3Database<typeof schema>;

let dbClient: DatabaseClient | null = null;
let sqliteInstance: BetterSqliteDatabase | null = null;

/**
 * Directory holding the SQL migrations, resolved from this file so it works
 * from src/db (tsx, vitest) and dist/db (built)
 */
export const migrationsFolder = (): string => {
  const currentDir = dirname(fileURLToPath(import.meta.url));
  return `${dirname(dirname(currentDir))}/drizzle`;
};

export const runMigrations = (db: DatabaseClient): void => {
  try {
    const folder = migrationsFolder();
    logger.debug({ migrationsFolder: folder }, 'running database migrations');
    migrate(db, { migrationsFolder: folder });
    logger.info('database migrations completed');
  } catch (error) {
    logger.error({ err: error }, 'migration failed');
    throw error;
  }
};

export const getDb = (): DatabaseClient => {
  if (dbClient) {
    return dbClient;
  }

  const dbPath = APP_ENV.DATABASE_PATH;
  if (dbPath !== ':memory:') {
    mkdirSync(dirname(dbPath), { recursive: true });
  }

  sqliteInstance = new DatabaseConstructor(dbPath);
  sqliteInstance.pragma('foreign_keys = ON');
  dbClient = drizzle(sqliteInstance, { schema });

  runMigrations(dbClient);

  return dbClient;
};

export const closeDb = (): void => {
  if (!dbClient || !sqliteInstance) {
    return;
  }
  sqliteInstance.close();
  sqliteInstance = null;
  dbClient = null;
};
