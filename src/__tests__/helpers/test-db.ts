/**
 * Test database helper
 * Creates in-memory SQLite databases for testing
 */

import Database from 'better-sqlite3';
import { drizzle } from 'drizzle-orm/better-sqlite3';
import { migrate } from 'drizzle-orm/better-sqlite3/migrator';

import { migrationsFolder, type DatabaseClient } from '../../db/index.js';
import * as schema from '../../db/schema.js';

export interface TestDbContext {
  db: DatabaseClient;
  sqlite: Database.Database;
}

/**
 * Create a test database with migrations applied
 */
export function createTestDb(): TestDbContext {
  const sqlite = new Database(':memory:');
  sqlite.pragma('foreign_keys = ON');
  const db = drizzle(sqlite, { schema });

  migrate(db, { migrationsFolder: migrationsFolder() });

  return { db, sqlite };
}

/**
 * Close test database
 */
export function closeTestDb(ctx: TestDbContext): void {
  ctx.sqlite.close();
}
