import Database from 'better-sqlite3';
import { drizzle } from 'drizzle-orm/better-sqlite3';
import type { BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import * as schema from './schema/index.js';

export type RegistryDb = BetterSQLite3Database<typeof schema>;

/** The raw SQL to create the schema from scratch */
export const CREATE_SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS registry_state (
    id INTEGER PRIMARY KEY CHECK (id = 1),
    owner TEXT NOT NULL,
    paused INTEGER NOT NULL DEFAULT 0,
    task_counter INTEGER NOT NULL DEFAULT 0,
    live_count INTEGER NOT NULL DEFAULT 0
);

CREATE TABLE IF NOT EXISTS tasks (
    id INTEGER PRIMARY KEY CHECK (id > 0),
    description TEXT NOT NULL,
    assigned_to TEXT NOT NULL,
    completed INTEGER NOT NULL DEFAULT 0,
    due_date INTEGER NOT NULL,
    priority TEXT NOT NULL CHECK (priority IN ('low', 'medium', 'high')),
    created_at INTEGER NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_tasks_assigned_to ON tasks(assigned_to);
CREATE INDEX IF NOT EXISTS idx_tasks_priority ON tasks(priority);
CREATE INDEX IF NOT EXISTS idx_tasks_completed ON tasks(completed);
`;

export interface OpenedDb {
  readonly db: RegistryDb;
  readonly sqlite: Database.Database;
}

/**
 * Open an in-memory database with the schema applied.
 * The store is never written to disk.
 */
export function openDb(): OpenedDb {
  const sqlite = new Database(':memory:');
  sqlite.exec(CREATE_SCHEMA_SQL);
  return { db: drizzle(sqlite, { schema }), sqlite };
}
