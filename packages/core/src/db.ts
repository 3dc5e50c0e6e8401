import initSqlJs from 'sql.js';
import type { Database } from 'sql.js';
import { drizzle } from 'drizzle-orm/sql-js';
import type { SQLJsDatabase } from 'drizzle-orm/sql-js';
import * as schema from './schema/index.js';

export type SortboxDb = SQLJsDatabase<typeof schema> & { $client: Database };

const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS sections (
    id TEXT PRIMARY KEY,
    title TEXT NOT NULL,
    sort_order INTEGER NOT NULL DEFAULT 0
);

CREATE TABLE IF NOT EXISTS tasks (
    id TEXT PRIMARY KEY,
    title TEXT NOT NULL,
    description TEXT NOT NULL DEFAULT '',
    priority TEXT NOT NULL DEFAULT 'low' CHECK (priority IN ('low', 'medium', 'high')),
    completed INTEGER NOT NULL DEFAULT 0,
    section_id TEXT NOT NULL,
    reminder TEXT,
    created_at TEXT NOT NULL,
    sort_order INTEGER NOT NULL DEFAULT 0
);

CREATE INDEX IF NOT EXISTS idx_tasks_section_id ON tasks(section_id);
CREATE INDEX IF NOT EXISTS idx_tasks_sort ON tasks(sort_order);
`;

// sql.js is CommonJS; `default` points back at the init function
const SQL = await initSqlJs.default();

/**
 * Open an in-memory database with the schema applied.
 * Every call returns an independent, empty database; nothing is written to disk.
 */
export function createDb(): SortboxDb {
  const sqlite = new SQL.Database();
  sqlite.exec(SCHEMA_SQL);
  return Object.assign(drizzle(sqlite, { schema }), { $client: sqlite });
}

/**
 * Get the raw Database instance from a Drizzle instance.
 * Used for transactions, which Drizzle cannot nest across separate callers.
 */
export function getRawDb(db: SortboxDb): Database {
  return db.$client;
}
