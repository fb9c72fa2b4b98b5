import { sql } from 'drizzle-orm';
import type { DB } from './store.js';
import { contexts } from './schema/contexts.js';
import { packages } from './schema/packages.js';
import { history } from './schema/history.js';

/**
 * Create the tables if they do not exist and make sure the studio root context is present.
 * Safe to run against an already initialized store.
 */
export function pushSchema(db: DB) {
  db.run(sql`CREATE TABLE IF NOT EXISTS ${contexts} (
    context_id INTEGER PRIMARY KEY AUTOINCREMENT,
    project TEXT,
    category TEXT,
    entity TEXT
  )`);

  // NULLs are distinct under a plain UNIQUE constraint, so index the coalesced triple
  db.run(sql.raw(`CREATE UNIQUE INDEX IF NOT EXISTS context_triple_idx ON context(
    coalesce(project, ''), coalesce(category, ''), coalesce(entity, '')
  )`));

  db.run(sql`CREATE TABLE IF NOT EXISTS ${packages} (
    context_id INTEGER NOT NULL,
    name TEXT NOT NULL,
    step TEXT,
    software TEXT,
    FOREIGN KEY (context_id) REFERENCES context(context_id)
  )`);

  db.run(sql.raw(`CREATE INDEX IF NOT EXISTS package_context_idx ON package(context_id)`));

  db.run(sql`CREATE TABLE IF NOT EXISTS ${history} (
    user TEXT NOT NULL,
    context TEXT NOT NULL,
    package_name TEXT NOT NULL,
    step TEXT NOT NULL,
    software TEXT NOT NULL,
    operation INT NOT NULL,
    date TIMESTAMP NOT NULL,
    comment TEXT NOT NULL
  )`);

  db.run(sql`INSERT INTO ${contexts} (project, category, entity)
    SELECT NULL, NULL, NULL
    WHERE NOT EXISTS (
      SELECT 1 FROM ${contexts} WHERE project IS NULL AND category IS NULL AND entity IS NULL
    )`);

  return db;
}
