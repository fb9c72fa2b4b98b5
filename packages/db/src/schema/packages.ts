import { sqliteTable, text, integer, index } from 'drizzle-orm/sqlite-core';
import { contexts } from './contexts.js';

// No declared key: entries are addressed by SQLite's implicit rowid.
export const packages = sqliteTable('package', {
  contextId: integer('context_id').notNull().references(() => contexts.contextId),
  name: text('name').notNull(),
  step: text('step'),
  software: text('software'),
}, (table) => ({
  contextIdx: index('package_context_idx').on(table.contextId),
}));

export type PackageRow = typeof packages.$inferSelect;
export type PackageInsert = typeof packages.$inferInsert;
