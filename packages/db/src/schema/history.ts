import { sqliteTable, text, integer } from 'drizzle-orm/sqlite-core';

/** Append-only audit log of every saved edit. */
export const history = sqliteTable('history', {
  user: text('user').notNull(),
  context: text('context').notNull(), // comma-joined non-null levels
  packageName: text('package_name').notNull(),
  step: text('step').notNull(), // '' when absent
  software: text('software').notNull(), // '' when absent
  operation: integer('operation').notNull(), // 1 = install, 2 = uninstall
  date: text('date').notNull(),
  comment: text('comment').notNull(),
});

export type HistoryRow = typeof history.$inferSelect;
export type HistoryInsert = typeof history.$inferInsert;
