import { sqliteTable, text, integer } from 'drizzle-orm/sqlite-core';

/**
 * Scope hierarchy: studio (all null) ⊃ project ⊃ category ⊃ entity.
 * Uniqueness of the triple is enforced by an expression index created in pushSchema.
 */
export const contexts = sqliteTable('context', {
  contextId: integer('context_id').primaryKey({ autoIncrement: true }),
  project: text('project'),
  category: text('category'),
  entity: text('entity'),
});

export type ContextRow = typeof contexts.$inferSelect;
export type ContextInsert = typeof contexts.$inferInsert;
