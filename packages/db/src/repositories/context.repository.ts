import { and, asc } from 'drizzle-orm';
import { createLogger } from '@scopepack/common';
import type { ContextTriple } from '@scopepack/common';
import { BaseRepository } from './base.repository.js';
import { matchNullable } from './conditions.js';
import { contexts } from '../schema/contexts.js';
import type { ContextRow } from '../schema/contexts.js';
import { classifySQLiteError } from '../errors.js';

const logger = createLogger('ContextRepository');

export class ContextRepository extends BaseRepository {
  /**
   * Exact lookup of a context triple
   */
  findId(triple: ContextTriple): number | undefined {
    const [project, category, entity] = triple;
    try {
      const row = this.trackQuery('context.findId', () =>
        this.db
          .select({ contextId: contexts.contextId })
          .from(contexts)
          .where(
            and(
              matchNullable(contexts.project, project),
              matchNullable(contexts.category, category),
              matchNullable(contexts.entity, entity),
            ),
          )
          .orderBy(asc(contexts.contextId))
          .get(),
      );
      return row?.contextId;
    } catch (error) {
      logger.error({ error, triple }, 'Failed to find context');
      throw classifySQLiteError(error, {
        operation: 'findId',
        table: 'context',
        data: { triple },
      });
    }
  }

  /**
   * Insert a new context row. Fails with a constraint violation if the triple already exists.
   */
  insert(triple: ContextTriple): number {
    const [project, category, entity] = triple;
    try {
      const row = this.trackWrite('context.insert', () =>
        this.db
          .insert(contexts)
          .values({ project, category, entity })
          .returning({ contextId: contexts.contextId })
          .get(),
      );
      logger.debug({ triple, contextId: row.contextId }, 'Context created');
      return row.contextId;
    } catch (error) {
      logger.error({ error, triple }, 'Failed to insert context');
      throw classifySQLiteError(error, {
        operation: 'insert',
        table: 'context',
        data: { triple },
      });
    }
  }

  ensureId(triple: ContextTriple): number {
    return this.findId(triple) ?? this.insert(triple);
  }

  findAll(): ContextRow[] {
    try {
      return this.trackQuery('context.findAll', () =>
        this.db.select().from(contexts).orderBy(asc(contexts.contextId)).all(),
      );
    } catch (error) {
      logger.error({ error }, 'Failed to list contexts');
      throw classifySQLiteError(error, {
        operation: 'findAll',
        table: 'context',
      });
    }
  }
}
