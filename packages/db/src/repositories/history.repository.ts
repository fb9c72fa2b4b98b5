import { desc, asc, eq, sql } from 'drizzle-orm';
import { createLogger } from '@scopepack/common';
import { BaseRepository } from './base.repository.js';
import { history } from '../schema/history.js';
import type { HistoryInsert, HistoryRow } from '../schema/history.js';
import { classifySQLiteError } from '../errors.js';

const logger = createLogger('HistoryRepository');

const rowid = sql<number>`rowid`;

/**
 * Audit log access. Rows are only ever appended; there is no update or delete.
 */
export class HistoryRepository extends BaseRepository {
  append(data: HistoryInsert): void {
    try {
      this.trackWrite('history.append', () => this.db.insert(history).values(data).run());
    } catch (error) {
      logger.error({ error, data }, 'Failed to append history entry');
      throw classifySQLiteError(error, {
        operation: 'append',
        table: 'history',
        data,
      });
    }
  }

  findRecent(limit = 100): HistoryRow[] {
    try {
      return this.trackQuery('history.findRecent', () =>
        this.db
          .select()
          .from(history)
          .orderBy(desc(history.date), desc(rowid))
          .limit(limit)
          .all(),
      );
    } catch (error) {
      logger.error({ error, limit }, 'Failed to find recent history');
      throw classifySQLiteError(error, {
        operation: 'findRecent',
        table: 'history',
        data: { limit },
      });
    }
  }

  findByContext(context: string): HistoryRow[] {
    try {
      return this.trackQuery('history.findByContext', () =>
        this.db
          .select()
          .from(history)
          .where(eq(history.context, context))
          .orderBy(asc(rowid))
          .all(),
      );
    } catch (error) {
      logger.error({ error, context }, 'Failed to find history by context');
      throw classifySQLiteError(error, {
        operation: 'findByContext',
        table: 'history',
        data: { context },
      });
    }
  }

  findAll(): HistoryRow[] {
    try {
      return this.trackQuery('history.findAll', () =>
        this.db.select().from(history).orderBy(asc(rowid)).all(),
      );
    } catch (error) {
      logger.error({ error }, 'Failed to find all history');
      throw classifySQLiteError(error, {
        operation: 'findAll',
        table: 'history',
      });
    }
  }
}
