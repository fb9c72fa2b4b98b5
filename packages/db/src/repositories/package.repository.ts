import { and, eq, sql } from 'drizzle-orm';
import { createLogger } from '@scopepack/common';
import { BaseRepository } from './base.repository.js';
import { matchNullable } from './conditions.js';
import { packages } from '../schema/packages.js';
import type { PackageInsert } from '../schema/packages.js';
import { classifySQLiteError } from '../errors.js';

const logger = createLogger('PackageRepository');

const rowid = sql<number>`rowid`;

export interface PackageKey {
  contextId: number;
  name: string;
  step: string | null;
  software: string | null;
}

export class PackageRepository extends BaseRepository {
  /**
   * Names of the packages stored on one context for an exact (step, software) pair,
   * in insertion order.
   */
  findNames(contextId: number, step: string | null, software: string | null): string[] {
    try {
      const rows = this.trackQuery('package.findNames', () =>
        this.db
          .select({ name: packages.name })
          .from(packages)
          .where(
            and(
              eq(packages.contextId, contextId),
              matchNullable(packages.step, step),
              matchNullable(packages.software, software),
            ),
          )
          .orderBy(rowid)
          .all(),
      );
      return rows.map((row) => row.name);
    } catch (error) {
      logger.error({ error, contextId, step, software }, 'Failed to find packages');
      throw classifySQLiteError(error, {
        operation: 'findNames',
        table: 'package',
        data: { contextId, step, software },
      });
    }
  }

  /**
   * Row id of the first entry matching the full key, if any
   */
  findEntryId(key: PackageKey): number | undefined {
    try {
      const row = this.trackQuery('package.findEntryId', () =>
        this.db
          .select({ rowid })
          .from(packages)
          .where(
            and(
              eq(packages.name, key.name),
              eq(packages.contextId, key.contextId),
              matchNullable(packages.step, key.step),
              matchNullable(packages.software, key.software),
            ),
          )
          .orderBy(rowid)
          .get(),
      );
      return row?.rowid;
    } catch (error) {
      logger.error({ error, key }, 'Failed to find package entry');
      throw classifySQLiteError(error, {
        operation: 'findEntryId',
        table: 'package',
        data: key,
      });
    }
  }

  insert(data: PackageInsert): number {
    try {
      const result = this.trackWrite('package.insert', () =>
        this.db.insert(packages).values(data).run(),
      );
      return Number(result.lastInsertRowid);
    } catch (error) {
      logger.error({ error, data }, 'Failed to insert package');
      throw classifySQLiteError(error, {
        operation: 'insert',
        table: 'package',
        data,
      });
    }
  }

  deleteEntry(entryId: number): boolean {
    try {
      const result = this.trackWrite('package.deleteEntry', () =>
        this.db.delete(packages).where(eq(rowid, entryId)).run(),
      );
      return result.changes > 0;
    } catch (error) {
      logger.error({ error, entryId }, 'Failed to delete package');
      throw classifySQLiteError(error, {
        operation: 'deleteEntry',
        table: 'package',
        data: { entryId },
      });
    }
  }
}
