import fs from 'node:fs';
import path from 'node:path';
import Database from 'better-sqlite3';
import { drizzle } from 'drizzle-orm/better-sqlite3';
import type { BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import { Limits, createLogger } from '@scopepack/common';
import * as schema from './schema/index.js';

const logger = createLogger('Store');

export const MEMORY_STORE = ':memory:';

export type DB = BetterSQLite3Database<typeof schema>;

export interface StoreOptions {
  readonly?: boolean;
  fileMustExist?: boolean;
}

export function storeExists(location: string): boolean {
  return location !== MEMORY_STORE && fs.existsSync(location);
}

/**
 * A single SQLite store file and its connection.
 *
 * Writes open a transaction lazily; nothing is durable until `commit()`.
 * Closing the store rolls back whatever was not committed.
 */
export class Store {
  private constructor(
    readonly location: string,
    readonly sqlite: Database.Database,
    readonly db: DB,
  ) {}

  static open(location: string, options: StoreOptions = {}): Store {
    if (location !== MEMORY_STORE && !options.readonly && !options.fileMustExist) {
      fs.mkdirSync(path.dirname(path.resolve(location)), { recursive: true });
    }

    const sqlite = new Database(location, {
      readonly: options.readonly ?? false,
      fileMustExist: options.fileMustExist ?? false,
    });

    sqlite.pragma(`busy_timeout = ${Limits.STORE_BUSY_TIMEOUT_MS}`);
    if (!options.readonly) {
      sqlite.pragma('foreign_keys = ON');
    }

    logger.debug({ location, readonly: options.readonly ?? false }, 'Store opened');
    return new Store(location, sqlite, drizzle(sqlite, { schema }));
  }

  get isOpen(): boolean {
    return this.sqlite.open;
  }

  get inTransaction(): boolean {
    return this.sqlite.inTransaction;
  }

  /** Start the write transaction if one is not already running. */
  beginWrite(): void {
    if (!this.sqlite.inTransaction) {
      this.sqlite.exec('BEGIN');
    }
  }

  commit(): void {
    if (this.sqlite.inTransaction) {
      this.sqlite.exec('COMMIT');
    }
  }

  rollback(): void {
    if (this.sqlite.inTransaction) {
      this.sqlite.exec('ROLLBACK');
    }
  }

  close(): void {
    if (!this.sqlite.open) return;
    this.rollback();
    this.sqlite.close();
    logger.debug({ location: this.location }, 'Store closed');
  }

  /**
   * Copy the whole store onto `destination`.
   * The copy is written beside the destination and renamed over it, so readers
   * see either the previous file or the complete new one.
   */
  async backupTo(destination: string): Promise<void> {
    const target = path.resolve(destination);
    const dir = path.dirname(target);
    await fs.promises.mkdir(dir, { recursive: true });

    const temp = path.join(dir, `.${path.basename(target)}.${process.pid}.${Date.now()}.tmp`);
    try {
      await this.sqlite.backup(temp);
      await fs.promises.rename(temp, target);
    } catch (error) {
      await fs.promises.rm(temp, { force: true });
      throw error;
    }

    logger.debug({ source: this.location, destination: target }, 'Store copied');
  }
}
