import { Limits, createLogger } from '@scopepack/common';
import type { Store, DB } from '../store.js';

const logger = createLogger('Repository');

export abstract class BaseRepository {
  constructor(protected readonly store: Store) {}

  protected get db(): DB {
    return this.store.db;
  }

  /**
   * Time a query and report it when it runs slow
   */
  protected trackQuery<T>(operation: string, fn: () => T): T {
    const startTime = Date.now();
    try {
      return fn();
    } finally {
      const duration = Date.now() - startTime;
      if (duration > Limits.SLOW_QUERY_MS) {
        logger.warn({ operation, duration, location: this.store.location }, 'Slow query');
      } else {
        logger.trace({ operation, duration }, 'Query completed');
      }
    }
  }

  /**
   * Run a write inside the store's pending transaction
   */
  protected trackWrite<T>(operation: string, fn: () => T): T {
    this.store.beginWrite();
    return this.trackQuery(operation, fn);
  }
}
