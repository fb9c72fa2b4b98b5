export { Store, storeExists, MEMORY_STORE } from './store.js';
export type { DB, StoreOptions } from './store.js';
export { pushSchema } from './migrate.js';

// Schema
export { contexts, packages, history } from './schema/index.js';
export type {
  ContextRow,
  ContextInsert,
  PackageRow,
  PackageInsert,
  HistoryRow,
  HistoryInsert,
} from './schema/index.js';

// Repositories
export {
  BaseRepository,
  ContextRepository,
  PackageRepository,
  HistoryRepository,
} from './repositories/index.js';
export type { PackageKey } from './repositories/index.js';

// Errors
export {
  DatabaseError,
  ConstraintViolationError,
  DatabaseLockedError,
  DiskIOError,
  ReadOnlyStoreError,
  classifySQLiteError,
} from './errors.js';
export type { DatabaseErrorContext, ConstraintType } from './errors.js';
