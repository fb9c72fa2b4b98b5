export interface DatabaseErrorContext {
  operation?: string;
  table?: string;
  data?: unknown;
  cause?: unknown;
}

export type ConstraintType = 'UNIQUE' | 'FOREIGN_KEY' | 'CHECK' | 'NOT_NULL' | 'UNKNOWN';

/** A storage failure, tagged with the repository operation that hit it. */
export class DatabaseError extends Error {
  constructor(
    message: string,
    readonly context: DatabaseErrorContext = {},
  ) {
    super(message);
    this.name = 'DatabaseError';
  }
}

export class ConstraintViolationError extends DatabaseError {
  constructor(
    message: string,
    readonly constraintType: ConstraintType,
    context: DatabaseErrorContext = {},
  ) {
    super(message, context);
    this.name = 'ConstraintViolationError';
  }
}

export class DatabaseLockedError extends DatabaseError {
  constructor(context: DatabaseErrorContext = {}) {
    super('Store is locked by another connection', context);
    this.name = 'DatabaseLockedError';
  }
}

export class DiskIOError extends DatabaseError {
  constructor(message: string, context: DatabaseErrorContext = {}) {
    super(message, context);
    this.name = 'DiskIOError';
  }
}

/** A write reached a store opened read-only, such as a production store. */
export class ReadOnlyStoreError extends DatabaseError {
  constructor(context: DatabaseErrorContext = {}) {
    super('Store is read-only', context);
    this.name = 'ReadOnlyStoreError';
  }
}

type ErrorKind = 'constraint' | 'locked' | 'io' | 'readonly';

// Extended result codes share their primary code as a prefix (SQLITE_IOERR_WRITE, ...)
const PRIMARY_CODES: ReadonlyArray<readonly [prefix: string, kind: ErrorKind]> = [
  ['SQLITE_CONSTRAINT', 'constraint'],
  ['SQLITE_BUSY', 'locked'],
  ['SQLITE_LOCKED', 'locked'],
  ['SQLITE_READONLY', 'readonly'],
  ['SQLITE_IOERR', 'io'],
  ['SQLITE_CORRUPT', 'io'],
  ['SQLITE_FULL', 'io'],
  ['SQLITE_CANTOPEN', 'io'],
];

const CONSTRAINT_PATTERNS: ReadonlyArray<readonly [pattern: RegExp, type: ConstraintType]> = [
  [/UNIQUE|PRIMARYKEY/i, 'UNIQUE'],
  [/FOREIGN ?KEY/i, 'FOREIGN_KEY'],
  [/CHECK/i, 'CHECK'],
  [/NOT ?NULL/i, 'NOT_NULL'],
];

const MESSAGE_PATTERNS: ReadonlyArray<readonly [pattern: RegExp, kind: ErrorKind]> = [
  [/constraint failed/i, 'constraint'],
  [/database is locked|database table is locked/i, 'locked'],
  [/readonly database/i, 'readonly'],
  [/disk i\/o error|disk image is malformed|database or disk is full/i, 'io'],
];

function sqliteErrorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function kindOf(code: string | undefined, message: string): ErrorKind | undefined {
  if (code !== undefined) {
    const byCode = PRIMARY_CODES.find(([prefix]) => code.startsWith(prefix));
    if (byCode) return byCode[1];
  }
  return MESSAGE_PATTERNS.find(([pattern]) => pattern.test(message))?.[1];
}

function constraintTypeOf(code: string | undefined, message: string): ConstraintType {
  const source = code && code !== 'SQLITE_CONSTRAINT' ? code : message;
  return CONSTRAINT_PATTERNS.find(([pattern]) => pattern.test(source))?.[1] ?? 'UNKNOWN';
}

/**
 * Map a better-sqlite3 failure onto the DatabaseError family.
 * The SQLite result code decides when present; the message is the fallback.
 */
export function classifySQLiteError(error: unknown, context: DatabaseErrorContext = {}): DatabaseError {
  if (error instanceof DatabaseError) return error;

  const message = error instanceof Error ? error.message : String(error);
  const code = sqliteErrorCode(error);
  const withCause: DatabaseErrorContext = { ...context, cause: error };

  switch (kindOf(code, message)) {
    case 'constraint':
      return new ConstraintViolationError(message, constraintTypeOf(code, message), withCause);
    case 'locked':
      return new DatabaseLockedError(withCause);
    case 'readonly':
      return new ReadOnlyStoreError(withCause);
    case 'io':
      return new DiskIOError(message, withCause);
    case undefined:
      return new DatabaseError(message, withCause);
  }
}
