import { describe, it, expect } from 'vitest';
import {
  classifySQLiteError,
  ConstraintViolationError,
  DatabaseError,
  DatabaseLockedError,
  DiskIOError,
  ReadOnlyStoreError,
} from './errors.js';

function sqliteError(message: string, code: string): Error {
  return Object.assign(new Error(message), { code });
}

describe('classifySQLiteError', () => {
  it('should classify constraint codes', () => {
    const error = classifySQLiteError(
      sqliteError('FOREIGN KEY constraint failed', 'SQLITE_CONSTRAINT_FOREIGNKEY'),
      { table: 'package' },
    );

    expect(error).toBeInstanceOf(ConstraintViolationError);
    expect(error instanceof ConstraintViolationError && error.constraintType).toBe('FOREIGN_KEY');
    expect(error.context.table).toBe('package');
  });

  it('should classify lock codes', () => {
    expect(classifySQLiteError(sqliteError('database is locked', 'SQLITE_BUSY'))).toBeInstanceOf(
      DatabaseLockedError,
    );
  });

  it('should classify I/O codes', () => {
    expect(classifySQLiteError(sqliteError('disk I/O error', 'SQLITE_IOERR'))).toBeInstanceOf(DiskIOError);
  });

  it('should match extended result codes by their primary code', () => {
    expect(classifySQLiteError(sqliteError('disk I/O error', 'SQLITE_IOERR_WRITE'))).toBeInstanceOf(DiskIOError);

    const error = classifySQLiteError(sqliteError('NOT NULL constraint failed: package.name', 'SQLITE_CONSTRAINT_NOTNULL'));
    expect(error instanceof ConstraintViolationError && error.constraintType).toBe('NOT_NULL');
  });

  it('should classify writes to a read-only store', () => {
    const error = classifySQLiteError(sqliteError('attempt to write a readonly database', 'SQLITE_READONLY'), {
      operation: 'insert',
    });

    expect(error).toBeInstanceOf(ReadOnlyStoreError);
    expect(error.message).toBe('Store is read-only');
  });

  it('should fall back to the message', () => {
    const error = classifySQLiteError(new Error('UNIQUE constraint failed: context.project'));

    expect(error).toBeInstanceOf(ConstraintViolationError);
    expect(error instanceof ConstraintViolationError && error.constraintType).toBe('UNIQUE');
  });

  it('should keep an already classified error', () => {
    const original = new DiskIOError('disk full');

    expect(classifySQLiteError(original)).toBe(original);
  });

  it('should wrap unknown failures', () => {
    const error = classifySQLiteError('boom', { operation: 'insert' });

    expect(error).toBeInstanceOf(DatabaseError);
    expect(error.message).toBe('boom');
    expect(error.context).toEqual({ operation: 'insert', cause: 'boom' });
  });
});
