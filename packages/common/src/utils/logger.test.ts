import { describe, it, expect, afterEach } from 'vitest';
import { createLogger, setLogLevel } from './logger.js';

describe('setLogLevel', () => {
  afterEach(() => {
    setLogLevel('silent');
  });

  it('should update existing and future loggers', () => {
    const early = createLogger('early');

    setLogLevel('debug');

    expect(early.level).toBe('debug');
    expect(createLogger('late').level).toBe('debug');
  });

  it('should leave loggers with an explicit level alone', () => {
    const pinned = createLogger('pinned', 'warn');

    setLogLevel('error');

    expect(pinned.level).toBe('warn');
  });
});
