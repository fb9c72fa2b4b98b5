import pino from 'pino';

// Loggers created without an explicit level follow setLogLevel
const followers = new Set<pino.Logger>();
let configuredLevel: string | undefined;

export function createLogger(name: string, level?: string) {
  const logger = pino(
    {
      name,
      level: level ?? configuredLevel ?? process.env['LOG_LEVEL'] ?? 'info',
    },
    // stderr, so command output on stdout stays machine-readable
    pino.destination({ dest: 2, sync: true }),
  );
  if (level === undefined) followers.add(logger);
  return logger;
}

/**
 * Set the level of every logger created without an explicit level,
 * including ones created later.
 */
export function setLogLevel(level: string): void {
  configuredLevel = level;
  for (const logger of followers) {
    logger.level = level;
  }
}

export type Logger = pino.Logger;
