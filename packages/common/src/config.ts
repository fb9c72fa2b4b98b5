import os from 'node:os';
import path from 'node:path';
import { resolverSettingsSchema } from './schemas/config.js';
import type { ResolverSettings } from './schemas/config.js';
import { ConfigurationError } from './utils/errors.js';

export const DEFAULT_PRODUCTION_DATABASE = '~/packages/prod.sqlite3';

export interface ResolverConfig {
  readonly productionDatabase: string;
  readonly stagingDatabase: string;
  readonly historyFolder: string;
  readonly keepHistory: boolean;
  readonly solverCommand: string | null;
  readonly logLevel: string;
}

type Env = Record<string, string | undefined>;

function optionalEnv(env: Env, name: string): string | undefined {
  const val = env[name];
  return val === undefined || val === '' ? undefined : val;
}

function optionalBoolEnv(env: Env, name: string, fallback: boolean): boolean {
  const val = optionalEnv(env, name);
  if (val === undefined) return fallback;
  return val.toLowerCase() === 'true' || val === '1';
}

export function expandHome(location: string): string {
  if (location === '~') return os.homedir();
  if (location.startsWith('~/')) return path.join(os.homedir(), location.slice(2));
  return location;
}

/**
 * Build an immutable configuration from explicit settings.
 * Staging and history locations default to siblings of the production store.
 */
export function createConfig(settings: ResolverSettings): ResolverConfig {
  const parsed = resolverSettingsSchema.safeParse(settings);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || 'settings'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid resolver configuration: ${detail}`);
  }

  const productionDatabase = path.resolve(expandHome(parsed.data.productionDatabase));
  const productionDir = path.dirname(productionDatabase);

  return Object.freeze({
    productionDatabase,
    stagingDatabase: parsed.data.stagingDatabase
      ? path.resolve(expandHome(parsed.data.stagingDatabase))
      : path.join(productionDir, `staging.${path.basename(productionDatabase)}`),
    historyFolder: parsed.data.historyFolder
      ? path.resolve(expandHome(parsed.data.historyFolder))
      : path.join(productionDir, 'history'),
    keepHistory: parsed.data.keepHistory,
    solverCommand: parsed.data.solverCommand ?? null,
    logLevel: parsed.data.logLevel,
  });
}

export function loadConfig(env: Env = process.env): ResolverConfig {
  return createConfig({
    productionDatabase: optionalEnv(env, 'SCOPEPACK_PRODUCTION_DATABASE') ?? DEFAULT_PRODUCTION_DATABASE,
    stagingDatabase: optionalEnv(env, 'SCOPEPACK_STAGING_DATABASE'),
    historyFolder: optionalEnv(env, 'SCOPEPACK_HISTORY_FOLDER'),
    keepHistory: optionalBoolEnv(env, 'SCOPEPACK_KEEP_HISTORY', true),
    solverCommand: optionalEnv(env, 'SCOPEPACK_SOLVER_COMMAND'),
    logLevel: optionalEnv(env, 'LOG_LEVEL'),
  });
}
