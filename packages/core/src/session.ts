import { SessionMode, createLogger } from '@scopepack/common';
import type { Clock, HistoryEdit, Identity, ResolverConfig, Solver } from '@scopepack/common';
import {
  ContextRepository,
  HistoryRepository,
  PackageRepository,
  Store,
  pushSchema,
} from '@scopepack/db';
import { systemClock, systemIdentity } from './collaborators.js';
import { createSolver } from './solvers/index.js';
import { ValidationGateway } from './services/validation.service.js';
import { EditRecorder } from './services/history-recorder.js';
import type { SaveOptions } from './services/history-recorder.js';
import { PackageLedger } from './services/ledger.service.js';
import { DeploymentManager } from './services/deploy.service.js';
import type { DeployResult } from './services/deploy.service.js';

const logger = createLogger('ConfigSession');

export interface SessionOptions {
  mode: SessionMode;
  /** Defaults to the solver described by `config.solverCommand` */
  solver?: Solver;
  identity?: Identity;
  clock?: Clock;
}

export function storeLocation(config: ResolverConfig, mode: SessionMode): string {
  return mode === SessionMode.PRODUCTION ? config.productionDatabase : config.stagingDatabase;
}

/**
 * One open connection to the staging or production store, with the services that act on it.
 *
 * Production stores are opened read-only: they only change through `deploy()` from a
 * staging session.
 *
 * @example
 * ```typescript
 * await withSession(config, { mode: SessionMode.STAGING }, async (session) => {
 *   await session.ledger.addPackage(['show', 'assets'], 'maya-2024');
 *   session.save({ comment: 'maya upgrade' });
 *   await session.deploy();
 * });
 * ```
 */
export class ConfigSession {
  readonly contexts: ContextRepository;
  readonly packages: PackageRepository;
  readonly history: HistoryRepository;
  readonly gateway: ValidationGateway;
  readonly recorder: EditRecorder;
  readonly ledger: PackageLedger;
  readonly deployment: DeploymentManager;

  private constructor(
    readonly config: ResolverConfig,
    readonly mode: SessionMode,
    readonly store: Store,
    options: SessionOptions & { solver: Solver },
  ) {
    const clock = options.clock ?? systemClock;

    this.contexts = new ContextRepository(store);
    this.packages = new PackageRepository(store);
    this.history = new HistoryRepository(store);
    this.gateway = new ValidationGateway(options.solver);
    this.recorder = new EditRecorder(store, this.history, options.identity ?? systemIdentity, clock);
    this.ledger = new PackageLedger(this.contexts, this.packages, this.gateway, this.recorder);
    this.deployment = new DeploymentManager(store, mode, config, this.recorder, clock);
  }

  static open(config: ResolverConfig, options: SessionOptions): ConfigSession {
    // Before Store.open: a malformed solver command leaves no connection behind
    const solver = options.solver ?? createSolver(config);
    const location = storeLocation(config, options.mode);
    const store =
      options.mode === SessionMode.PRODUCTION
        ? Store.open(location, { readonly: true, fileMustExist: true })
        : Store.open(location);

    try {
      const session = new ConfigSession(config, options.mode, store, { ...options, solver });
      logger.debug({ location, mode: options.mode }, 'Session opened');
      return session;
    } catch (error) {
      store.close();
      throw error;
    }
  }

  get location(): string {
    return this.store.location;
  }

  get edits(): readonly HistoryEdit[] {
    return this.recorder.edits;
  }

  /** Whether the store has been initialized with the resolver schema. */
  exists(): boolean {
    const row = this.store.sqlite
      .prepare("SELECT 1 FROM sqlite_master WHERE type = 'table' AND name = 'context'")
      .get();
    return row !== undefined;
  }

  /** Create the tables and the studio root. Existing data is kept. */
  initialize(): void {
    this.store.beginWrite();
    pushSchema(this.store.db);
    this.store.commit();
    logger.info({ location: this.location }, 'Store initialized');
  }

  save(options: SaveOptions = {}): void {
    this.recorder.save(options);
  }

  deploy(): Promise<DeployResult> {
    return this.deployment.deploy();
  }

  /** Roll back anything unsaved and release the connection. */
  close(): void {
    const discarded = this.recorder.edits.length;
    this.recorder.discard();
    this.store.close();
    if (discarded > 0) {
      logger.warn({ location: this.location, discarded }, 'Session closed with unsaved edits');
    }
  }
}

/**
 * Open a session, run `fn`, and close the session however `fn` ends.
 */
export async function withSession<T>(
  config: ResolverConfig,
  options: SessionOptions,
  fn: (session: ConfigSession) => T | Promise<T>,
): Promise<T> {
  const session = ConfigSession.open(config, options);
  try {
    return await fn(session);
  } finally {
    session.close();
  }
}
