import fs from 'node:fs';
import path from 'node:path';
import { DateTime } from 'luxon';
import {
  InvalidDeployDirectionError,
  SessionMode,
  UnsavedChangesError,
  createLogger,
} from '@scopepack/common';
import type { Clock, ResolverConfig } from '@scopepack/common';
import { Store } from '@scopepack/db';
import type { EditRecorder } from './history-recorder.js';

const logger = createLogger('DeploymentManager');

const BACKUP_EXTENSION = '.db';

export interface DeployResult {
  productionPath: string;
  /** Copy of the production store taken before promotion, when history is kept */
  backupPath: string | null;
}

/**
 * Sortable backup name: `yy_MM_dd_HH_mm_ss_ffffff` in local time.
 * Dates only carry milliseconds, so the last three digits are an offset used to
 * keep names unique within one millisecond.
 */
export function formatBackupTimestamp(date: Date, offsetMicros = 0): string {
  const micros = date.getMilliseconds() * 1000 + offsetMicros;
  return `${DateTime.fromJSDate(date).toFormat('yy_MM_dd_HH_mm_ss')}_${String(micros).padStart(6, '0')}`;
}

export class DeploymentManager {
  constructor(
    private readonly store: Store,
    private readonly mode: SessionMode,
    private readonly config: ResolverConfig,
    private readonly recorder: EditRecorder,
    private readonly clock: Clock,
  ) {}

  /**
   * Promote the staging store to production.
   * With `keepHistory`, production is first copied into the history folder; if that
   * copy fails, production is left untouched.
   */
  async deploy(): Promise<DeployResult> {
    if (this.mode !== SessionMode.STAGING) {
      throw new InvalidDeployDirectionError();
    }

    const pending = this.recorder.edits.length;
    if (pending > 0 || this.store.inTransaction) {
      throw new UnsavedChangesError(pending);
    }

    const backupPath = this.config.keepHistory ? await this.backupProduction() : null;

    await this.store.backupTo(this.config.productionDatabase);
    logger.info(
      { staging: this.store.location, production: this.config.productionDatabase, backupPath },
      'Staging configuration deployed to production',
    );

    return { productionPath: this.config.productionDatabase, backupPath };
  }

  /** Backup files in the history folder, oldest first. */
  listBackups(): string[] {
    if (!fs.existsSync(this.config.historyFolder)) return [];
    return fs
      .readdirSync(this.config.historyFolder)
      .filter((name) => name.endsWith(BACKUP_EXTENSION))
      .sort()
      .map((name) => path.join(this.config.historyFolder, name));
  }

  private async backupProduction(): Promise<string> {
    await fs.promises.mkdir(this.config.historyFolder, { recursive: true });
    const backupPath = this.nextBackupPath();

    // Opening creates an empty production store on first deploy
    const production = Store.open(this.config.productionDatabase);
    try {
      await production.backupTo(backupPath);
    } finally {
      production.close();
    }

    logger.info({ production: this.config.productionDatabase, backupPath }, 'Production store backed up');
    return backupPath;
  }

  private nextBackupPath(): string {
    const now = this.clock.now();
    let offset = 0;
    let candidate = path.join(this.config.historyFolder, formatBackupTimestamp(now) + BACKUP_EXTENSION);
    while (fs.existsSync(candidate) && offset < 999) {
      offset += 1;
      candidate = path.join(this.config.historyFolder, formatBackupTimestamp(now, offset) + BACKUP_EXTENSION);
    }
    return candidate;
  }
}
