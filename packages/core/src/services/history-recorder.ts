import { createLogger } from '@scopepack/common';
import type { Clock, HistoryEdit, Identity } from '@scopepack/common';
import type { HistoryRepository, Store } from '@scopepack/db';
import { formatContext } from '../context.js';

const logger = createLogger('EditRecorder');

export interface SaveOptions {
  /** Write the buffered edits to the audit log before committing. Defaults to true. */
  flushToLog?: boolean;
  comment?: string;
}

/**
 * Buffers the edits of a session until `save()`, which writes them to the audit log
 * and commits the store.
 */
export class EditRecorder {
  private buffer: HistoryEdit[] = [];

  constructor(
    private readonly store: Store,
    private readonly historyRepo: HistoryRepository,
    private readonly identity: Identity,
    private readonly clock: Clock,
  ) {}

  get edits(): readonly HistoryEdit[] {
    return [...this.buffer];
  }

  record(edit: HistoryEdit): void {
    this.buffer.push(edit);
  }

  /** Drop pending edits without writing them anywhere. */
  discard(): void {
    this.buffer = [];
  }

  save(options: SaveOptions = {}): void {
    const flushToLog = options.flushToLog ?? true;
    const comment = options.comment ?? '';
    const total = this.buffer.length;

    if (flushToLog && total > 0) {
      const user = this.identity.currentUser();
      this.buffer.forEach((edit, index) => {
        this.historyRepo.append({
          user,
          context: formatContext(edit.context),
          packageName: edit.packageName,
          step: edit.step ?? '',
          software: edit.software ?? '',
          operation: edit.operation,
          date: this.clock.now().toISOString(),
          comment: `${comment}(${index + 1}/${total})`,
        });
      });
    }

    this.buffer = [];
    this.store.commit();
    logger.info({ edits: total, logged: flushToLog ? total : 0 }, 'Session saved');
  }
}
