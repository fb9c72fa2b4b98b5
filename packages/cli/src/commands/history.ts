import { HISTORY_OPERATION_LABELS, HistoryOperation, Limits, SessionMode } from '@scopepack/common';
import { formatContext, normalizeContext, storeLocation, withSession } from '@scopepack/core';
import { storeExists } from '@scopepack/db';
import type { HistoryRow } from '@scopepack/db';
import { parseArgs, parsePositiveInt } from '../lib/command-parser.js';
import type { OptionDef } from '../lib/command-parser.js';
import type { CommandEnv } from './shared.js';

export const HISTORY_OPTIONS: readonly OptionDef[] = [
  { name: 'limit', kind: 'value', aliases: ['n'] },
  { name: 'staging', kind: 'flag', aliases: ['stg'] },
];

function isHistoryOperation(value: number): value is HistoryOperation {
  return Object.values(HistoryOperation).some((op) => op === value);
}

export function formatHistoryRow(row: HistoryRow): string {
  const label = isHistoryOperation(row.operation)
    ? HISTORY_OPERATION_LABELS[row.operation]
    : `op${row.operation}`;
  return [
    row.date,
    row.user,
    label,
    row.packageName,
    `[${row.context || 'studio'}]`,
    `step=${row.step || '-'}`,
    `software=${row.software || '-'}`,
    row.comment,
  ].join(' ');
}

/** Print the most recent audit rows, newest first, optionally for one exact context. */
export async function runHistory(argv: readonly string[], env: CommandEnv): Promise<number> {
  const args = parseArgs(argv, HISTORY_OPTIONS);
  const { io } = env;
  const rawLimit = args.values.get('limit');
  const limit = rawLimit === undefined ? Limits.DEFAULT_HISTORY_LIMIT : parsePositiveInt(rawLimit, 'limit');
  const context = args.positionals.length > 0 ? formatContext(normalizeContext(args.positionals)) : null;
  const mode = args.flags.has('staging') ? SessionMode.STAGING : SessionMode.PRODUCTION;
  const location = storeLocation(env.config, mode);

  if (!storeExists(location)) {
    io.err(`Store not found: ${location}`);
    return 1;
  }

  return withSession(env.config, { ...env.session, mode }, (session) => {
    if (!session.exists()) {
      io.err(`Store ${location} is not initialized`);
      return 1;
    }

    const rows =
      context === null
        ? session.history.findRecent(limit)
        : session.history.findByContext(context).reverse().slice(0, limit);
    if (rows.length === 0) {
      io.out('No history recorded.');
    }
    for (const row of rows) {
      io.out(formatHistoryRow(row));
    }
    return 0;
  });
}
