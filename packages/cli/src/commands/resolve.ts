import { SessionMode } from '@scopepack/common';
import { normalizeContext, storeLocation, withSession } from '@scopepack/core';
import { storeExists } from '@scopepack/db';
import { parseArgs } from '../lib/command-parser.js';
import type { OptionDef } from '../lib/command-parser.js';
import { AXIS_OPTIONS, axesOf, contextLine } from './shared.js';
import type { CommandEnv } from './shared.js';

export const RESOLVE_OPTIONS: readonly OptionDef[] = [
  ...AXIS_OPTIONS,
  { name: 'staging', kind: 'flag', aliases: ['stg'] },
];

/** Print the validated package list of a scope, from production unless --staging is set. */
export async function runResolve(argv: readonly string[], env: CommandEnv): Promise<number> {
  const args = parseArgs(argv, RESOLVE_OPTIONS);
  const { io } = env;
  const mode = args.flags.has('staging') ? SessionMode.STAGING : SessionMode.PRODUCTION;
  const location = storeLocation(env.config, mode);

  if (!storeExists(location)) {
    io.err(`Store not found: ${location}`);
    return 1;
  }

  return withSession(env.config, { ...env.session, mode }, async (session) => {
    if (!session.exists()) {
      io.err(`Store ${location} is not initialized`);
      return 1;
    }

    const triple = normalizeContext(args.positionals);
    const axes = axesOf(args);
    io.out(contextLine(triple, axes));

    const packages = await session.ledger.listPackages(triple, axes);
    io.out(`Installed packages: ${packages.join(', ')}`);
    return 0;
  });
}
