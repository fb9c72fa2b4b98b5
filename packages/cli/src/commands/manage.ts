import { SessionMode } from '@scopepack/common';
import { displayContext, normalizeContext, withSession } from '@scopepack/core';
import { parseArgs } from '../lib/command-parser.js';
import type { OptionDef } from '../lib/command-parser.js';
import { confirm } from '../lib/confirm.js';
import { AXIS_OPTIONS, axesOf, contextLine } from './shared.js';
import type { CommandEnv } from './shared.js';

export const MANAGE_OPTIONS: readonly OptionDef[] = [
  { name: 'install', kind: 'list', aliases: ['i'] },
  { name: 'uninstall', kind: 'list', aliases: ['ui'] },
  { name: 'list', kind: 'flag', aliases: ['ls'] },
  { name: 'initialize', kind: 'flag', aliases: ['init'] },
  { name: 'deploy', kind: 'flag' },
  { name: 'force', kind: 'flag', aliases: ['f'] },
  { name: 'comment', kind: 'value', aliases: ['m'] },
  { name: 'contexts', kind: 'flag' },
  ...AXIS_OPTIONS,
];

/**
 * Edit the staging store: uninstall, then install, then save, then optionally deploy.
 * A cancelled prompt ends the command without saving anything.
 */
export async function runManage(argv: readonly string[], env: CommandEnv): Promise<number> {
  const args = parseArgs(argv, MANAGE_OPTIONS);
  const { io } = env;
  const force = args.flags.has('force');

  return withSession(env.config, { ...env.session, mode: SessionMode.STAGING }, async (session) => {
    if (args.flags.has('initialize')) {
      const approved = await confirm(
        io,
        `Initialize the staging store at ${session.location}? Existing entries are kept.`,
      );
      if (!approved) {
        io.out('Initialization cancelled by user.');
        return 0;
      }
      session.initialize();
      io.out('Staging store initialized.');
      return 0;
    }

    if (!session.exists()) {
      io.err(`Staging store ${session.location} is not initialized, run 'manage --initialize' first`);
      return 1;
    }

    const triple = normalizeContext(args.positionals);
    const axes = axesOf(args);
    const ledgerOptions = { ...axes, validate: !force };
    io.out(contextLine(triple, axes));

    if (args.flags.has('contexts')) {
      for (const row of session.contexts.findAll()) {
        io.out(`  ${displayContext([row.project, row.category, row.entity])}`);
      }
      return 0;
    }

    if (args.flags.has('list')) {
      const packages = await session.ledger.listPackages(triple, ledgerOptions);
      io.out(`Installed packages: ${packages.join(', ')}`);
      return 0;
    }

    const uninstall = args.lists.get('uninstall') ?? [];
    if (uninstall.length > 0) {
      if (!(await confirm(io, `Uninstall the following packages: ${uninstall.join(', ')}?`, force))) {
        io.out('Operation cancelled by user.');
        return 0;
      }
      await session.ledger.uninstallPackages(triple, uninstall, ledgerOptions);
      io.out(`Uninstalled: ${uninstall.join(', ')}`);
    }

    const install = args.lists.get('install') ?? [];
    if (install.length > 0) {
      if (!(await confirm(io, `Install the following packages: ${install.join(', ')}?`, force))) {
        io.out('Operation cancelled by user.');
        return 0;
      }
      await session.ledger.installPackages(triple, install, ledgerOptions);
      io.out(`Installed: ${install.join(', ')}`);
    }

    session.save({ comment: args.values.get('comment') ?? '' });

    if (args.flags.has('deploy')) {
      if (!(await confirm(io, 'Deploy the staging configuration to production?', force))) {
        io.out('Deployment cancelled by user.');
        return 0;
      }
      const result = await session.deploy();
      if (result.backupPath) {
        io.out(`Previous production saved to ${result.backupPath}`);
      }
      io.out(`Production configuration updated: ${result.productionPath}`);
    }

    return 0;
  });
}
