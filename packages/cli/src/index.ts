import { createLogger, isScopepackError, loadConfig, setLogLevel } from '@scopepack/common';
import type { ResolverConfig } from '@scopepack/common';
import { DatabaseError } from '@scopepack/db';
import { runHistory } from './commands/history.js';
import { runManage } from './commands/manage.js';
import { runResolve } from './commands/resolve.js';
import type { CommandEnv } from './commands/shared.js';
import type { CliIO } from './lib/io.js';

const logger = createLogger('cli');

export const USAGE = `Usage: scopepack <command> [context...] [options]

Commands:
  manage   Edit the staging store
             -i, --install <pkg...>     -ui, --uninstall <pkg...>
             -ls, --list                -init, --initialize
             --deploy                   --contexts
             -s, --step <step>          -sw, --software <software>
             -m, --comment <text>       -f, --force
  resolve  Print the validated package list of a context (it does not start a shell)
             -s, --step <step>          -sw, --software <software>
             -stg, --staging
  history  Print recent audit entries, only those of [context...] when given
             -n, --limit <count>        -stg, --staging`;

export interface RunOptions extends Omit<CommandEnv, 'config'> {
  /** Defaults to the configuration read from the environment. */
  config?: ResolverConfig;
}

function reportError(io: CliIO, error: unknown): number {
  if (isScopepackError(error) || error instanceof DatabaseError) {
    io.err(`Error: ${error.message}`);
    return 1;
  }
  logger.error({ error }, 'Command failed');
  io.err(`Error: ${error instanceof Error ? error.message : String(error)}`);
  return 1;
}

/** Run one command line and return the process exit code. */
export async function run(argv: readonly string[], options: RunOptions): Promise<number> {
  const [command, ...rest] = argv;
  const { io } = options;

  try {
    const env: CommandEnv = { ...options, config: options.config ?? loadConfig() };
    setLogLevel(env.config.logLevel);

    switch (command) {
      case 'manage':
        return await runManage(rest, env);
      case 'resolve':
        return await runResolve(rest, env);
      case 'history':
        return await runHistory(rest, env);
      case 'help':
      case '--help':
      case '-h':
        io.out(USAGE);
        return 0;
      case undefined:
        io.err(USAGE);
        return 1;
      default:
        io.err(`Unknown command: ${command}`);
        io.err(USAGE);
        return 1;
    }
  } catch (error) {
    return reportError(io, error);
  }
}

export { consoleIO } from './lib/io.js';
export type { CliIO } from './lib/io.js';
export { parseArgs, UsageError } from './lib/command-parser.js';
export type { OptionDef, ParsedArgs } from './lib/command-parser.js';
export { isAffirmative } from './lib/confirm.js';
