import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import { ConfigurationError, tokenize } from '@scopepack/common';
import type { Solver, SolveResult } from '@scopepack/common';

const execFileAsync = promisify(execFile);

/** Runs a program; resolves on exit code 0 and rejects otherwise. */
export type CommandRunner = (file: string, args: readonly string[]) => Promise<unknown>;

const runCommand: CommandRunner = (file, args) => execFileAsync(file, [...args]);

function commandDiagnostic(error: unknown): string {
  if (
    typeof error === 'object' &&
    error !== null &&
    'stderr' in error &&
    typeof error.stderr === 'string' &&
    error.stderr.trim() !== ''
  ) {
    return error.stderr.trim();
  }
  return error instanceof Error ? error.message : String(error);
}

/**
 * Delegates resolution to an external command, e.g. `pkg-solve --check`.
 * The package names are appended to the command's arguments.
 */
export class CommandSolver implements Solver {
  constructor(
    private readonly argv: readonly string[],
    private readonly run: CommandRunner = runCommand,
  ) {
    if (argv.length === 0) {
      throw new ConfigurationError('Solver command is empty');
    }
  }

  static fromCommandLine(commandLine: string, run?: CommandRunner): CommandSolver {
    return new CommandSolver(tokenize(commandLine), run);
  }

  async solve(packages: readonly string[]): Promise<SolveResult> {
    const [file = '', ...args] = this.argv;
    try {
      await this.run(file, [...args, ...packages]);
      return { solved: true };
    } catch (error) {
      return { solved: false, error: commandDiagnostic(error) };
    }
  }
}
