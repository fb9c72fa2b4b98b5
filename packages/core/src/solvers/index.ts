import type { ResolverConfig, Solver } from '@scopepack/common';
import { CommandSolver } from './command-solver.js';
import { UnconfiguredSolver } from './unconfigured-solver.js';

export { CommandSolver } from './command-solver.js';
export type { CommandRunner } from './command-solver.js';
export { UnconfiguredSolver, UNCONFIGURED_SOLVER_MESSAGE } from './unconfigured-solver.js';

export function createSolver(config: ResolverConfig): Solver {
  return config.solverCommand ? CommandSolver.fromCommandLine(config.solverCommand) : new UnconfiguredSolver();
}
