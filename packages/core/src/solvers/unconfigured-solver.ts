import type { Solver, SolveResult } from '@scopepack/common';

export const UNCONFIGURED_SOLVER_MESSAGE =
  'No solver command configured; set SCOPEPACK_SOLVER_COMMAND or pass --force to skip validation';

/** Rejects every set so that validation cannot pass by accident. */
export class UnconfiguredSolver implements Solver {
  async solve(): Promise<SolveResult> {
    return { solved: false, error: UNCONFIGURED_SOLVER_MESSAGE };
  }
}
