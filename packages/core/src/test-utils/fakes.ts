import type { Clock, Identity, Solver, SolveResult } from '@scopepack/common';

/**
 * Solver double that records every call. Sets containing a rejected name fail.
 */
export class FakeSolver implements Solver {
  readonly calls: string[][] = [];
  private readonly rejected = new Set<string>();

  reject(...names: string[]): this {
    names.forEach((name) => this.rejected.add(name));
    return this;
  }

  async solve(packages: readonly string[]): Promise<SolveResult> {
    this.calls.push([...packages]);
    const conflict = packages.find((name) => this.rejected.has(name));
    return conflict === undefined
      ? { solved: true }
      : { solved: false, error: `conflict on ${conflict}` };
  }
}

export const fixedIdentity: Identity = {
  currentUser: () => 'tester',
};

/** Clock returning `start`, then one second later on every call. */
export function steppingClock(start: Date): Clock {
  let calls = 0;
  return {
    now: () => new Date(start.getTime() + 1000 * calls++),
  };
}
