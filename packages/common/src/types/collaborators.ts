export interface SolveResult {
  solved: boolean;
  error?: Error | string;
}

/** External dependency resolver. Implementations must not mutate any store. */
export interface Solver {
  solve(packages: readonly string[]): Promise<SolveResult>;
}

export interface Identity {
  currentUser(): string;
}

export interface Clock {
  now(): Date;
}
