import { createLogger } from '@scopepack/common';
import type { Solver } from '@scopepack/common';

const logger = createLogger('ValidationGateway');

export interface ValidationOutcome {
  ok: boolean;
  diagnostic?: string;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Asks the external solver whether a package set resolves.
 * Never throws: solver failures come back as `{ ok: false, diagnostic }`.
 */
export class ValidationGateway {
  constructor(private readonly solver: Solver) {}

  async validate(packages: readonly string[]): Promise<ValidationOutcome> {
    try {
      const result = await this.solver.solve([...packages]);
      if (result.solved) {
        return { ok: true };
      }

      const diagnostic =
        result.error !== undefined && describeError(result.error) !== ''
          ? describeError(result.error)
          : `Unable to resolve package set [${packages.join(', ')}]`;
      logger.warn({ packages, diagnostic }, 'Package set rejected by solver');
      return { ok: false, diagnostic };
    } catch (error) {
      logger.warn({ packages, error }, 'Solver failed');
      return { ok: false, diagnostic: describeError(error) };
    }
  }
}
