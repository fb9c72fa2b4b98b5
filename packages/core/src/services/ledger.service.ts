import {
  HistoryOperation,
  UnknownContextError,
  UnknownPackageError,
  UnresolvableSetError,
  createLogger,
} from '@scopepack/common';
import type { ContextTriple, PackageAxes } from '@scopepack/common';
import type { ContextRepository, PackageRepository } from '@scopepack/db';
import { ancestorChain, displayContext, normalizeAxis, normalizeContext } from '../context.js';
import type { ContextInput } from '../context.js';
import type { ValidationGateway } from './validation.service.js';
import type { EditRecorder } from './history-recorder.js';

const logger = createLogger('PackageLedger');

export interface LedgerOptions extends PackageAxes {
  /** Check the resulting package set with the solver. Defaults to true. */
  validate?: boolean;
}

type AxisPair = readonly [step: string | null, software: string | null];

/**
 * Axis combinations queried on every context, in override order:
 * unnarrowed entries first, then step, software, and both.
 */
function axisGroups(step: string | null, software: string | null): AxisPair[] {
  const groups: AxisPair[] = [[null, null]];
  if (step !== null) groups.push([step, null]);
  if (software !== null) groups.push([null, software]);
  if (step !== null && software !== null) groups.push([step, software]);
  return groups;
}

function dedupe<T>(values: readonly T[]): T[] {
  return [...new Set(values)];
}

export class PackageLedger {
  constructor(
    private readonly contextRepo: ContextRepository,
    private readonly packageRepo: PackageRepository,
    private readonly gateway: ValidationGateway,
    private readonly recorder: EditRecorder,
  ) {}

  /**
   * Merge the packages of every scope from the studio root down to `context`.
   * Broader scopes come first; a name keeps the position of its first occurrence.
   */
  resolvePackages(context: ContextInput, axes: PackageAxes = {}): string[] {
    const triple = normalizeContext(context);
    const groups = axisGroups(normalizeAxis(axes.step), normalizeAxis(axes.software));

    const contextIds = dedupe(
      ancestorChain(triple)
        .map((ancestor) => this.contextRepo.findId(ancestor))
        .filter((id): id is number => id !== undefined),
    );

    const names: string[] = [];
    for (const contextId of contextIds) {
      for (const [step, software] of groups) {
        names.push(...this.packageRepo.findNames(contextId, step, software));
      }
    }

    return dedupe(names);
  }

  async listPackages(context: ContextInput, options: LedgerOptions = {}): Promise<string[]> {
    const packages = this.resolvePackages(context, options);
    if (options.validate ?? true) {
      await this.assertSolvable(packages);
    }
    return packages;
  }

  /**
   * Install `name` on a scope, creating the scope if needed.
   * Nothing is written when validation rejects the resulting set.
   */
  async addPackage(context: ContextInput, name: string, options: LedgerOptions = {}): Promise<number> {
    const triple = normalizeContext(context);
    const step = normalizeAxis(options.step);
    const software = normalizeAxis(options.software);

    if (options.validate ?? true) {
      await this.assertSolvable([...this.resolvePackages(triple, { step, software }), name]);
    }

    const contextId = this.contextRepo.ensureId(triple);
    const entryId = this.packageRepo.insert({ contextId, name, step, software });
    this.record(triple, name, step, software, HistoryOperation.INSTALL);

    logger.debug({ context: triple, name, step, software, entryId }, 'Package added');
    return entryId;
  }

  /**
   * Remove the entry matching (scope, name, step, software) exactly.
   * Never creates a scope.
   */
  async removePackage(context: ContextInput, name: string, options: LedgerOptions = {}): Promise<void> {
    const triple = normalizeContext(context);
    const step = normalizeAxis(options.step);
    const software = normalizeAxis(options.software);

    const contextId = this.contextRepo.findId(triple);
    if (contextId === undefined) {
      throw new UnknownContextError(displayContext(triple));
    }

    const entryId = this.packageRepo.findEntryId({ contextId, name, step, software });
    if (entryId === undefined) {
      throw new UnknownPackageError(name, displayContext(triple));
    }

    if (options.validate ?? true) {
      const remaining = this.resolvePackages(triple, { step, software });
      const index = remaining.indexOf(name);
      if (index !== -1) remaining.splice(index, 1);
      await this.assertSolvable(remaining);
    }

    this.packageRepo.deleteEntry(entryId);
    this.record(triple, name, step, software, HistoryOperation.UNINSTALL);

    logger.debug({ context: triple, name, step, software, entryId }, 'Package removed');
  }

  /** Add each package in order; stops at the first failure. */
  async installPackages(
    context: ContextInput,
    names: readonly string[],
    options: LedgerOptions = {},
  ): Promise<number[]> {
    const entryIds: number[] = [];
    for (const name of names) {
      entryIds.push(await this.addPackage(context, name, options));
    }
    return entryIds;
  }

  /** Remove each package in order; stops at the first failure. */
  async uninstallPackages(
    context: ContextInput,
    names: readonly string[],
    options: LedgerOptions = {},
  ): Promise<void> {
    for (const name of names) {
      await this.removePackage(context, name, options);
    }
  }

  private async assertSolvable(packages: readonly string[]): Promise<void> {
    const outcome = await this.gateway.validate(packages);
    if (!outcome.ok) {
      throw new UnresolvableSetError(outcome.diagnostic ?? 'unknown solver failure', packages);
    }
  }

  private record(
    context: ContextTriple,
    packageName: string,
    step: string | null,
    software: string | null,
    operation: HistoryOperation,
  ): void {
    this.recorder.record({ context, packageName, step, software, operation });
  }
}
