import { InvalidContextError, Limits } from '@scopepack/common';
import type { ContextLevel, ContextTriple } from '@scopepack/common';

/** Scope levels as callers supply them: any prefix of (project, category, entity). */
export type ContextInput = readonly (string | null | undefined)[];

export const STUDIO: ContextTriple = [null, null, null];

function toLevel(value: string | null | undefined): ContextLevel {
  return value === undefined || value === null || value === '' ? null : value;
}

/**
 * Pad a scope path to (project, category, entity).
 * Empty levels become null; a level below an unset level is rejected.
 *
 * @example normalizeContext(['show']) // ['show', null, null]
 */
export function normalizeContext(levels: ContextInput): ContextTriple {
  if (levels.length > Limits.MAX_CONTEXT_LEVELS) {
    throw new InvalidContextError(
      `A context can only have 0 to ${Limits.MAX_CONTEXT_LEVELS} levels, got ${levels.length}`,
    );
  }

  const [project = null, category = null, entity = null] = levels.map(toLevel);

  if ((project === null && category !== null) || (category === null && entity !== null)) {
    throw new InvalidContextError(
      `Context levels must be set in order (project, category, entity), got [${levels.join(', ')}]`,
    );
  }

  return [project, category, entity];
}

/**
 * Scopes consulted when resolving `triple`, broadest first: the studio root,
 * then each requested level.
 */
export function ancestorChain(triple: ContextTriple): ContextTriple[] {
  const [project, category, entity] = triple;
  const chain: ContextTriple[] = [STUDIO];

  if (project !== null) chain.push([project, null, null]);
  if (category !== null) chain.push([project, category, null]);
  if (entity !== null) chain.push([project, category, entity]);

  return chain;
}

/** Non-null levels joined with commas, as stored in the audit log. */
export function formatContext(triple: ContextTriple): string {
  return triple.filter((level): level is string => level !== null).join(',');
}

export function displayContext(triple: ContextTriple): string {
  return ['studio', ...triple.filter((level): level is string => level !== null)].join(', ');
}

export function normalizeAxis(value: string | null | undefined): string | null {
  return toLevel(value);
}
