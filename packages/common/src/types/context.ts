/** A single scope level; `null` means the level is not set. */
export type ContextLevel = string | null;

/**
 * A normalized scope path: (project, category, entity).
 * The all-null triple is the studio root.
 */
export type ContextTriple = readonly [ContextLevel, ContextLevel, ContextLevel];

/** Narrowing axes orthogonal to scope. */
export interface PackageAxes {
  step?: string | null;
  software?: string | null;
}
