export type { ContextLevel, ContextTriple, PackageAxes } from './context.js';
export type { HistoryEdit } from './history.js';
export type { Solver, SolveResult, Identity, Clock } from './collaborators.js';
