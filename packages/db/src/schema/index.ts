export { contexts } from './contexts.js';
export type { ContextRow, ContextInsert } from './contexts.js';

export { packages } from './packages.js';
export type { PackageRow, PackageInsert } from './packages.js';

export { history } from './history.js';
export type { HistoryRow, HistoryInsert } from './history.js';
