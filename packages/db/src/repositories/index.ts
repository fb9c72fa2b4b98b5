export { BaseRepository } from './base.repository.js';
export { ContextRepository } from './context.repository.js';
export { PackageRepository } from './package.repository.js';
export type { PackageKey } from './package.repository.js';
export { HistoryRepository } from './history.repository.js';
