// Constants
export { HistoryOperation, HISTORY_OPERATION_LABELS, SessionMode, Limits } from './constants/index.js';

// Types
export type {
  ContextLevel,
  ContextTriple,
  PackageAxes,
  HistoryEdit,
  Solver,
  SolveResult,
  Identity,
  Clock,
} from './types/index.js';

// Schemas
export { resolverSettingsSchema } from './schemas/index.js';
export type { ResolverSettings } from './schemas/index.js';

// Configuration
export { createConfig, loadConfig, expandHome, DEFAULT_PRODUCTION_DATABASE } from './config.js';
export type { ResolverConfig } from './config.js';

// Utils
export {
  createLogger,
  setLogLevel,
  ScopepackError,
  InvalidContextError,
  UnknownContextError,
  UnknownPackageError,
  UnresolvableSetError,
  InvalidDeployDirectionError,
  UnsavedChangesError,
  ConfigurationError,
  isScopepackError,
  tokenize,
} from './utils/index.js';
export type { Logger } from './utils/index.js';
