export { createLogger, setLogLevel } from './logger.js';
export type { Logger } from './logger.js';
export {
  ScopepackError,
  InvalidContextError,
  UnknownContextError,
  UnknownPackageError,
  UnresolvableSetError,
  InvalidDeployDirectionError,
  UnsavedChangesError,
  ConfigurationError,
  isScopepackError,
} from './errors.js';
export { tokenize } from './tokenize.js';
