export {
  STUDIO,
  normalizeContext,
  ancestorChain,
  formatContext,
  displayContext,
  normalizeAxis,
} from './context.js';
export type { ContextInput } from './context.js';

export { ConfigSession, withSession, storeLocation } from './session.js';
export type { SessionOptions } from './session.js';

// Services
export { PackageLedger } from './services/ledger.service.js';
export type { LedgerOptions } from './services/ledger.service.js';
export { ValidationGateway } from './services/validation.service.js';
export type { ValidationOutcome } from './services/validation.service.js';
export { EditRecorder } from './services/history-recorder.js';
export type { SaveOptions } from './services/history-recorder.js';
export { DeploymentManager, formatBackupTimestamp } from './services/deploy.service.js';
export type { DeployResult } from './services/deploy.service.js';

// Solvers
export { CommandSolver, UnconfiguredSolver, UNCONFIGURED_SOLVER_MESSAGE, createSolver } from './solvers/index.js';
export type { CommandRunner } from './solvers/index.js';

export { systemIdentity, systemClock } from './collaborators.js';
