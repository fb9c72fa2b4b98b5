export { HistoryOperation, HISTORY_OPERATION_LABELS } from './history.js';
export { SessionMode } from './session.js';
export { Limits } from './limits.js';
