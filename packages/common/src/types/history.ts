import type { HistoryOperation } from '../constants/history.js';
import type { ContextTriple } from './context.js';

/** A mutation recorded in the session buffer, not yet written to the audit log. */
export interface HistoryEdit {
  context: ContextTriple;
  packageName: string;
  step: string | null;
  software: string | null;
  operation: HistoryOperation;
}
