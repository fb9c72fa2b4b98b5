/** Operation codes stored in the `history.operation` column. */
export const HistoryOperation = {
  INSTALL: 1,
  UNINSTALL: 2,
} as const;

export type HistoryOperation = (typeof HistoryOperation)[keyof typeof HistoryOperation];

export const HISTORY_OPERATION_LABELS: Record<HistoryOperation, string> = {
  [HistoryOperation.INSTALL]: 'install',
  [HistoryOperation.UNINSTALL]: 'uninstall',
};
