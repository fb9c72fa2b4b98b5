export const Limits = {
  /** Scope levels below the studio root: project, category, entity */
  MAX_CONTEXT_LEVELS: 3,

  /** Rows printed by `scopepack history` when no limit is given */
  DEFAULT_HISTORY_LIMIT: 50,

  /** Busy timeout handed to SQLite in ms */
  STORE_BUSY_TIMEOUT_MS: 5_000,

  /** Queries slower than this are logged at warn level */
  SLOW_QUERY_MS: 500,
} as const;
