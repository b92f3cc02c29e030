/** Injection token for the {@link SqlDriver} the executor runs statements through. */
export const SQL_DRIVER = Symbol('SQL_DRIVER');

export interface SqlDriverOptions {
  timeoutMs: number;
  readOnly: boolean;
  /** Rows to read at most; the rest of the result is never fetched. */
  maxRows: number;
}

export interface SqlDriverResult {
  columns: string[];
  rows: Record<string, unknown>[];
  /** Set when the statement produced more than `maxRows` rows. */
  truncated?: boolean;
}

/**
 * Runs one statement as given. Implementations throw classified
 * {@link AppError}s for failures they recognize.
 */
export interface SqlDriver {
  execute(sqlText: string, options: SqlDriverOptions): Promise<SqlDriverResult>;
}
