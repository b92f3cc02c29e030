import type { ErrorKind } from '../common/errors';

export type QueryOperation = 'generate' | 'execute';

/** Summary of a successful execution; rows are not kept in history. */
export interface ExecutionSummary {
  readonly columns: readonly string[];
  readonly rowCount: number;
  readonly truncated: boolean;
  readonly elapsedMs: number;
}

export interface RecordedError {
  readonly kind: ErrorKind;
  readonly message: string;
}

/** One generate-or-execute attempt and its outcome, as appended by the router. */
export interface NewQueryRecord {
  operation: QueryOperation;
  naturalLanguage?: string;
  sql?: string;
  result?: ExecutionSummary;
  error?: RecordedError;
}

export type QueryRecord = Readonly<NewQueryRecord & { timestamp: string }>;

export interface SessionInfo {
  id: string;
  createdAt: string;
}
