import { Inject, Injectable, Logger } from '@nestjs/common';
import { ExecutionTimeoutError, UnsafeStatementError, ValidationError } from '../common/errors';
import { withTimeout } from '../common/timeout';
import { APP_CONFIG, type AppConfig } from '../config/app.config';
import { SQL_DRIVER, type SqlDriver } from '../db/sql-driver';
import { inspectStatement } from './sql-guard';

export interface ExecutionResult {
  columns: string[];
  rows: Record<string, unknown>[];
  rowCount: number;
  truncated: boolean;
  elapsedMs: number;
}

export type ExecutorPolicy = Pick<AppConfig, 'statementTimeoutMs' | 'maxRows' | 'allowMutations'>;

@Injectable()
export class SqlExecutorService {
  private readonly logger = new Logger(SqlExecutorService.name);

  constructor(
    @Inject(SQL_DRIVER) private readonly driver: SqlDriver,
    @Inject(APP_CONFIG) private readonly policy: ExecutorPolicy,
  ) {}

  /** Throws {@link UnsafeStatementError} when the statement may not run under the current policy. */
  assertAllowed(sqlText: string): void {
    const inspection = inspectStatement(sqlText);
    if (inspection.statementCount === 0) {
      throw new ValidationError('SQL contains no statement.');
    }
    if (inspection.statementCount > 1) {
      throw new UnsafeStatementError('Only a single statement can be executed per request.');
    }
    if (!inspection.readOnly && !this.policy.allowMutations) {
      throw new UnsafeStatementError(
        `Only read-only queries are allowed (rejected: ${inspection.reason}).`,
      );
    }
  }

  async execute(sqlText: string): Promise<ExecutionResult> {
    try {
      this.assertAllowed(sqlText);
    } catch (err) {
      this.logger.warn(`Rejected statement: ${err instanceof Error ? err.message : String(err)}`);
      throw err;
    }

    const { statementTimeoutMs, maxRows, allowMutations } = this.policy;
    const started = Date.now();
    const fetched = await withTimeout(
      () =>
        this.driver.execute(sqlText, {
          timeoutMs: statementTimeoutMs,
          readOnly: !allowMutations,
          maxRows,
        }),
      statementTimeoutMs,
      () => new ExecutionTimeoutError(`Statement exceeded ${statementTimeoutMs} ms.`),
    );
    const elapsedMs = Date.now() - started;

    const { columns, rows } = fetched;
    const truncated = fetched.truncated === true || rows.length > maxRows;
    const returned = rows.length > maxRows ? rows.slice(0, maxRows) : rows;
    this.logger.log(
      `Executed statement: ${returned.length} row(s)${truncated ? ` (capped at ${maxRows})` : ''} in ${elapsedMs} ms`,
    );
    return { columns, rows: returned, rowCount: returned.length, truncated, elapsedMs };
  }
}
