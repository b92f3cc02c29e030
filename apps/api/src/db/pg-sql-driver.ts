import { Logger } from '@nestjs/common';
import type { Submittable } from 'pg';
import Cursor from 'pg-cursor';
import {
  type AppError,
  ExecutionTimeoutError,
  SqlPermissionError,
  SqlSyntaxError,
  UnsafeStatementError,
  errorMessage,
  toAppError,
} from '../common/errors';
import type { SqlDriver, SqlDriverOptions, SqlDriverResult } from './sql-driver';

const CONNECTION_ERRNOS = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'ETIMEDOUT',
  'EHOSTUNREACH',
  'EAI_AGAIN',
]);

/** admin_shutdown, crash_shutdown, cannot_connect_now */
const SERVER_GOING_AWAY = new Set(['57P01', '57P02', '57P03']);

function errorCode(err: unknown): string | undefined {
  if (typeof err !== 'object' || err === null || !('code' in err)) return undefined;
  return typeof err.code === 'string' ? err.code : undefined;
}

/**
 * Maps a pg / socket failure onto the error taxonomy. A database that cannot
 * be reached counts as one that did not answer in time. SQLSTATE codes never
 * start with "E", which keeps them apart from Node errno codes.
 */
export function classifyDatabaseError(err: unknown): AppError {
  const code = errorCode(err);
  const msg = errorMessage(err);

  if (code && CONNECTION_ERRNOS.has(code)) {
    return new ExecutionTimeoutError(`Database unreachable (${code}).`, { cause: err });
  }
  if (!code) {
    if (/timeout exceeded when trying to connect|connection timeout/i.test(msg)) {
      return new ExecutionTimeoutError('Timed out connecting to the database.', { cause: err });
    }
    return toAppError(err);
  }
  if (code === '42501') return new SqlPermissionError(msg, { cause: err });
  if (code === '57014') return new ExecutionTimeoutError(`Statement cancelled: ${msg}`, { cause: err });
  if (code === '25006') {
    return new UnsafeStatementError(`Rejected by read-only transaction: ${msg}`, { cause: err });
  }
  if (code.startsWith('08') || SERVER_GOING_AWAY.has(code)) {
    return new ExecutionTimeoutError(`Database unreachable (${code}): ${msg}`, { cause: err });
  }
  return new SqlSyntaxError(msg, { cause: err });
}

export interface RowCursor extends Submittable {
  read(
    maxRows: number,
    callback: (
      err: Error | undefined,
      rows: Record<string, unknown>[],
      result: { fields: Array<{ name: string }> },
    ) => void,
  ): void;
  close(): Promise<void>;
}

/** The part of a pooled pg client the driver talks to. */
export interface DriverClient {
  query(text: string): Promise<unknown>;
  query<T extends Submittable>(submittable: T): T;
  release(destroy?: boolean): void;
}

export interface ConnectionSource {
  connect(): Promise<DriverClient>;
}

export type CursorFactory = (sqlText: string) => RowCursor;

function readBatch(
  cursor: RowCursor,
  count: number,
): Promise<{ columns: string[]; rows: Record<string, unknown>[] }> {
  return new Promise((resolve, reject) => {
    cursor.read(count, (err, rows, result) => {
      if (err) {
        reject(err);
        return;
      }
      const columns =
        result.fields.length > 0 ? result.fields.map((f) => f.name) : rows[0] ? Object.keys(rows[0]) : [];
      resolve({ columns, rows });
    });
  });
}

/**
 * Runs statements on a pooled connection inside their own transaction, so
 * `SET LOCAL statement_timeout` and the access mode never leak into the pool.
 * Rows come through a cursor and at most `maxRows + 1` are fetched; the extra
 * row only tells whether the result was cut.
 */
export class PgSqlDriver implements SqlDriver {
  private readonly logger = new Logger(PgSqlDriver.name);

  constructor(
    private readonly pool: ConnectionSource,
    private readonly openCursor: CursorFactory = (sqlText) => new Cursor(sqlText),
  ) {}

  async execute(sqlText: string, options: SqlDriverOptions): Promise<SqlDriverResult> {
    const timeout = Math.max(1, Math.floor(options.timeoutMs));
    const limit = Math.max(0, Math.floor(options.maxRows));

    let client: DriverClient;
    try {
      client = await this.pool.connect();
    } catch (err) {
      throw this.failure(err);
    }

    let destroy = false;
    try {
      await client.query(options.readOnly ? 'BEGIN READ ONLY' : 'BEGIN READ WRITE');
      // SET does not take bind parameters; timeout is an integer we computed.
      await client.query(`SET LOCAL statement_timeout = ${timeout}`);
      const cursor = client.query(this.openCursor(sqlText));
      const { columns, rows } = await readBatch(cursor, limit + 1);
      await cursor.close();
      await client.query('COMMIT');
      const truncated = rows.length > limit;
      return { columns, rows: truncated ? rows.slice(0, limit) : rows, truncated };
    } catch (err) {
      destroy = !(await this.rollback(client));
      throw this.failure(err);
    } finally {
      client.release(destroy);
    }
  }

  private async rollback(client: DriverClient): Promise<boolean> {
    try {
      await client.query('ROLLBACK');
      return true;
    } catch (err) {
      this.logger.warn(`Rollback failed, discarding connection: ${errorMessage(err)}`);
      return false;
    }
  }

  private failure(err: unknown): AppError {
    const classified = classifyDatabaseError(err);
    this.logger.warn(`Statement failed (${classified.kind}): ${classified.message}`);
    return classified;
  }
}
