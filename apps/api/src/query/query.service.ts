import { Injectable, Logger } from '@nestjs/common';
import { NotFoundError, publicMessage, toAppError } from '../common/errors';
import { SessionStore } from '../sessions/session-store';
import type { NewQueryRecord } from '../sessions/session.types';
import { type ExecutionResult, SqlExecutorService } from './sql-executor.service';
import { type CandidateSql, SqlGeneratorService } from './sql-generator.service';

/**
 * Composes generation and execution with session history.
 *
 * With a session id, the session must exist before any upstream or database
 * call, and every attempt is recorded: successes with their SQL / result
 * summary, failures with their error kind. Without one, calls are stateless.
 */
@Injectable()
export class QueryService {
  private readonly logger = new Logger(QueryService.name);

  constructor(
    private readonly generator: SqlGeneratorService,
    private readonly executor: SqlExecutorService,
    private readonly sessions: SessionStore,
  ) {}

  async naturalLanguageToSql(naturalLanguage: string, sessionId?: string): Promise<CandidateSql> {
    this.ensureSession(sessionId);
    let candidate: CandidateSql;
    try {
      candidate = await this.generator.generate(naturalLanguage);
    } catch (err) {
      const failure = toAppError(err);
      this.logger.warn(`SQL generation failed (${failure.kind}): ${failure.message}`);
      this.record(sessionId, {
        operation: 'generate',
        naturalLanguage,
        error: { kind: failure.kind, message: publicMessage(failure) },
      });
      throw failure;
    }
    this.record(sessionId, { operation: 'generate', naturalLanguage, sql: candidate.sql });
    return candidate;
  }

  async executeSql(sqlText: string, sessionId?: string): Promise<ExecutionResult> {
    this.ensureSession(sessionId);
    let result: ExecutionResult;
    try {
      result = await this.executor.execute(sqlText);
    } catch (err) {
      const failure = toAppError(err);
      this.record(sessionId, {
        operation: 'execute',
        sql: sqlText,
        error: { kind: failure.kind, message: publicMessage(failure) },
      });
      throw failure;
    }
    const { columns, rowCount, truncated, elapsedMs } = result;
    this.record(sessionId, {
      operation: 'execute',
      sql: sqlText,
      result: { columns, rowCount, truncated, elapsedMs },
    });
    return result;
  }

  private ensureSession(sessionId: string | undefined): void {
    if (sessionId !== undefined && !this.sessions.has(sessionId)) {
      throw new NotFoundError(`Session ${sessionId} not found.`);
    }
  }

  private record(sessionId: string | undefined, record: NewQueryRecord): void {
    if (sessionId === undefined) return;
    try {
      this.sessions.append(sessionId, record);
    } catch (err) {
      // Session expired or was evicted while the call was in flight.
      if (!(err instanceof NotFoundError)) throw err;
      this.logger.warn(`Dropped ${record.operation} record: ${err.message}`);
    }
  }
}
