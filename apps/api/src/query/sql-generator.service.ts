import { Inject, Injectable, Logger } from '@nestjs/common';
import { UpstreamError, UpstreamTimeoutError } from '../common/errors';
import { withTimeout } from '../common/timeout';
import { APP_CONFIG, type AppConfig } from '../config/app.config';
import { SCHEMA_CONTEXT, userPrompt } from './schema-context';
import { extractSql } from './sql-text';
import { TEXT_GENERATION_CLIENT, type TextGenerationClient } from './text-generation.client';

/** SQL text produced by the model. Never checked for syntax here. */
export interface CandidateSql {
  sql: string;
  validity: 'unverified';
}

@Injectable()
export class SqlGeneratorService {
  private readonly logger = new Logger(SqlGeneratorService.name);

  constructor(
    @Inject(TEXT_GENERATION_CLIENT) private readonly client: TextGenerationClient,
    @Inject(APP_CONFIG) private readonly config: Pick<AppConfig, 'generationTimeoutMs'>,
  ) {}

  async generate(naturalLanguage: string): Promise<CandidateSql> {
    const timeoutMs = this.config.generationTimeoutMs;
    const started = Date.now();
    const completion = await withTimeout(
      (signal) =>
        this.client.complete(
          { system: SCHEMA_CONTEXT, user: userPrompt(naturalLanguage), temperature: 0 },
          { timeoutMs, signal },
        ),
      timeoutMs,
      () => new UpstreamTimeoutError(`Text generation exceeded ${timeoutMs} ms.`),
    );
    const sql = extractSql(completion);
    if (!sql) {
      throw new UpstreamError('Completion did not contain a SQL statement.');
    }
    this.logger.log(`Generated SQL in ${Date.now() - started} ms`);
    return { sql, validity: 'unverified' };
  }
}
