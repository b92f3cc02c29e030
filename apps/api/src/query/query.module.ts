import { Module } from '@nestjs/common';
import { APP_CONFIG, type AppConfig } from '../config/app.config';
import { DatabaseModule } from '../db/database.module';
import { SessionsModule } from '../sessions/sessions.module';
import { OpenAiTextGenerationClient } from './openai-text-generation.client';
import { QueryController } from './query.controller';
import { QueryService } from './query.service';
import { SqlExecutorService } from './sql-executor.service';
import { SqlGeneratorService } from './sql-generator.service';
import { TEXT_GENERATION_CLIENT } from './text-generation.client';

@Module({
  imports: [DatabaseModule, SessionsModule],
  controllers: [QueryController],
  providers: [
    {
      provide: TEXT_GENERATION_CLIENT,
      useFactory: (config: AppConfig) => new OpenAiTextGenerationClient(config.openai),
      inject: [APP_CONFIG],
    },
    SqlGeneratorService,
    SqlExecutorService,
    QueryService,
  ],
})
export class QueryModule {}
