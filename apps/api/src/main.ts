import 'reflect-metadata';
import * as path from 'path';
import * as dotenv from 'dotenv';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { APP_CONFIG, type AppConfig } from './config/app.config';
import { QueryExceptionFilter } from './query/query-exception.filter';

// Config is read when the module graph is built, after these have run.
dotenv.config({ path: path.resolve(process.cwd(), '.env') });
dotenv.config({ path: path.resolve(process.cwd(), '../../.env') });

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  app.useGlobalFilters(new QueryExceptionFilter());
  app.enableShutdownHooks();
  const config = app.get<AppConfig>(APP_CONFIG);
  await app.listen(config.port);
  new Logger('Bootstrap').log(
    `Listening on port ${config.port} (mutating statements ${config.allowMutations ? 'enabled' : 'disabled'})`,
  );
}

bootstrap().catch((e) => {
  console.error(e);
  process.exit(1);
});
