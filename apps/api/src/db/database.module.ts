import { Inject, Logger, Module, type OnApplicationShutdown } from '@nestjs/common';
import { Pool } from 'pg';
import { APP_CONFIG, type AppConfig } from '../config/app.config';
import { createPool } from './index';
import { PgSqlDriver } from './pg-sql-driver';
import { SQL_DRIVER } from './sql-driver';

export const PG_POOL = Symbol('PG_POOL');

@Module({
  providers: [
    {
      provide: PG_POOL,
      useFactory: (config: AppConfig) => createPool(config),
      inject: [APP_CONFIG],
    },
    {
      provide: SQL_DRIVER,
      useFactory: (pool: Pool) => new PgSqlDriver(pool),
      inject: [PG_POOL],
    },
  ],
  exports: [SQL_DRIVER],
})
export class DatabaseModule implements OnApplicationShutdown {
  private readonly logger = new Logger(DatabaseModule.name);

  constructor(@Inject(PG_POOL) private readonly pool: Pool) {}

  async onApplicationShutdown(): Promise<void> {
    await this.pool.end();
    this.logger.log('Database pool closed');
  }
}
