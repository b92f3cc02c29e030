import { drizzle, type NodePgDatabase } from 'drizzle-orm/node-postgres';
import { Pool } from 'pg';
import type { AppConfig } from '../config/app.config';
import * as schema from './schema';

export type Database = NodePgDatabase<typeof schema>;

export function createPool(config: Pick<AppConfig, 'databaseUrl' | 'dbPoolMax' | 'statementTimeoutMs'>): Pool {
  return new Pool({
    connectionString: config.databaseUrl,
    max: config.dbPoolMax,
    connectionTimeoutMillis: config.statementTimeoutMs,
  });
}

export function createDatabase(pool: Pool): Database {
  return drizzle(pool, { schema });
}

export * from './schema';
