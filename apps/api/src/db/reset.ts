import * as path from 'path';
import * as dotenv from 'dotenv';
import { sql } from 'drizzle-orm';
import { loadConfig } from '../config/app.config';
import { createDatabase, createPool } from './index';
import { products, stores, transactions } from './schema';

dotenv.config({ path: path.resolve(process.cwd(), '.env') });
dotenv.config({ path: path.resolve(process.cwd(), '../../.env') });

const SEQUENCES: Array<[table: string, column: string]> = [
  ['transactions', 'id'],
  ['products', 'product_id'],
  ['stores', 'store_id'],
];

async function reset() {
  const pool = createPool(loadConfig());
  const db = createDatabase(pool);
  try {
    await db.delete(transactions);
    await db.delete(products);
    await db.delete(stores);
    for (const [table, column] of SEQUENCES) {
      await db.execute(sql`SELECT setval(pg_get_serial_sequence(${table}, ${column}), 1, false)`);
    }
    console.log('Database reset done.');
  } finally {
    await pool.end();
  }
}

reset()
  .then(() => process.exit(0))
  .catch((e) => {
    console.error(e);
    process.exit(1);
  });
