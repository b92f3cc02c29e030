import * as path from 'path';
import * as dotenv from 'dotenv';
import { loadConfig } from '../config/app.config';
import { createDatabase, createPool } from './index';
import { products, stores, transactions } from './schema';
import seedData from './seed-data.json';

dotenv.config({ path: path.resolve(process.cwd(), '.env') });
dotenv.config({ path: path.resolve(process.cwd(), '../../.env') });

type Category2 = keyof typeof seedData.prices;

function isCategory2(value: string): value is Category2 {
  return value in seedData.prices;
}

function pick<T>(arr: T[], index: number): T {
  return arr[index % arr.length];
}

async function seed() {
  const pool = createPool(loadConfig());
  const db = createDatabase(pool);
  try {
    const productRows = await db
      .insert(products)
      .values(seedData.products)
      .returning({ productId: products.productId, category2: products.category2 });

    const storeRows = await db
      .insert(stores)
      .values(seedData.stores)
      .returning({ storeId: stores.storeId });

    const now = new Date();
    const transactionRows: (typeof transactions.$inferInsert)[] = [];
    for (let dayOffset = 0; dayOffset < 90; dayOffset++) {
      const day = new Date(now);
      day.setDate(day.getDate() - dayOffset);
      const perDay = 3 + ((dayOffset * 7) % 6);
      for (let n = 0; n < perDay; n++) {
        const i = dayOffset * 11 + n;
        const product = pick(productRows, i * 5 + dayOffset);
        const store = pick(storeRows, i * 3 + n);
        const base = isCategory2(product.category2) ? seedData.prices[product.category2] : 50;
        const slot = new Date(day);
        slot.setHours(9 + (n % 10), (n * 17) % 60, (i * 13) % 60, 0);
        transactionRows.push({
          storeId: store.storeId,
          productId: product.productId,
          quantity: 1 + (i % 4),
          pricePerQuantity: (base * (dayOffset % 30 === 0 ? 0.8 : 1)).toFixed(2),
          timestamp: slot,
        });
      }
    }

    for (let i = 0; i < transactionRows.length; i += 100) {
      await db.insert(transactions).values(transactionRows.slice(i, i + 100));
    }

    console.log(
      `Seed completed: ${productRows.length} products, ${storeRows.length} stores, ${transactionRows.length} transactions.`,
    );
  } finally {
    await pool.end();
  }
}

seed().catch((e) => {
  console.error(e);
  process.exit(1);
});
