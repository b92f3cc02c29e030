import {
  pgTable,
  serial,
  varchar,
  integer,
  numeric,
  timestamp,
  char,
} from 'drizzle-orm/pg-core';

export const products = pgTable('products', {
  productId: serial('product_id').primaryKey(),
  name: varchar('name', { length: 255 }).notNull(),
  /** Men, Women, Kids */
  category1: varchar('category1', { length: 50 }).notNull(),
  /** Sandals, Casual Shoes, Boots, Sports Shoes */
  category2: varchar('category2', { length: 50 }).notNull(),
});

export const stores = pgTable('stores', {
  storeId: serial('store_id').primaryKey(),
  state: char('state', { length: 2 }).notNull(),
  zipCode: varchar('zip_code', { length: 10 }).notNull(),
});

export const transactions = pgTable('transactions', {
  id: serial('id').primaryKey(),
  storeId: integer('store_id')
    .references(() => stores.storeId, { onDelete: 'cascade' })
    .notNull(),
  productId: integer('product_id')
    .references(() => products.productId, { onDelete: 'cascade' })
    .notNull(),
  quantity: integer('quantity').notNull(),
  pricePerQuantity: numeric('price_per_quantity', { precision: 10, scale: 2 }).notNull(),
  timestamp: timestamp('timestamp').notNull(),
});
