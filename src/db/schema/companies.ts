import { pgTable, uuid, varchar, timestamp, index } from 'drizzle-orm/pg-core';

export const companies = pgTable('companies', {
  id: uuid('id').primaryKey().defaultRandom(),
  symbol: varchar('symbol', { length: 20 }).unique().notNull(),
  name: varchar('name', { length: 255 }).notNull(),
  sector: varchar('sector', { length: 100 }),
  createdAt: timestamp('created_at').notNull().defaultNow(),
}, (table) => ({
  symbolIdx: index('companies_symbol_idx').on(table.symbol),
  sectorIdx: index('companies_sector_idx').on(table.sector),
}));
