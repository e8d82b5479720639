import { pgTable, uuid, date, doublePrecision, bigint, index, unique } from 'drizzle-orm/pg-core';
import { companies } from './companies.js';

export const historicalData = pgTable('historical_data', {
  id: uuid('id').primaryKey().defaultRandom(),
  companyId: uuid('company_id').notNull().references(() => companies.id, { onDelete: 'cascade' }),
  tradeDate: date('trade_date').notNull(),
  price: doublePrecision('price').notNull(),
  volume: bigint('volume', { mode: 'number' }),
  value: doublePrecision('value'),
}, (table) => ({
  companyDateUnique: unique('historical_data_company_date_unique').on(table.companyId, table.tradeDate),
  companyDateIdx: index('historical_data_company_date_idx').on(table.companyId, table.tradeDate),
}));
