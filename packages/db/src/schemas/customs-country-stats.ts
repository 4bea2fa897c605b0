import { index, numeric, pgTable, text, uuid, varchar } from 'drizzle-orm/pg-core';
import { auditColumns } from '../utils.js';

export const customsCountryStatsTable = pgTable(
  'customs_country_stats',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    year: varchar('year', { length: 4 }).notNull(),
    nationCode: varchar('nation_code', { length: 8 }).notNull(),
    nationName: text('nation_name').notNull(),
    exportAmount: numeric('export_amount', { precision: 20, scale: 3 }).notNull(),
    importAmount: numeric('import_amount', { precision: 20, scale: 3 }).notNull(),
    tradeBalance: numeric('trade_balance', { precision: 20, scale: 3 }).notNull(),
    ...auditColumns(),
  },
  (t) => ({
    idxYearNation: index('customs_country_stats_year_nation_idx').on(t.year, t.nationCode),
  })
);
