import { index, numeric, pgTable, text, uuid, varchar } from 'drizzle-orm/pg-core';
import { tradeDirectionEnum } from '../enums.js';
import { auditColumns } from '../utils.js';

export const customsItemStatsTable = pgTable(
  'customs_item_stats',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    year: varchar('year', { length: 4 }).notNull(),
    direction: tradeDirectionEnum('direction').notNull(),
    nationCode: varchar('nation_code', { length: 8 }).notNull(),
    nationName: text('nation_name').notNull(),
    itemName: text('item_name').notNull(),
    itemWeight: numeric('item_weight', { precision: 20, scale: 3 }).notNull(),
    itemAmount: numeric('item_amount', { precision: 20, scale: 3 }).notNull(),
    ...auditColumns(),
  },
  (t) => ({
    idxDirectionYear: index('customs_item_stats_direction_year_idx').on(t.direction, t.year),
  })
);
