import { index, integer, pgTable, text, uuid, varchar } from 'drizzle-orm/pg-core';
import { auditColumns } from '../utils.js';

export const tradePartnerSharesTable = pgTable(
  'trade_partner_shares',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    countryCode: varchar('country_code', { length: 16 }).notNull(),
    countryName: text('country_name').notNull().default(''),
    position: integer('position').notNull(), // row ordinal within the country
    exportPartner: text('export_partner'),
    exportRate: varchar('export_rate', { length: 16 }), // "40.000%"
    importPartner: text('import_partner'),
    importRate: varchar('import_rate', { length: 16 }),
    ...auditColumns(),
  },
  (t) => ({
    idxCountry: index('trade_partner_shares_country_idx').on(t.countryCode, t.position),
  })
);
