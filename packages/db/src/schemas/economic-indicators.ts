import { jsonb, pgTable, text, uniqueIndex, uuid, varchar } from 'drizzle-orm/pg-core';
import { auditColumns } from '../utils.js';

/**
 * One row per (country, indicator code). `years` holds the serialized
 * classification per year, e.g. { "2023": "ACT|2.1", "2030": "FOR" }.
 */
export const economicIndicatorsTable = pgTable(
  'economic_indicators',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    countryCode: varchar('country_code', { length: 16 }).notNull(),
    countryName: text('country_name').notNull().default(''),
    code: varchar('code', { length: 8 }).notNull(),
    title: text('title').notNull().default(''),
    currency: text('currency').notNull().default(''),
    units: text('units').notNull().default(''),
    years: jsonb('years').$type<Record<string, string>>().notNull(),
    ...auditColumns(),
  },
  (t) => ({
    uqCountryCode: uniqueIndex('economic_indicators_country_code_uq').on(t.countryCode, t.code),
  })
);
