import { pgTable, text, uniqueIndex, uuid } from 'drizzle-orm/pg-core';
import { countryMappingKindEnum } from '../enums.js';
import { auditColumns } from '../utils.js';

/** Read-only reference data for the country bridge. */
export const countryCodeMappingsTable = pgTable(
  'country_code_mappings',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    mappingKind: countryMappingKindEnum('mapping_kind').notNull(),
    sourceKey: text('source_key').notNull(),
    targetValue: text('target_value').notNull(),
    ...auditColumns(),
  },
  (t) => ({
    uqKindKey: uniqueIndex('country_code_mappings_kind_key_uq').on(t.mappingKind, t.sourceKey),
  })
);
