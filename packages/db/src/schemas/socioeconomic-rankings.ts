import { index, integer, pgTable, text, uuid, varchar } from 'drizzle-orm/pg-core';
import { rankingIndexEnum } from '../enums.js';
import { auditColumns } from '../utils.js';

export const socioeconomicRankingsTable = pgTable(
  'socioeconomic_rankings',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    indexKind: rankingIndexEnum('index_kind').notNull(),
    countryCode: varchar('country_code', { length: 8 }).notNull(),
    countryName: text('country_name').notNull(),
    rank: integer('rank').notNull(),
    ...auditColumns(),
  },
  (t) => ({
    idxKindRank: index('socioeconomic_rankings_kind_rank_idx').on(t.indexKind, t.rank),
  })
);
