import { pgEnum } from 'drizzle-orm/pg-core';

/** Ingest ledger */
export const ingestStatuses = ['pending', 'running', 'succeeded', 'failed'] as const;
export type IngestStatus = (typeof ingestStatuses)[number];
export const ingestStatusEnum = pgEnum('ingest_status', ingestStatuses);

export const ingestJobs = [
  'eiu:indicators',
  'eiu:trade-partners',
  'customs:countries',
  'customs:items',
  'index:economic-freedom',
  'index:corruption-perception',
  'index:human-development',
  'index:world-competitiveness',
] as const;
export type IngestJob = (typeof ingestJobs)[number];
export const ingestJobEnum = pgEnum('ingest_job', ingestJobs);

/** Customs */
export const tradeDirections = ['export', 'import'] as const;
export type TradeDirection = (typeof tradeDirections)[number];
export const tradeDirectionEnum = pgEnum('trade_direction', tradeDirections);

/** Ranking indices */
export const rankingIndexKinds = [
  'economic-freedom',
  'corruption-perception',
  'human-development',
  'world-competitiveness',
] as const;
export type RankingIndexKind = (typeof rankingIndexKinds)[number];
export const rankingIndexEnum = pgEnum('ranking_index', rankingIndexKinds);

/** Reference data: which naming system a mapping row translates from/to */
export const countryMappingKinds = [
  'customs-name-to-iso', // local-language customs name → ISO alpha-2
  'iso-to-target-name', // ISO alpha-2 → target system name
  'indicator-code-to-english-name', // indicator sheet code → English name
  'partner-name-to-iso', // lower-case English partner name → ISO alpha-2
  'english-name-to-iso', // ranking index English name → ISO alpha-2
  'iso-to-english-name', // ISO alpha-2 → target system English name
] as const;
export type CountryMappingKind = (typeof countryMappingKinds)[number];
export const countryMappingKindEnum = pgEnum('country_mapping_kind', countryMappingKinds);
