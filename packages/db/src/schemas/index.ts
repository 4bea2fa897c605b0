import { countryCodeMappingsTable } from './country-code-mappings.js';
import { customsCountryStatsTable } from './customs-country-stats.js';
import { customsItemStatsTable } from './customs-item-stats.js';
import { economicIndicatorsTable } from './economic-indicators.js';
import { ingestRunsTable } from './ingest-runs.js';
import { socioeconomicRankingsTable } from './socioeconomic-rankings.js';
import { tradePartnerSharesTable } from './trade-partner-shares.js';

export * from '../enums.js';
export * from './country-code-mappings.js';
export * from './customs-country-stats.js';
export * from './customs-item-stats.js';
export * from './economic-indicators.js';
export * from './ingest-runs.js';
export * from './socioeconomic-rankings.js';
export * from './trade-partner-shares.js';

export const schema = {
  countryCodeMappingsTable,
  customsCountryStatsTable,
  customsItemStatsTable,
  economicIndicatorsTable,
  ingestRunsTable,
  socioeconomicRankingsTable,
  tradePartnerSharesTable,
};
