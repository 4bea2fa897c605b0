import type { IngestJob } from '@statbridge/db';
import type { Processor } from '../../../lib/ingest/types.js';
import { processCustomsCountries } from '../../customs/services/process-customs-countries.js';
import { processCustomsItems } from '../../customs/services/process-customs-items.js';
import { processIndicators } from '../../eiu/services/process-indicators.js';
import { processTradePartners } from '../../eiu/services/process-trade-partners.js';
import { createRankingProcessor } from '../../rankings/services/process-rankings.js';

export const JOB_PROCESSORS: Readonly<Record<IngestJob, Processor>> = {
  'eiu:indicators': processIndicators,
  'eiu:trade-partners': processTradePartners,
  'customs:countries': processCustomsCountries,
  'customs:items': processCustomsItems,
  'index:economic-freedom': createRankingProcessor('economic-freedom'),
  'index:corruption-perception': createRankingProcessor('corruption-perception'),
  'index:human-development': createRankingProcessor('human-development'),
  'index:world-competitiveness': createRankingProcessor('world-competitiveness'),
};
