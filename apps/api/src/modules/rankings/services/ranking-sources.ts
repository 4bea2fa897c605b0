import type { CountryMappingKind, RankingIndexKind } from '@statbridge/db';
import type { HeaderSpec } from '../../../lib/tabular/raw-table.js';

/**
 * How each index file lays out its table. `header` locates the header row;
 * `skipRows` instead takes the row right after a fixed preamble as the header.
 */
export type RankingSource = {
  label: string;
  format: 'csv' | 'xlsx';
  header?: HeaderSpec;
  skipRows?: number;
  countryColumn: string;
  /** Rank read from a column, or derived from a score column (higher scores rank first). */
  rank: { column: string; from: 'rank' | 'score' };
  /** Two-hop through an English name, or single-hop from an ISO code column. */
  bridge: { toCode?: CountryMappingKind; toName: CountryMappingKind };
};

export const RANKING_SOURCES: Readonly<Record<RankingIndexKind, RankingSource>> = {
  'economic-freedom': {
    label: 'Economic Freedom Index',
    format: 'csv',
    skipRows: 4,
    countryColumn: 'Country',
    rank: { column: 'Overall Score', from: 'score' },
    bridge: { toCode: 'english-name-to-iso', toName: 'iso-to-english-name' },
  },
  'corruption-perception': {
    label: 'Corruption Perceptions Index',
    format: 'xlsx',
    header: ['Country / Territory', 'ISO3', 'Region'],
    countryColumn: 'Country / Territory',
    rank: { column: 'Rank', from: 'rank' },
    bridge: { toCode: 'english-name-to-iso', toName: 'iso-to-english-name' },
  },
  'human-development': {
    label: 'Human Development Index',
    format: 'xlsx',
    header: ['HDI rank', 'Country'],
    countryColumn: 'Country',
    rank: { column: 'HDI rank', from: 'rank' },
    bridge: { toCode: 'english-name-to-iso', toName: 'iso-to-english-name' },
  },
  'world-competitiveness': {
    label: 'World Competitiveness Ranking',
    format: 'xlsx',
    header: ['WCR', 'Country', '국가코드'],
    countryColumn: '국가코드',
    rank: { column: 'WCR', from: 'rank' },
    bridge: { toName: 'iso-to-english-name' },
  },
};
