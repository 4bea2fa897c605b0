import { describe, expect, it } from 'vitest';
import { mappingFrom } from '../../../lib/tabular/country-bridge.js';
import {
  buildTradePartnerRows,
  formatRate,
  groupTradeProfiles,
  type TradePartnerRow,
  type TradePartnerTables,
} from './aggregate-trade-partners.js';
import type { TradeRelation } from './extract-trade-partners.js';

const tables: TradePartnerTables = {
  partnerToCode: mappingFrom([
    ['germany', 'DE'],
    ['spain', 'ES'],
    ['italy', 'IT'],
  ]),
  codeToName: mappingFrom([
    ['DE', 'Germany'],
    ['ES', 'Spain'],
    ['IT', 'Italy'],
    ['FR', 'France'],
  ]),
};

function rel(
  countryCode: string,
  direction: TradeRelation['direction'],
  partner: string | null,
  rate: number
): TradeRelation {
  return { countryName: '', countryCode, partner, rate, direction };
}

describe('groupTradeProfiles', () => {
  it('normalizes partners and skips empty relations, in first-seen order', () => {
    const profiles = groupTradeProfiles([
      rel(' FR ', 'export', ' Germany ', 40),
      rel('KR', 'import', 'China', 20),
      rel('FR', 'export', 'Italy', 0),
      rel('FR', 'import', null, 15),
      rel('FR', 'import', 'Spain', 60),
    ]);

    expect(profiles).toEqual([
      {
        countryCode: 'FR',
        exports: [{ partner: 'germany', rate: 40 }],
        imports: [{ partner: 'spain', rate: 60 }],
      },
      { countryCode: 'KR', exports: [], imports: [{ partner: 'china', rate: 20 }] },
    ]);
  });
});

describe('formatRate', () => {
  it('uses three decimals, and a bare 0% for zero', () => {
    expect(formatRate(40)).toBe('40.000%');
    expect(formatRate(12.3456)).toBe('12.346%');
    expect(formatRate(0)).toBe('0%');
  });
});

describe('buildTradePartnerRows', () => {
  it('pairs partners position by position and appends the residual row', () => {
    const profiles = groupTradeProfiles([
      rel('FR', 'export', 'Germany', 40),
      rel('FR', 'export', 'Italy', 35),
      rel('FR', 'import', 'Spain', 60),
    ]);

    expect(buildTradePartnerRows(profiles, tables)).toEqual([
      {
        countryCode: 'FR',
        countryName: 'France',
        position: 1,
        exportPartner: 'Germany',
        exportRate: '40.000%',
        importPartner: 'Spain',
        importRate: '60.000%',
      },
      {
        countryCode: 'FR',
        countryName: 'France',
        position: 2,
        exportPartner: 'Italy',
        exportRate: '35.000%',
        importPartner: '',
        importRate: '0%',
      },
      {
        countryCode: 'FR',
        countryName: 'France',
        position: 3,
        exportPartner: 'other',
        exportRate: '25.000%',
        importPartner: 'other',
        importRate: '40.000%',
      },
    ]);
  });

  it('adds no residual row when shares reach 100', () => {
    const profiles = groupTradeProfiles([
      rel('FR', 'export', 'Germany', 60),
      rel('FR', 'export', 'Spain', 40),
    ]);
    const rows = buildTradePartnerRows(profiles, tables);
    expect(rows).toHaveLength(2);
    expect(rows.map((r) => r.exportPartner)).toEqual(['Germany', 'Spain']);
  });

  it('leaves the non-qualifying side of the residual row null', () => {
    const profiles = groupTradeProfiles([rel('KR', 'import', 'Japan', 30)]);
    const rows = buildTradePartnerRows(profiles, tables, 'rest of world');

    expect(rows).toEqual([
      {
        countryCode: 'KR',
        countryName: '',
        position: 1,
        exportPartner: '',
        exportRate: '0%',
        importPartner: '',
        importRate: '30.000%',
      },
      {
        countryCode: 'KR',
        countryName: '',
        position: 2,
        exportPartner: null,
        exportRate: null,
        importPartner: 'rest of world',
        importRate: '70.000%',
      },
    ]);
  });

  it('yields the same shares per direction and the same residual whatever the input order', () => {
    const relations = [
      rel('FR', 'export', 'Germany', 40),
      rel('FR', 'import', 'Spain', 50),
      rel('FR', 'export', 'Italy', 25),
      rel('FR', 'import', 'Germany', 30),
      rel('FR', 'export', 'Spain', 10),
    ];
    const summarize = (rows: readonly TradePartnerRow[]) => {
      const listed = rows.filter((r) => r.exportPartner !== 'other');
      return {
        exports: listed
          .filter((r) => r.exportRate !== '0%')
          .map((r) => `${r.exportPartner} ${r.exportRate}`)
          .sort(),
        imports: listed
          .filter((r) => r.importRate !== '0%')
          .map((r) => `${r.importPartner} ${r.importRate}`)
          .sort(),
        residual: rows.find((r) => r.exportPartner === 'other'),
      };
    };

    const expected = summarize(buildTradePartnerRows(groupTradeProfiles(relations), tables));
    expect(expected).toEqual({
      exports: ['Germany 40.000%', 'Italy 25.000%', 'Spain 10.000%'],
      imports: ['Germany 30.000%', 'Spain 50.000%'],
      residual: {
        countryCode: 'FR',
        countryName: 'France',
        position: 4,
        exportPartner: 'other',
        exportRate: '25.000%',
        importPartner: 'other',
        importRate: '20.000%',
      },
    });

    for (const order of [[...relations].reverse(), [...relations.slice(2), ...relations.slice(0, 2)]]) {
      expect(summarize(buildTradePartnerRows(groupTradeProfiles(order), tables))).toEqual(expected);
    }
  });
});
