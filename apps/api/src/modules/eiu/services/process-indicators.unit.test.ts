import { describe, expect, it } from 'vitest';
import {
  memorySinks,
  pipelineContext,
  staticReference,
  writeWorkbookFile,
} from '../../../lib/tests/ingest-fakes.js';
import { INDICATOR_CATALOG } from './indicator-catalog.js';
import { INDICATORS_TABLE, processIndicators } from './process-indicators.js';

describe('processIndicators', () => {
  it('writes catalog-sized output per sheet with forecast slots to 2051', async () => {
    const path = await writeWorkbookFile({
      KR: [
        ['Series', 'Code', 'Currency', 'Units', '2023'],
        ['Real GDP growth', 'DGDP', '', '%', 1.5],
      ],
      ZZ: [['Series', 'Code', '2023']],
    });
    const { sinks, economicIndicators } = memorySinks();
    const ctx = pipelineContext(path, {
      job: 'eiu:indicators',
      sinks,
      reference: staticReference({ 'indicator-code-to-english-name': { KR: 'Korea, Republic of' } }),
    });

    const result = await processIndicators(ctx);

    expect(result.resultTable).toBe(INDICATORS_TABLE);
    expect(result.count).toBe(INDICATOR_CATALOG.length * 2);
    expect(economicIndicators.calls).toEqual(['replaceAll']);

    const gdp = economicIndicators.records.find((r) => r.countryCode === 'KR' && r.code === 'DGDP');
    expect(gdp).toMatchObject({
      countryName: 'Korea, Republic of',
      title: 'Real GDP growth',
      units: '%',
    });
    expect(Object.keys(gdp?.years ?? {})).toHaveLength(2051 - 2023 + 1);
    expect(gdp?.years['2023']).toBe('ACT|1.5');
    expect(gdp?.years['2051']).toBe('FOR');

    // unresolved sheets keep their rows with an empty name
    const unresolved = economicIndicators.records.filter((r) => r.countryCode === 'ZZ');
    expect(unresolved).toHaveLength(INDICATOR_CATALOG.length);
    expect(unresolved.every((r) => r.countryName === '')).toBe(true);

    expect(result.csvRows?.[0]).toMatchObject({ country_code: 'KR', year_2023: expect.any(String) });
  });

  it('stores estimates from cells with the estimate font colour on a solid fill', async () => {
    const path = await writeWorkbookFile({
      KR: [
        ['Series', 'Code', '2023', '2024'],
        [
          'Real GDP growth',
          'DGDP',
          { value: 1.5, fill: 'FF00588D', font: 'FF000000' },
          { value: 2.34, fill: 'FFDCE6F1', font: '0000588D' },
        ],
      ],
    });
    const { sinks, economicIndicators } = memorySinks();
    const ctx = pipelineContext(path, {
      job: 'eiu:indicators',
      sinks,
      reference: staticReference({ 'indicator-code-to-english-name': { KR: 'Korea, Republic of' } }),
    });

    await processIndicators(ctx);

    const gdp = economicIndicators.records.find((r) => r.code === 'DGDP');
    expect(gdp?.years['2023']).toBe('ACT|1.5');
    expect(gdp?.years['2024']).toBe('EST|2.3');
  });
});
