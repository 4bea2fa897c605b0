import { describe, expect, it } from 'vitest';
import { DataValidationError } from '../../../lib/errors.js';
import {
  memorySinks,
  pipelineContext,
  staticReference,
  writeWorkbookFile,
} from '../../../lib/tests/ingest-fakes.js';
import { CUSTOMS_COUNTRIES_TABLE, processCustomsCountries } from './process-customs-countries.js';
import { CUSTOMS_ITEMS_TABLE, processCustomsItems } from './process-customs-items.js';

const reference = () =>
  staticReference({
    'customs-name-to-iso': { 독일: 'DE', 미국: 'US' },
    'iso-to-target-name': { DE: 'Germany', US: 'United States' },
  });

describe('processCustomsCountries', () => {
  it('drops the total row and unresolved countries, sorts by year then name', async () => {
    const path = await writeWorkbookFile({
      Sheet1: [
        ['수출입 실적(국가별)'],
        ['기간', '국가', '수출 건수', '수출 금액', '수입 건수', '수입 금액', '무역수지'],
        ['2024', '총계', 1, '1,000', 1, '800', '200'],
        ['2024', '독일', 1, '300.5', 1, '100', '200.5'],
        ['2023', '미국', 1, 250, 1, '', 250],
        ['2024', '미국', 1, 400, 1, '500.25', '-100.25'],
        ['2024', '남극', 1, 1, 1, 1, 0],
        ['합계', '독일', 0, 0, 0, 0, 0],
      ],
    });
    const { sinks, customsCountryStats } = memorySinks();

    const result = await processCustomsCountries(
      pipelineContext(path, { sinks, reference: reference() })
    );

    expect(result).toMatchObject({ resultTable: CUSTOMS_COUNTRIES_TABLE, count: 3, dropped: 1 });
    expect(customsCountryStats.records).toEqual([
      {
        year: '2023',
        nationCode: 'US',
        nationName: 'United States',
        exportAmount: '250.000',
        importAmount: '0.000',
        tradeBalance: '250.000',
      },
      {
        year: '2024',
        nationCode: 'DE',
        nationName: 'Germany',
        exportAmount: '300.500',
        importAmount: '100.000',
        tradeBalance: '200.500',
      },
      {
        year: '2024',
        nationCode: 'US',
        nationName: 'United States',
        exportAmount: '400.000',
        importAmount: '500.250',
        tradeBalance: '-100.250',
      },
    ]);
  });

  it('fails on a missing required column', async () => {
    const path = await writeWorkbookFile({
      Sheet1: [
        ['기간', '국가', '수출 금액', '수입 금액'],
        ['2024', '독일', 1, 1],
      ],
    });
    const run = processCustomsCountries(pipelineContext(path, { reference: reference() }));
    await expect(run).rejects.toBeInstanceOf(DataValidationError);
    await expect(run).rejects.toThrow('Missing required columns: 무역수지');
  });
});

describe('processCustomsItems', () => {
  const exportFile = () =>
    writeWorkbookFile({
      Sheet1: [
        ['기간', '국가', '수출입구분', '성질명', '중량', '금액'],
        ['2024', '미국', '수출', '1. 중화학 공업품', '1,500', '9000'],
        ['2024', '미국', '수출', '가. 식료 및 직접소비재', 10, '50'],
        ['2023', '독일', '수출', '카. 기 타', 5, '700'],
        ['2024', '독일', '수출', '바. 기 타', 7, '12000'],
        ['2024', '독일', '수출', '총계', 1, 1],
        ['2024', '남극', '수출', '가. 식료 및 직접소비재', 1, 1],
      ],
    });

  it('normalizes categories, bridges countries and sorts by year then amount', async () => {
    const { sinks, itemSink } = memorySinks();
    const result = await processCustomsItems(
      pipelineContext(await exportFile(), {
        job: 'customs:items',
        sinks,
        reference: reference(),
        params: { direction: 'export' },
      })
    );

    expect(result).toMatchObject({ resultTable: CUSTOMS_ITEMS_TABLE, count: 4, dropped: 1 });
    expect(itemSink('all').calls).toEqual([]);
    expect(itemSink('export').records).toEqual([
      {
        year: '2023',
        direction: 'export',
        nationCode: 'DE',
        nationName: 'Germany',
        itemName: '경공업품(기타)',
        itemWeight: '5.000',
        itemAmount: '700.000',
      },
      {
        year: '2024',
        direction: 'export',
        nationCode: 'DE',
        nationName: 'Germany',
        itemName: '중화학 공업품(기타)',
        itemWeight: '7.000',
        itemAmount: '12000.000',
      },
      {
        year: '2024',
        direction: 'export',
        nationCode: 'US',
        nationName: 'United States',
        itemName: '중화학 공업품',
        itemWeight: '1500.000',
        itemAmount: '9000.000',
      },
      {
        year: '2024',
        direction: 'export',
        nationCode: 'US',
        nationName: 'United States',
        itemName: '식료 및 직접소비재',
        itemWeight: '10.000',
        itemAmount: '50.000',
      },
    ]);
  });

  it('replaces the whole table when replaceAll is set', async () => {
    const { sinks, itemSink } = memorySinks();
    await processCustomsItems(
      pipelineContext(await exportFile(), {
        sinks,
        reference: reference(),
        params: { direction: 'export', replaceAll: true },
      })
    );
    expect(itemSink('all').calls).toEqual(['replaceAll']);
    expect(itemSink('export').calls).toEqual([]);
  });

  it('rejects a file whose flags do not carry the requested direction', async () => {
    const run = processCustomsItems(
      pipelineContext(await exportFile(), {
        reference: reference(),
        params: { direction: 'import' },
      })
    );
    await expect(run).rejects.toThrow('File direction does not match the requested direction.');
  });

  it('requires a direction', async () => {
    const run = processCustomsItems(pipelineContext(await exportFile(), { reference: reference() }));
    await expect(run).rejects.toBeInstanceOf(DataValidationError);
  });

  it('skips the direction check when the flag column is absent', async () => {
    const path = await writeWorkbookFile({
      Sheet1: [
        ['기간', '국가', '성질명', '중량', '금액'],
        ['2024', '독일', '라. 기 타', 2, 30],
      ],
    });
    const { sinks, itemSink } = memorySinks();
    const result = await processCustomsItems(
      pipelineContext(path, { sinks, reference: reference(), params: { direction: 'import' } })
    );
    expect(result.count).toBe(1);
    expect(itemSink('import').records[0]?.itemName).toBe('자본재(기타)');
  });
});
