import type { CustomsCountryStatInsert } from '../../../lib/ingest/sinks.js';
import type { PipelineContext, PipelineResult } from '../../../lib/ingest/types.js';
import { bridgeRows } from '../../../lib/tabular/country-bridge.js';
import { readText, requireColumns } from '../../../lib/tabular/header-locator.js';
import type { HeaderSpec } from '../../../lib/tabular/raw-table.js';
import { readTabular } from '../../../lib/tabular/read-workbook.js';
import { extractYear, toAmount } from './customs-values.js';

export const CUSTOMS_COUNTRIES_TABLE = 'customs_country_stats';

export const CUSTOMS_HEADER: HeaderSpec = ['기간', '국가'];

export const COUNTRY_COLUMNS = {
  period: '기간',
  country: '국가',
  exportAmount: '수출 금액',
  importAmount: '수입 금액',
  tradeBalance: '무역수지',
} as const;

export const TOTAL_ROW_LABEL = '총계';

export function byYearThenName<T extends { year: string; nationName: string }>(a: T, b: T) {
  return a.year.localeCompare(b.year) || a.nationName.localeCompare(b.nationName);
}

export async function processCustomsCountries(ctx: PipelineContext): Promise<PipelineResult> {
  const tabular = await readTabular(ctx.filePath, CUSTOMS_HEADER);
  requireColumns(tabular, Object.values(COUNTRY_COLUMNS));

  const dataRows = tabular.rows.filter(
    (row) =>
      readText(row, COUNTRY_COLUMNS.country) !== TOTAL_ROW_LABEL &&
      extractYear(row[COUNTRY_COLUMNS.period]) !== null
  );

  const [toCode, toName] = await Promise.all([
    ctx.reference.lookup('customs-name-to-iso'),
    ctx.reference.lookup('iso-to-target-name'),
  ]);

  const { rows, dropped } = bridgeRows(
    dataRows,
    (row) => readText(row, COUNTRY_COLUMNS.country),
    { toCode, toName },
    (row, country): CustomsCountryStatInsert => ({
      year: extractYear(row[COUNTRY_COLUMNS.period]) ?? '',
      nationCode: country.code,
      nationName: country.name,
      exportAmount: toAmount(row[COUNTRY_COLUMNS.exportAmount], COUNTRY_COLUMNS.exportAmount),
      importAmount: toAmount(row[COUNTRY_COLUMNS.importAmount], COUNTRY_COLUMNS.importAmount),
      tradeBalance: toAmount(row[COUNTRY_COLUMNS.tradeBalance], COUNTRY_COLUMNS.tradeBalance),
    })
  );
  rows.sort(byYearThenName);

  ctx.log.info({ kept: rows.length, dropped }, 'customs country rows bridged');

  const count = await ctx.sinks.customsCountryStats.replaceAll(rows);
  return {
    resultTable: CUSTOMS_COUNTRIES_TABLE,
    count,
    dropped,
    csvRows: rows.map((row) => ({
      year: row.year,
      nation_code: row.nationCode,
      nation_name: row.nationName,
      export_amount: row.exportAmount,
      import_amount: row.importAmount,
      trade_balance: row.tradeBalance,
    })),
  };
}
