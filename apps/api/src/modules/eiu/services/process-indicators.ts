import type { PipelineContext, PipelineResult } from '../../../lib/ingest/types.js';
import type { EconomicIndicatorInsert } from '../../../lib/ingest/sinks.js';
import { resolveCountry } from '../../../lib/tabular/country-bridge.js';
import type { CsvRow } from '../../../lib/tabular/csv-export.js';
import { readWorkbook } from '../../../lib/tabular/read-workbook.js';
import { ColorSignatureClassifier } from './cell-classifier.js';
import { extractIndicators, serializeYears } from './extract-indicators.js';
import { INDICATOR_CATALOG } from './indicator-catalog.js';

export const INDICATORS_TABLE = 'economic_indicators';

function toCsvRow(row: EconomicIndicatorInsert): CsvRow {
  const flat: Record<string, string> = {
    country_code: row.countryCode,
    country_name: row.countryName ?? '',
    code: row.code,
    title: row.title ?? '',
    currency: row.currency ?? '',
    units: row.units ?? '',
  };
  for (const [year, token] of Object.entries(row.years)) flat[`year_${year}`] = token;
  return flat;
}

export async function processIndicators(ctx: PipelineContext): Promise<PipelineResult> {
  const tables = await readWorkbook(ctx.filePath);
  const records = extractIndicators(tables, {
    catalog: INDICATOR_CATALOG,
    classifier: new ColorSignatureClassifier(),
    horizonYear: ctx.config.horizonYear,
  });

  // Unresolved names are kept as '' so each sheet still yields one row per catalog code.
  const names = await ctx.reference.lookup('indicator-code-to-english-name');
  const rows: EconomicIndicatorInsert[] = records.map((record) => ({
    countryCode: record.countryCode,
    countryName: resolveCountry(record.countryCode, { toName: names }) ?? '',
    code: record.code,
    title: record.title,
    currency: record.currency,
    units: record.units,
    years: serializeYears(record.years),
  }));

  ctx.log.info({ sheets: tables.length, records: rows.length }, 'indicators extracted');

  const count = await ctx.sinks.economicIndicators.replaceAll(rows);
  return { resultTable: INDICATORS_TABLE, count, csvRows: rows.map(toCsvRow) };
}
