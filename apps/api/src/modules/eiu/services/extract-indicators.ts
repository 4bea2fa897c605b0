import { locateTabular, readText, type RawRecord } from '../../../lib/tabular/header-locator.js';
import { cellText, type HeaderSpec, type RawTable } from '../../../lib/tabular/raw-table.js';
import {
  type CellClassifier,
  type ClassifiedValue,
  FORECAST,
  MISSING,
  serializeClassified,
} from './cell-classifier.js';
import {
  INDICATOR_COLUMN_FIELDS,
  type IndicatorCatalogEntry,
  type IndicatorField,
} from './indicator-catalog.js';

export const INDICATOR_HEADER: HeaderSpec = ['Series', 'Code'];

export type IndicatorRecord = {
  countryCode: string;
  code: string;
  title: string;
  currency: string;
  units: string;
  source: string;
  definition: string;
  note: string;
  published: string;
  /** Ascending by year once `extractIndicators` has padded every sheet. */
  years: Map<number, ClassifiedValue>;
};

export type IndicatorExtractorOptions = {
  catalog: readonly IndicatorCatalogEntry[];
  classifier: CellClassifier;
  /** Last year that gets a forecast slot. */
  horizonYear: number;
  columnFields?: Readonly<Record<string, IndicatorField>>;
};

export type SheetIndicators = {
  records: IndicatorRecord[];
  years: number[];
};

function isYearColumn(name: string) {
  return /^\d+$/.test(name);
}

function emptyRecord(countryCode: string, code: string): IndicatorRecord {
  return {
    countryCode,
    code,
    title: '',
    currency: '',
    units: '',
    source: '',
    definition: '',
    note: '',
    published: '',
    years: new Map(),
  };
}

function recordFromRow(
  countryCode: string,
  code: string,
  row: RawRecord,
  metaColumns: ReadonlyArray<readonly [string, IndicatorField]>,
  yearColumns: ReadonlyArray<readonly [string, number]>,
  classifier: CellClassifier
): IndicatorRecord {
  const record = emptyRecord(countryCode, code);
  for (const [column, field] of metaColumns) {
    if (field !== 'code') record[field] = readText(row, column);
  }
  for (const [column, year] of yearColumns) {
    const cell = row[column];
    record.years.set(year, cell ? classifier.classify(cell) : MISSING);
  }
  return record;
}

/**
 * One sheet = one country (the sheet name). Only catalog codes are kept, the
 * last row for a code wins, and catalog codes the sheet lacks are synthesized
 * with empty metadata and every year Missing.
 */
export function extractSheetIndicators(
  table: RawTable,
  opts: IndicatorExtractorOptions
): SheetIndicators {
  const { columns, rows } = locateTabular(table, INDICATOR_HEADER, { stopAtBlank: true });
  const fields = opts.columnFields ?? INDICATOR_COLUMN_FIELDS;

  const metaColumns: Array<readonly [string, IndicatorField]> = [];
  const yearColumns: Array<readonly [string, number]> = [];
  for (const column of columns) {
    const field = fields[column];
    if (field) metaColumns.push([column, field]);
    else if (isYearColumn(column)) yearColumns.push([column, Number(column)]);
  }

  const countryCode = table.name.trim();
  const catalogCodes = new Set(opts.catalog.map((entry) => entry.code));
  const byCode = new Map<string, IndicatorRecord>();

  for (const row of rows) {
    const code = cellText(row.Code).trim();
    if (!catalogCodes.has(code)) continue;
    byCode.set(
      code,
      recordFromRow(countryCode, code, row, metaColumns, yearColumns, opts.classifier)
    );
  }

  const years = yearColumns.map(([, year]) => year);
  for (const { code } of opts.catalog) {
    if (byCode.has(code)) continue;
    const record = emptyRecord(countryCode, code);
    for (const year of years) record.years.set(year, MISSING);
    byCode.set(code, record);
  }

  return { records: [...byCode.values()], years };
}

/**
 * Extract every sheet, then give all records the same year axis: years seen
 * in any sheet but absent from a record are Missing, and every year after the
 * global maximum up to `horizonYear` is Forecast.
 */
export function extractIndicators(
  tables: readonly RawTable[],
  opts: IndicatorExtractorOptions
): IndicatorRecord[] {
  const records: IndicatorRecord[] = [];
  const seenYears = new Set<number>();

  for (const table of tables) {
    const sheet = extractSheetIndicators(table, opts);
    records.push(...sheet.records);
    for (const year of sheet.years) seenYears.add(year);
  }

  const axis = [...seenYears].sort((a, b) => a - b);
  const maxYear = axis.at(-1);
  if (maxYear !== undefined) {
    for (let year = maxYear + 1; year <= opts.horizonYear; year++) axis.push(year);
  }

  for (const record of records) {
    const padded = new Map<number, ClassifiedValue>();
    for (const year of axis) {
      const known = record.years.get(year);
      padded.set(year, known ?? (maxYear !== undefined && year > maxYear ? FORECAST : MISSING));
    }
    record.years = padded;
  }
  return records;
}

export function serializeYears(years: ReadonlyMap<number, ClassifiedValue>): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [year, value] of years) out[String(year)] = serializeClassified(value);
  return out;
}
