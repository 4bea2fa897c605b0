import { DataValidationError, HeaderNotFoundError } from '../errors.js';
import {
  cellText,
  EMPTY_CELL,
  type HeaderSpec,
  isBlankCell,
  type RawCell,
  type RawTable,
} from './raw-table.js';

export const HEADER_SCAN_ROWS = 20;

export type RawRecord = Readonly<Record<string, RawCell>>;

/** Rows below a located header, keyed by column name. */
export type Tabular = {
  sheet: string;
  columns: string[];
  rows: RawRecord[];
};

/**
 * Index of the first row (within the first `maxRows`) whose leading cells,
 * trimmed, equal `spec` position by position. Trailing cells are ignored.
 */
export function locateHeader(
  table: RawTable,
  spec: HeaderSpec,
  opts: { maxRows?: number } = {}
): number | null {
  if (spec.length === 0) return null;
  const limit = Math.min(opts.maxRows ?? HEADER_SCAN_ROWS, table.rows.length);

  for (let i = 0; i < limit; i++) {
    const row = table.rows[i] ?? [];
    if (spec.every((name, col) => cellText(row[col]).trim() === name)) return i;
  }
  return null;
}

export function requireHeader(
  table: RawTable,
  spec: HeaderSpec,
  opts: { maxRows?: number } = {}
): number {
  const index = locateHeader(table, spec, opts);
  if (index === null) throw new HeaderNotFoundError(table.name, spec);
  return index;
}

/**
 * Column names come from the header row (trimmed). With `stopAtBlank`, the
 * column list ends at the first blank header cell. Blank data rows are skipped;
 * a repeated column name keeps its first position.
 */
export function tableFromHeader(
  table: RawTable,
  headerIndex: number,
  opts: { stopAtBlank?: boolean } = {}
): Tabular {
  const headerRow = table.rows[headerIndex] ?? [];
  let names = headerRow.map((cell) => cellText(cell).trim());
  if (opts.stopAtBlank) {
    const firstBlank = names.indexOf('');
    if (firstBlank >= 0) names = names.slice(0, firstBlank);
  }

  const positions = new Map<string, number>();
  names.forEach((name, idx) => {
    if (name && !positions.has(name)) positions.set(name, idx);
  });
  const columns = [...positions.keys()];

  const rows: RawRecord[] = [];
  for (const row of table.rows.slice(headerIndex + 1)) {
    if (row.every((cell) => isBlankCell(cell))) continue;
    const record: Record<string, RawCell> = {};
    for (const [name, idx] of positions) record[name] = row[idx] ?? EMPTY_CELL;
    rows.push(record);
  }

  return { sheet: table.name, columns, rows };
}

export function locateTabular(
  table: RawTable,
  spec: HeaderSpec,
  opts: { maxRows?: number; stopAtBlank?: boolean } = {}
): Tabular {
  return tableFromHeader(table, requireHeader(table, spec, opts), opts);
}

/** Trimmed text of a named column; '' when absent. */
export function readText(record: RawRecord, column: string): string {
  return cellText(record[column]).trim();
}

/** Missing required columns fail the run before any row is touched. */
export function requireColumns(tabular: Tabular, required: readonly string[]) {
  const missing = required.filter((column) => !tabular.columns.includes(column));
  if (missing.length > 0) {
    throw new DataValidationError(`Missing required columns: ${missing.join(', ')}`, {
      sheet: tabular.sheet,
      missing,
    });
  }
}
