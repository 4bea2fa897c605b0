import ExcelJS from 'exceljs';
import type { Cell, CellValue as ExcelCellValue, Fill, Worksheet } from 'exceljs';
import * as XLSX from 'xlsx';
import { readFile } from 'node:fs/promises';
import { extname } from 'node:path';
import {
  DataValidationError,
  errorMessage,
  FileNotReadableError,
  IngestErrorCode,
} from '../errors.js';
import { locateTabular, type Tabular } from './header-locator.js';
import type { CellValue, HeaderSpec, RawCell, RawTable } from './raw-table.js';

type SheetFilter = (sheet: string) => boolean;

/**
 * Font colour of a solid-filled cell (six upper-case hex digits, ARGB alpha
 * dropped), or null. Estimates in EIU exports are coloured text on a solid fill.
 */
export function cellTag(cell: Pick<Cell, 'fill' | 'font'>): string | null {
  const fill: Fill | undefined = cell.fill;
  if (fill?.type !== 'pattern' || fill.pattern !== 'solid') return null;
  const argb = cell.font?.color?.argb;
  if (typeof argb !== 'string') return null;
  const rgb = argb.trim().toUpperCase();
  return /^[0-9A-F]{6,8}$/.test(rgb) ? rgb.slice(-6) : null;
}

function scalarValue(v: unknown): CellValue {
  if (typeof v === 'string' || typeof v === 'number' || typeof v === 'boolean') return v;
  return v instanceof Date ? v : null;
}

export function toCellValue(value: ExcelCellValue): CellValue {
  if (value === null || value === undefined) return null;
  if (typeof value !== 'object' || value instanceof Date) return value;
  if ('richText' in value) return value.richText.map((run) => run.text).join('');
  if ('error' in value) return null;
  if ('hyperlink' in value) return value.text;
  if ('formula' in value || 'sharedFormula' in value) return scalarValue(value.result);
  return null;
}

/** Reads the used range from A1 so row indices match the sheet's own rows. */
export function readWorksheet(worksheet: Worksheet): RawTable {
  const rows: RawCell[][] = [];
  const width = worksheet.columnCount;
  for (let r = 1; r <= worksheet.rowCount; r++) {
    const row: RawCell[] = [];
    for (let c = 1; c <= width; c++) {
      const cell = worksheet.getCell(r, c);
      // Only the top-left cell of a merged range carries the value.
      const value = cell.master.address === cell.address ? toCellValue(cell.value) : null;
      row.push({ value, tag: cellTag(cell) });
    }
    rows.push(row);
  }
  return { name: worksheet.name, rows };
}

/** CSV cells carry no formatting, so every tag is null. */
export function readCsvSheet(worksheet: XLSX.WorkSheet, name: string): RawTable {
  const values = XLSX.utils.sheet_to_json<unknown[]>(worksheet, { header: 1, blankrows: true, defval: null });
  const rows = values.map((row) =>
    row.map((v): RawCell => ({ value: scalarValue(v), tag: null }))
  );
  return { name, rows };
}

async function loadXlsx(buffer: Buffer, include?: SheetFilter): Promise<RawTable[]> {
  const workbook = new ExcelJS.Workbook();
  await workbook.xlsx.load(buffer);
  return workbook.worksheets
    .filter((worksheet) => !include || include(worksheet.name))
    .map(readWorksheet);
}

function loadCsv(buffer: Buffer, include?: SheetFilter): RawTable[] {
  const workbook = XLSX.read(buffer.toString('utf8'), { type: 'string', raw: true });
  const tables: RawTable[] = [];
  for (const name of workbook.SheetNames) {
    if (include && !include(name)) continue;
    const worksheet = workbook.Sheets[name];
    if (worksheet) tables.push(readCsvSheet(worksheet, name));
  }
  return tables;
}

/**
 * Read every sheet (or those accepted by `include`) of an .xlsx or .csv file.
 * CSV text is decoded as UTF-8 and surfaces as a single sheet.
 */
export async function readWorkbook(
  path: string,
  opts: { include?: SheetFilter } = {}
): Promise<RawTable[]> {
  try {
    const buffer = await readFile(path);
    return extname(path).toLowerCase() === '.csv'
      ? loadCsv(buffer, opts.include)
      : await loadXlsx(buffer, opts.include);
  } catch (err) {
    throw new FileNotReadableError(
      IngestErrorCode.FILE_READ,
      `Failed to read file: ${errorMessage(err)}`,
      { path },
      { cause: err }
    );
  }
}

/** First sheet (or the named one) of a file, cut at the row matching `header`. */
export async function readTabular(path: string, header: HeaderSpec, sheet?: string): Promise<Tabular> {
  const [table] = await readWorkbook(path, {
    include: sheet === undefined ? undefined : (name) => name === sheet,
  });
  if (!table) {
    throw new DataValidationError(sheet ? `Sheet not found: ${sheet}` : 'Workbook has no sheets.', {
      path,
    });
  }
  return locateTabular(table, header);
}
