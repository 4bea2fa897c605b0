export type CellValue = string | number | boolean | Date | null;

/** A cell plus its formatting signature (solid fill colour, six upper-case hex digits). */
export type RawCell = { value: CellValue; tag: string | null };
export type RawRow = readonly RawCell[];

/** Un-headered rows of one sheet, as read. */
export type RawTable = { name: string; rows: readonly RawRow[] };

export type HeaderSpec = readonly string[];

export const EMPTY_CELL: RawCell = Object.freeze({ value: null, tag: null });

export function cellText(cell: RawCell | undefined): string {
  const value = cell?.value ?? null;
  if (value === null) return '';
  if (value instanceof Date) return value.toISOString();
  return String(value);
}

export function isBlankCell(cell: RawCell | undefined): boolean {
  return cellText(cell).trim() === '';
}

/** Build a table of untagged cells; used for CSV input and in tests. */
export function rawTableFromValues(name: string, rows: readonly (readonly CellValue[])[]): RawTable {
  return {
    name,
    rows: rows.map((row) => row.map((value) => ({ value, tag: null }))),
  };
}
