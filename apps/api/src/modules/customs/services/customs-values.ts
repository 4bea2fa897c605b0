import { DataProcessingError } from '../../../lib/errors.js';
import { cellText, type RawCell } from '../../../lib/tabular/raw-table.js';

/** First 4-digit run of a period label ("2024년 01월" → "2024"), or null. */
export function extractYear(cell: RawCell | undefined): string | null {
  return /(\d{4})/.exec(cellText(cell))?.[1] ?? null;
}

/**
 * Numeric string with 3 decimals for a numeric(…, 3) column. Thousands
 * separators are dropped; blank reads as zero.
 */
export function toAmount(cell: RawCell | undefined, column: string): string {
  const value = cell?.value ?? null;
  const n =
    typeof value === 'number' ? value : Number(cellText(cell).replace(/[,\s]/g, '') || '0');
  if (!Number.isFinite(n)) {
    throw new DataProcessingError(`Invalid amount in column "${column}": ${cellText(cell)}`, {
      details: { column, value: cellText(cell) },
    });
  }
  const s = n.toFixed(3);
  return Number(s) === 0 ? '0.000' : s;
}
