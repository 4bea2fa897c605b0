import type { TradeDirection } from '@statbridge/db';
import { locateTabular, readText } from '../../../lib/tabular/header-locator.js';
import type { HeaderSpec, RawCell, RawTable } from '../../../lib/tabular/raw-table.js';
import { MISSING_MARKER } from './cell-classifier.js';

export const TRADE_PARTNER_HEADER: HeaderSpec = ['Geography', 'Code'];

export const SHEET_PREFIXES: Readonly<Record<TradeDirection, string>> = {
  export: 'XPM',
  import: 'MPM',
};

const PARTNER_PATTERNS: Readonly<Record<TradeDirection, RegExp>> = {
  export: /Exports (?:from|to) (?:the\s+)?([^,]+?)(?:,)?\s*(?:as a percentage|as percentage)/i,
  import: /Imports (?:from|to) (?:the\s+)?([^,]+?)(?:,)?\s*(?:as a percentage|as percentage)/i,
};

export type TradeRelation = {
  countryName: string;
  countryCode: string;
  partner: string | null;
  rate: number;
  direction: TradeDirection;
};

export function sheetDirection(sheetName: string): TradeDirection | null {
  if (sheetName.startsWith(SHEET_PREFIXES.export)) return 'export';
  if (sheetName.startsWith(SHEET_PREFIXES.import)) return 'import';
  return null;
}

export function isTradePartnerSheet(sheetName: string) {
  return sheetDirection(sheetName) !== null;
}

/** "Exports to Germany, as a percentage of total" → "Germany". */
export function extractPartnerName(definition: string, direction: TradeDirection): string | null {
  const match = PARTNER_PATTERNS[direction].exec(definition.trim());
  const name = match?.[1]?.trim();
  return name ? name : null;
}

/** Blank, the missing marker and non-numeric text all read as 0. */
export function parseRate(cell: RawCell | undefined): number {
  const value = cell?.value ?? null;
  if (typeof value === 'number') return Number.isFinite(value) ? value : 0;
  if (typeof value !== 'string') return 0;
  const text = value.trim();
  if (!text || text === MISSING_MARKER) return 0;
  const n = Number(text);
  return Number.isFinite(n) ? n : 0;
}

/** Relations of one XPM/MPM sheet; other sheets yield nothing. */
export function extractTradeRelations(table: RawTable): TradeRelation[] {
  const direction = sheetDirection(table.name);
  if (!direction) return [];

  const { columns, rows } = locateTabular(table, TRADE_PARTNER_HEADER);
  const rateColumn = columns.find((c) => /^\d{4}$/.test(c));

  return rows.map((row) => ({
    countryName: readText(row, 'Geography'),
    countryCode: readText(row, 'Code'),
    partner: extractPartnerName(readText(row, 'Definition'), direction),
    rate: rateColumn ? parseRate(row[rateColumn]) : 0,
    direction,
  }));
}
