import type { RawCell } from '../../../lib/tabular/raw-table.js';

export type ClassifiedValue =
  | { kind: 'actual' | 'estimate'; value: number }
  | { kind: 'forecast' | 'missing' | 'unknown' };

export type ValueKind = ClassifiedValue['kind'];

/** Decides a year cell's provenance; the colour convention is one implementation. */
export interface CellClassifier {
  classify(cell: RawCell): ClassifiedValue;
}

export const MISSING_MARKER = '–';
export const ESTIMATE_COLOR = '00588D';

const KIND_TOKENS: Record<ValueKind, string> = {
  actual: 'ACT',
  estimate: 'EST',
  forecast: 'FOR',
  missing: MISSING_MARKER,
  unknown: '?',
};

export const MISSING: ClassifiedValue = { kind: 'missing' };
export const FORECAST: ClassifiedValue = { kind: 'forecast' };

/**
 * One decimal, with exact binary ties (x.x5 where `n * 4` is odd) going to the
 * even digit; every other value rounds to nearest from its exact binary value.
 */
export function roundToTenth(n: number): number {
  const quarters = n * 4;
  if (Number.isInteger(quarters) && quarters % 2 !== 0) {
    const lower = Math.floor(n * 10);
    return (lower % 2 === 0 ? lower : lower + 1) / 10;
  }
  return Number(n.toFixed(1));
}

/** Numeric payload of a cell, or null for blank/sentinel; NaN for non-numeric text. */
function numericValue(cell: RawCell): number | null {
  const { value } = cell;
  if (value === null) return null;
  if (typeof value === 'number') return value;
  if (typeof value !== 'string') return Number.NaN;
  const text = value.trim();
  if (text === '' || text === MISSING_MARKER) return null;
  return Number(text);
}

export class ColorSignatureClassifier implements CellClassifier {
  private readonly signature: string;

  constructor(estimateColor: string = ESTIMATE_COLOR) {
    this.signature = estimateColor.trim().toUpperCase().slice(-6);
  }

  classify(cell: RawCell): ClassifiedValue {
    const n = numericValue(cell);
    if (n === null) return MISSING;
    if (!Number.isFinite(n)) return { kind: 'unknown' };

    const tag = cell.tag?.trim().toUpperCase().slice(-6) ?? null;
    return { kind: tag === this.signature ? 'estimate' : 'actual', value: roundToTenth(n) };
  }
}

/** `ACT|1.5`, `EST|-0.3`, or the bare token for payload-less kinds. */
export function serializeClassified(v: ClassifiedValue): string {
  const token = KIND_TOKENS[v.kind];
  return v.kind === 'actual' || v.kind === 'estimate' ? `${token}|${v.value.toFixed(1)}` : token;
}
