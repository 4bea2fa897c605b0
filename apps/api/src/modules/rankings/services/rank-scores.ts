import { DataProcessingError } from '../../../lib/errors.js';
import { cellText, type RawCell } from '../../../lib/tabular/raw-table.js';

/** Integer rank of a cell; null when blank. */
export function parseRank(cell: RawCell | undefined): number | null {
  const text = cellText(cell).trim();
  if (!text) return null;
  const rank = Number(text);
  if (!Number.isInteger(rank)) {
    throw new DataProcessingError(`Invalid rank value: ${text}`, { details: { value: text } });
  }
  return rank;
}

/** Numeric score of a cell; null when blank or not a number. */
export function parseScore(cell: RawCell | undefined): number | null {
  const text = cellText(cell).trim().replace(/,/g, '');
  if (!text) return null;
  const score = Number(text);
  return Number.isFinite(score) ? score : null;
}

/**
 * Competition ranking: the highest score is 1 and tied scores share the
 * lowest rank of their group (90, 85, 85, 80 → 1, 2, 2, 4).
 */
export function rankScores(scores: readonly number[]): number[] {
  const sorted = [...scores].sort((a, b) => b - a);
  const firstPosition = new Map<number, number>();
  sorted.forEach((score, idx) => {
    if (!firstPosition.has(score)) firstPosition.set(score, idx + 1);
  });
  return scores.map((score) => firstPosition.get(score) ?? sorted.length);
}
