import type { TradeDirection } from '@statbridge/db';

export type CategoryClass =
  | { kind: 'major'; label: string; stripped: string }
  | { kind: 'sub'; label: string; stripped: string }
  | { kind: 'unclassified'; label: string };

const MAJOR_HEADING = /^(1|2)\.\s*/;
const SUB_HEADING = /^[가-하]\.\s*/;

export type CategoryRules = {
  /** Heading kinds kept for the direction. */
  keep: ReadonlySet<'major' | 'sub'>;
  /** Label prefix → replacement label, applied before the prefix is stripped. */
  relabel: ReadonlyMap<string, string>;
};

export const CATEGORY_RULES: Readonly<Record<TradeDirection, CategoryRules>> = {
  export: {
    keep: new Set<'major' | 'sub'>(['major', 'sub']),
    relabel: new Map([
      ['카. 기 타', '카. 경공업품(기타)'],
      ['바. 기 타', '바. 중화학 공업품(기타)'],
    ]),
  },
  import: {
    keep: new Set<'major' | 'sub'>(['sub']),
    relabel: new Map([
      ['라. 기 타', '라. 자본재(기타)'],
      ['자. 기 타', '자. 원자재(기타)'],
    ]),
  },
};

export function classifyCategory(text: string): CategoryClass {
  const label = text.trim();
  const major = MAJOR_HEADING.exec(label);
  if (major) return { kind: 'major', label, stripped: label.slice(major[0].length).trim() };
  const sub = SUB_HEADING.exec(label);
  if (sub) return { kind: 'sub', label, stripped: label.slice(sub[0].length).trim() };
  return { kind: 'unclassified', label };
}

export function relabelCategory(
  label: string,
  relabel: ReadonlyMap<string, string>
): string | undefined {
  for (const [prefix, replacement] of relabel) {
    if (label.startsWith(prefix)) return replacement;
  }
  return undefined;
}

/**
 * Keep the rows whose category is a heading the direction tracks, with the
 * category relabelled and stripped of its prefix.
 */
export function normalizeCategories<T>(
  rows: readonly T[],
  pick: (row: T) => string,
  rules: CategoryRules
): Array<{ row: T; category: string }> {
  const out: Array<{ row: T; category: string }> = [];
  for (const row of rows) {
    const heading = classifyCategory(pick(row));
    if (heading.kind === 'unclassified' || !rules.keep.has(heading.kind)) continue;

    const relabelled = relabelCategory(heading.label, rules.relabel);
    const category = relabelled === undefined ? heading : classifyCategory(relabelled);
    out.push({ row, category: category.kind === 'unclassified' ? category.label : category.stripped });
  }
  return out;
}
