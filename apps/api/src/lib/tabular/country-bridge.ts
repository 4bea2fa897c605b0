/** Read-only lookup from one naming system to another. */
export type CountryCodeMapping = ReadonlyMap<string, string>;

/**
 * `toCode` present: two hops (source name → canonical code → target name).
 * `toCode` absent: the token already is a canonical code; it is uppercased
 * and looked up in `toName` only.
 */
export type BridgeTables = {
  toCode?: CountryCodeMapping;
  toName: CountryCodeMapping;
};

export type BridgedCountry = { code: string; name: string };

export function bridgeCountry(
  token: string | null | undefined,
  tables: BridgeTables
): BridgedCountry | null {
  const key = (token ?? '').trim();
  if (!key) return null;

  const code = tables.toCode ? tables.toCode.get(key) : key.toUpperCase();
  if (code === undefined) return null;

  const name = tables.toName.get(code);
  return name === undefined ? null : { code, name };
}

export function resolveCountry(
  token: string | null | undefined,
  tables: BridgeTables
): string | null {
  return bridgeCountry(token, tables)?.name ?? null;
}

/**
 * Resolve every row's country and keep only the resolved ones. An unresolved
 * row means "not tracked in the target system"; it is counted, not raised.
 */
export function bridgeRows<T, R>(
  rows: readonly T[],
  pick: (row: T) => string | null | undefined,
  tables: BridgeTables,
  assign: (row: T, country: BridgedCountry) => R
): { rows: R[]; dropped: number } {
  const out: R[] = [];
  let dropped = 0;
  for (const row of rows) {
    const country = bridgeCountry(pick(row), tables);
    if (country) out.push(assign(row, country));
    else dropped++;
  }
  return { rows: out, dropped };
}

export function mappingFrom(entries: Iterable<readonly [string, string]>): CountryCodeMapping {
  const map = new Map<string, string>();
  for (const [key, value] of entries) map.set(key.trim(), value.trim());
  return map;
}
