import { type CountryMappingKind, countryCodeMappingsTable, db } from '@statbridge/db';
import type { CountryCodeMappingInsert } from '@statbridge/types';
import { eq, sql } from 'drizzle-orm';
import { type CountryCodeMapping, mappingFrom } from '../tabular/country-bridge.js';

export interface ReferenceData {
  lookup(kind: CountryMappingKind): Promise<CountryCodeMapping>;
}

export type MappingLoader = (
  kind: CountryMappingKind
) => Promise<ReadonlyArray<{ sourceKey: string; targetValue: string }>>;

export const loadMappingRows: MappingLoader = async (kind) =>
  db
    .select({
      sourceKey: countryCodeMappingsTable.sourceKey,
      targetValue: countryCodeMappingsTable.targetValue,
    })
    .from(countryCodeMappingsTable)
    .where(eq(countryCodeMappingsTable.mappingKind, kind));

/** Partner names are matched lower-case, so their keys are stored and looked up that way. */
export function normalizeSourceKey(kind: CountryMappingKind, sourceKey: string): string {
  const key = sourceKey.trim();
  return kind === 'partner-name-to-iso' ? key.toLowerCase() : key;
}

/** Each instance caches what it loads; create one per run so a run sees a fixed snapshot. */
export function createReferenceData(load: MappingLoader = loadMappingRows): ReferenceData {
  const cache = new Map<CountryMappingKind, Promise<CountryCodeMapping>>();
  return {
    lookup(kind) {
      let pending = cache.get(kind);
      if (!pending) {
        pending = load(kind).then((rows) =>
          mappingFrom(rows.map((r) => [normalizeSourceKey(kind, r.sourceKey), r.targetValue] as const))
        );
        cache.set(kind, pending);
      }
      return pending;
    },
  };
}

export async function upsertCountryMappings(rows: readonly CountryCodeMappingInsert[]) {
  if (rows.length === 0) return 0;
  const written = await db
    .insert(countryCodeMappingsTable)
    .values([...rows])
    .onConflictDoUpdate({
      target: [countryCodeMappingsTable.mappingKind, countryCodeMappingsTable.sourceKey],
      set: { targetValue: sql`excluded.target_value`, updatedAt: sql`now()` },
    })
    .returning({ id: countryCodeMappingsTable.id });
  return written.length;
}
