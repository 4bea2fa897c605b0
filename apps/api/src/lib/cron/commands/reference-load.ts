import { CountryCodeMappingInsertSchema, CountryMappingKindSchema } from '@statbridge/types';
import type { CountryCodeMappingInsert } from '@statbridge/types';
import { readText } from '../../tabular/header-locator.js';
import { readTabular } from '../../tabular/read-workbook.js';
import { normalizeSourceKey, upsertCountryMappings } from '../../ingest/reference-data.js';
import { type Command, cliLogger, printResult } from '../runtime.js';
import { flagAs, parseFlags, requireFlag } from '../utils.js';

export const REFERENCE_HEADER = ['source_key', 'target_value'] as const;

/**
 * reference:load --kind=<mapping kind> --file=<.csv|.xlsx>
 * The file carries a `source_key,target_value` header; rows with a blank side are skipped.
 */
export const referenceLoad: Command = async (argv) => {
  const flags = parseFlags(argv);
  const mappingKind = flagAs(flags, 'kind', CountryMappingKindSchema);
  if (!mappingKind) {
    throw new Error(`reference:load needs --kind=<${CountryMappingKindSchema.options.join('|')}>`);
  }

  const tabular = await readTabular(requireFlag(flags, 'file'), REFERENCE_HEADER);

  const rows: CountryCodeMappingInsert[] = [];
  let skipped = 0;
  for (const record of tabular.rows) {
    const parsed = CountryCodeMappingInsertSchema.safeParse({
      mappingKind,
      sourceKey: normalizeSourceKey(mappingKind, readText(record, 'source_key')),
      targetValue: readText(record, 'target_value'),
    });
    if (parsed.success) rows.push(parsed.data);
    else skipped++;
  }
  if (skipped > 0) cliLogger.warn({ mappingKind, skipped }, 'reference rows skipped');

  const upserted = await upsertCountryMappings(rows);
  printResult({ ok: true, mappingKind, upserted, skipped });
};
