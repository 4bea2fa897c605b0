import { z } from 'zod/v4';
import { createInsertSchema } from 'drizzle-zod';
import { countryCodeMappingsTable, countryMappingKinds } from '@statbridge/db';

export const CountryMappingKindSchema = z.enum(countryMappingKinds);

export const CountryCodeMappingInsertSchema = createInsertSchema(countryCodeMappingsTable, {
  sourceKey: (s) => s.trim().min(1),
  targetValue: (s) => s.trim().min(1),
});
