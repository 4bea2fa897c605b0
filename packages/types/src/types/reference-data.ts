import { z } from 'zod/v4';
import { CountryCodeMappingInsertSchema, CountryMappingKindSchema } from '../schemas/index.js';

export type CountryMappingKind = z.infer<typeof CountryMappingKindSchema>;
export type CountryCodeMappingInsert = z.infer<typeof CountryCodeMappingInsertSchema>;
