// Flat (non-indexed) source map document
import { z } from 'zod';

/**
 * A `names` entry. Some producers emit bare numbers instead of strings.
 */
export const NameEntrySchema = z.union([z.string(), z.number().finite()]);

export const SourceMapSchema = z.object({
  version: z.number().int().nullish(),
  file: z.string().nullish(),
  sourceRoot: z.string().nullish(),
  sources: z
    .array(z.string().nullable())
    .nullish()
    .transform((sources) => (sources ?? []).map((source) => source ?? '')),
  names: z
    .array(NameEntrySchema)
    .nullish()
    .transform((names) => names ?? []),
  mappings: z
    .string()
    .nullish()
    .transform((mappings) => mappings ?? ''),
});
