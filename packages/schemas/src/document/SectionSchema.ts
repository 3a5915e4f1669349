import { z } from 'zod';
import { SourceMapSchema } from './SourceMapSchema.js';

export const SectionOffsetSchema = z.object({
  line: z.number().int().nonnegative(),
  column: z.number().int().nonnegative(),
});

// A section's embedded map must be flat
export const SectionMapSchema = SourceMapSchema.extend({
  sections: z
    .never({ message: 'Nested indexed maps are not supported' })
    .optional(),
});

export const SectionSchema = z
  .object({
    offset: SectionOffsetSchema,
    map: SectionMapSchema.optional(),
    url: z.string().optional(),
  })
  .transform((section, ctx) => {
    if (!section.map) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['map'],
        message:
          section.url !== undefined
            ? `Sections referencing external maps are not supported (${section.url})`
            : "Section must have a 'map'",
      });
      return z.NEVER;
    }
    return { offset: section.offset, map: section.map };
  });
