import { z } from 'zod';
import { SourceMapSchema } from './SourceMapSchema.js';
import { SectionSchema } from './SectionSchema.js';

/**
 * Top-level document: a flat map, or an indexed map when `sections` is
 * present. Section offsets must be in ascending order.
 */
export const SourceMapDocumentSchema = SourceMapSchema.extend({
  sections: z.array(SectionSchema).nullish(),
}).superRefine((doc, ctx) => {
  const sections = doc.sections ?? [];
  for (let i = 1; i < sections.length; i++) {
    const prev = sections[i - 1].offset;
    const curr = sections[i].offset;
    if (
      curr.line < prev.line ||
      (curr.line === prev.line && curr.column < prev.column)
    ) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['sections', i, 'offset'],
        message: `Section offset ${curr.line}:${curr.column} precedes ${prev.line}:${prev.column}`,
      });
    }
  }
});
