import type { z } from 'zod';
import type { NameEntrySchema, SourceMapSchema } from './SourceMapSchema.js';
import type {
  SectionMapSchema,
  SectionOffsetSchema,
  SectionSchema,
} from './SectionSchema.js';
import type { SourceMapDocumentSchema } from './SourceMapDocumentSchema.js';
import type { ParseOptionsSchema } from './ParseOptionsSchema.js';

export { NameEntrySchema, SourceMapSchema } from './SourceMapSchema.js';
export {
  SectionMapSchema,
  SectionOffsetSchema,
  SectionSchema,
} from './SectionSchema.js';
export { SourceMapDocumentSchema } from './SourceMapDocumentSchema.js';
export { LoggerSchema, ParseOptionsSchema } from './ParseOptionsSchema.js';

export type NameEntryZod = z.infer<typeof NameEntrySchema>;
export type SourceMapZod = z.infer<typeof SourceMapSchema>;
export type SectionOffsetZod = z.infer<typeof SectionOffsetSchema>;
export type SectionMapZod = z.infer<typeof SectionMapSchema>;
export type SectionZod = z.infer<typeof SectionSchema>;
export type SourceMapDocumentZod = z.infer<typeof SourceMapDocumentSchema>;
export type ParseOptionsInput = z.input<typeof ParseOptionsSchema>;
export type ParseOptions = z.infer<typeof ParseOptionsSchema>;
