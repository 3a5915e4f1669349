export { Consumer, parse } from './consumer.js';
export type { Section } from './consumer.js';
export { SubMap } from './sub-map.js';
export type { SubMapOptions } from './sub-map.js';
export { PositionIndex } from './position-index.js';
export { SourceRootResolver, hasUriScheme, isAbsoluteUrl } from './source-root.js';
export { parseDocument, checkVersion } from './document-parser.js';
export type { ParsedDocument, ParsedSection } from './document-parser.js';
export { decodeMappings, compareGenerated, VlqReader } from './mappings/index.js';
export type { DecodedMappings } from './mappings/index.js';
export { renderName, toNameEntry } from './names.js';
export type { NameEntry } from './names.js';
export { SourceMapError, SourceMapErrorCode } from './errors/index.js';
export { NO_INDEX, NOT_FOUND } from './types.js';
export type { MappingRecord, SectionOffset, SourceLookupResult } from './types.js';
export type { ParseOptions, ParseOptionsInput } from '@srcmap/schemas';
