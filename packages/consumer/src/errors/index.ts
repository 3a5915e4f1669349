export { SourceMapError, SourceMapErrorCode } from './source-map-error.js';
export { summarizeZodError } from './zod-issues.js';
export type { IssueSummary } from './zod-issues.js';
