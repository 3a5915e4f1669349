export { decodeMappings, compareGenerated } from './decoder.js';
export type { DecodedMappings } from './decoder.js';
export { VlqReader } from './vlq.js';
