import {
  SourceMapDocumentSchema,
  SourceMapSchema,
  type SectionMapZod,
} from '@srcmap/schemas';
import type { ZodError } from 'zod';
import { SourceMapError, summarizeZodError } from './errors/index.js';
import type { SectionOffset } from './types.js';

const SUPPORTED_VERSION = 3;
// Guard line some servers prepend to JSON responses
const XSSI_PREFIX = ")]}'";
const VersionSchema = SourceMapSchema.pick({ version: true });

export interface ParsedSection {
  readonly offset: SectionOffset;
  readonly map: SectionMapZod;
}

/**
 * Structural view of a document. A flat document is represented as a single
 * section at offset 0:0.
 */
export interface ParsedDocument {
  readonly file: string;
  readonly indexed: boolean;
  readonly sections: readonly ParsedSection[];
}

/**
 * Parses and validates raw document bytes.
 *
 * @param bytes - UTF-8 bytes, or the already decoded text
 * @throws SourceMapError with code MALFORMED_DOCUMENT or UNSUPPORTED_VERSION
 */
export function parseDocument(bytes: Uint8Array | string): ParsedDocument {
  const json = parseJson(toText(bytes));

  // Report a foreign version before complaining about its shape
  const peeked = VersionSchema.safeParse(json);
  if (peeked.success) {
    checkVersion(peeked.data.version);
  }

  const result = SourceMapDocumentSchema.safeParse(json);
  if (!result.success) {
    throw fromZodError(result.error);
  }
  const doc = result.data;
  checkVersion(doc.version);

  const file = doc.file ?? '';
  if (doc.sections && doc.sections.length > 0) {
    for (const section of doc.sections) {
      checkVersion(section.map.version);
    }
    return { file, indexed: true, sections: doc.sections };
  }

  const map: SectionMapZod = {
    version: doc.version,
    file: doc.file,
    sourceRoot: doc.sourceRoot,
    sources: doc.sources,
    names: doc.names,
    mappings: doc.mappings,
  };
  return { file, indexed: false, sections: [{ offset: { line: 0, column: 0 }, map }] };
}

/**
 * Accepts version 3, and a missing or zero version as unset.
 * @throws SourceMapError with code UNSUPPORTED_VERSION otherwise
 */
export function checkVersion(version: number | null | undefined): void {
  if (version === undefined || version === null || version === 0) {
    return;
  }
  if (version !== SUPPORTED_VERSION) {
    throw SourceMapError.unsupportedVersion(version);
  }
}

function toText(bytes: Uint8Array | string): string {
  let text =
    typeof bytes === 'string'
      ? bytes
      : Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('utf8');
  if (text.charCodeAt(0) === 0xfeff) {
    text = text.slice(1);
  }
  if (text.startsWith(XSSI_PREFIX)) {
    const newline = text.indexOf('\n');
    text = newline === -1 ? '' : text.slice(newline + 1);
  }
  return text;
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    throw SourceMapError.malformedDocument(
      'invalid JSON',
      {},
      error instanceof Error ? error : undefined,
    );
  }
}

function fromZodError(error: ZodError): SourceMapError {
  const { message, issues } = summarizeZodError(error);
  return SourceMapError.malformedDocument(message, { issues }, error);
}
