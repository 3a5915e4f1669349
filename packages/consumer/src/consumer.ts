import { createLogger, logError, logEvent, type Logger } from '@srcmap/core';
import { LoggerSchema, ParseOptionsSchema, type ParseOptionsInput } from '@srcmap/schemas';
import { parseDocument } from './document-parser.js';
import { SourceMapError, summarizeZodError } from './errors/index.js';
import { SubMap } from './sub-map.js';
import { NOT_FOUND, type SectionOffset, type SourceLookupResult } from './types.js';

const defaultLogger = createLogger('consumer');

/**
 * A sub-map together with the generated position where it begins.
 */
export interface Section {
  readonly offset: SectionOffset;
  readonly map: SubMap;
}

/**
 * A fully decoded source map answering generated-to-original queries.
 *
 * Flat maps are held as one section at offset 0:0, so both document kinds go
 * through the same lookup. Sections are stored last-first. Instances are
 * frozen and can be shared freely.
 *
 * @example
 * ```typescript
 * const consumer = Consumer.parse('https://example.com/app.js.map', bytes);
 * const { source, line, column, found } = consumer.source(12, 4);
 * ```
 * @public
 */
export class Consumer {
  private constructor(
    private readonly outputFile: string,
    public readonly sections: readonly Section[],
  ) {
    Object.freeze(this);
  }

  /**
   * Builds a consumer from raw document bytes.
   *
   * @param origin - Locator the document came from, used to resolve relative
   *   sources when the map has no `sourceRoot`; '' when unknown
   * @param bytes - Document bytes (UTF-8) or text
   * @param options - Logger override and index validation switch
   * @throws SourceMapError on malformed input or options; no partial consumer is returned
   */
  public static parse(
    origin: string,
    bytes: Uint8Array | string,
    options?: ParseOptionsInput,
  ): Consumer {
    // Options may be rejected as a whole while still carrying a usable logger
    const fallback = LoggerSchema.safeParse(options?.logger);
    const logger: Logger = fallback.success ? fallback.data : defaultLogger;

    try {
      const parsedOptions = ParseOptionsSchema.safeParse(options);
      if (!parsedOptions.success) {
        const { message, issues } = summarizeZodError(parsedOptions.error);
        throw SourceMapError.invalidOptions(message, { issues }, parsedOptions.error);
      }
      const { validateIndices } = parsedOptions.data;

      const doc = parseDocument(bytes);
      const sections = doc.sections
        .map(
          (section): Section => ({
            offset: Object.freeze({ ...section.offset }),
            map: new SubMap(section.map, { origin, validateIndices, logger }),
          }),
        )
        .reverse();

      logEvent(
        'debug',
        'consumer:parsed',
        {
          origin,
          file: doc.file,
          indexed: doc.indexed,
          sections: sections.length,
          records: sections.reduce((sum, section) => sum + section.map.index.size, 0),
        },
        logger,
      );
      return new Consumer(doc.file, Object.freeze(sections.map((s) => Object.freeze(s))));
    } catch (error) {
      logError('parse', error, { origin }, logger);
      throw error;
    }
  }

  /**
   * The document's `file` field, or '' when it has none.
   */
  public file(): string {
    return this.outputFile;
  }

  /**
   * Maps a generated position to its original position.
   *
   * A section applies once the query is past its offset line; the query is
   * then shifted by the section offset before searching that section's map.
   *
   * @param genLine - One-based generated line
   * @param genColumn - Zero-based generated column
   * @returns The original position; `found` is false when nothing maps there
   */
  public source(genLine: number, genColumn: number): SourceLookupResult {
    for (const { offset, map } of this.sections) {
      if (
        offset.line < genLine ||
        (offset.line + 1 === genLine && offset.column <= genColumn)
      ) {
        return map.lookup(genLine - offset.line, genColumn - offset.column);
      }
    }
    return NOT_FOUND;
  }

  /**
   * Every source of every section, resolved, in stored section order.
   */
  public sources(): string[] {
    return this.sections.flatMap(({ map }) =>
      map.sources.map((source) => map.absSource(source)),
    );
  }
}

/**
 * Parses a source map document.
 *
 * @see {@link Consumer.parse}
 * @public
 */
export function parse(
  origin: string,
  bytes: Uint8Array | string,
  options?: ParseOptionsInput,
): Consumer {
  return Consumer.parse(origin, bytes, options);
}
