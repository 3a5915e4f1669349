import { logEvent, type Logger } from '@srcmap/core';
import type { SectionMapZod } from '@srcmap/schemas';
import { SourceMapError } from './errors/index.js';
import { decodeMappings } from './mappings/index.js';
import { renderName, toNameEntry, type NameEntry } from './names.js';
import { PositionIndex } from './position-index.js';
import { SourceRootResolver } from './source-root.js';
import {
  NO_INDEX,
  NOT_FOUND,
  type MappingRecord,
  type SourceLookupResult,
} from './types.js';

export interface SubMapOptions {
  /** Locator the document was obtained from; '' when unknown. */
  readonly origin: string;
  /** Reject records pointing past the end of `sources` or `names`. */
  readonly validateIndices: boolean;
  readonly logger: Logger;
}

/**
 * One flat source map: a whole flat document, or the `map` of one section of
 * an indexed document. Immutable once constructed.
 */
export class SubMap {
  public readonly file: string;
  public readonly sourceRoot: string;
  public readonly sources: readonly string[];
  public readonly names: readonly NameEntry[];
  public readonly index: PositionIndex;
  private readonly resolver: SourceRootResolver;

  /**
   * Resolves the source root and decodes the mappings of `doc`. The raw
   * mappings string is consumed here and not kept.
   *
   * @throws SourceMapError with code INVALID_ROOT, INVALID_ORIGIN or MALFORMED_MAPPINGS
   */
  public constructor(doc: SectionMapZod, options: SubMapOptions) {
    this.file = doc.file ?? '';
    this.sourceRoot = doc.sourceRoot ?? '';
    this.sources = Object.freeze([...doc.sources]);
    this.names = Object.freeze(doc.names.map(toNameEntry));
    this.resolver = new SourceRootResolver(this.sourceRoot, options.origin);

    const { records, reordered } = decodeMappings(doc.mappings);
    if (options.validateIndices) {
      this.checkIndices(records);
    }
    this.index = new PositionIndex(records);

    logEvent(
      'debug',
      'mappings:decoded',
      { file: this.file, records: records.length, reordered },
      options.logger,
    );
    Object.freeze(this);
  }

  public get resolvedRoot(): string {
    return this.resolver.resolvedRoot;
  }

  public absSource(source: string): string {
    return this.resolver.absSource(source);
  }

  /**
   * Resolves a generated position local to this map.
   *
   * @param genLine - One-based generated line
   * @param genColumn - Zero-based generated column
   */
  public lookup(genLine: number, genColumn: number): SourceLookupResult {
    const match = this.index.lookup(genLine, genColumn);
    if (!match) {
      return NOT_FOUND;
    }

    return {
      source: this.sourceAt(match.sourceIndex),
      name: this.nameAt(match.nameIndex),
      line: match.sourceLine,
      column: match.sourceColumn,
      found: true,
    };
  }

  // Indices past the end only reach here with validateIndices off
  private sourceAt(index: number): string {
    if (index === NO_INDEX || index >= this.sources.length) {
      return '';
    }
    return this.absSource(this.sources[index]);
  }

  private nameAt(index: number): string {
    if (index === NO_INDEX || index >= this.names.length) {
      return '';
    }
    return renderName(this.names[index]);
  }

  private checkIndices(records: readonly MappingRecord[]): void {
    for (const record of records) {
      if (record.sourceIndex >= this.sources.length) {
        throw SourceMapError.malformedMappings(
          `source index ${record.sourceIndex} out of range (${this.sources.length} sources)`,
          { genLine: record.genLine, genColumn: record.genColumn },
        );
      }
      if (record.nameIndex >= this.names.length) {
        throw SourceMapError.malformedMappings(
          `name index ${record.nameIndex} out of range (${this.names.length} names)`,
          { genLine: record.genLine, genColumn: record.genColumn },
        );
      }
    }
  }
}
