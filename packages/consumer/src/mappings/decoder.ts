import { SourceMapError } from '../errors/index.js';
import { NO_INDEX, type MappingRecord } from '../types.js';
import { ENTRY_SEPARATOR, LINE_SEPARATOR, VlqReader } from './vlq.js';

const MAX_FIELDS = 5;

export interface DecodedMappings {
  /** Records ordered by generated line, then column. */
  readonly records: readonly MappingRecord[];
  /** True when the stream was out of order and had to be sorted. */
  readonly reordered: boolean;
}

/**
 * Decodes a `mappings` string into records.
 *
 * Generated lines start at 1 and advance on `;`; the generated column resets
 * on every line. Source index, source line, source column and name index are
 * deltas accumulated over the whole stream. Original lines are reported
 * one-based like generated ones.
 *
 * @param mappings - Raw mappings string; it is not referenced once decoding returns
 * @throws SourceMapError with code MALFORMED_MAPPINGS
 */
export function decodeMappings(mappings: string): DecodedMappings {
  if (mappings === '') {
    throw SourceMapError.malformedMappings('mappings are empty');
  }

  const reader = new VlqReader(mappings);
  const records: MappingRecord[] = [];
  const fields = [0, 0, 0, 0, 0];

  let genLine = 1;
  let genColumn = 0;
  let sourceIndex = 0;
  let sourceLine = 1;
  let sourceColumn = 0;
  let nameIndex = 0;
  let reordered = false;

  while (!reader.atEnd()) {
    const entryStart = reader.offset;
    let count = 0;
    for (
      let code = reader.peek();
      code !== -1 && code !== ENTRY_SEPARATOR && code !== LINE_SEPARATOR;
      code = reader.peek()
    ) {
      if (count === MAX_FIELDS) {
        throw invalidFieldCount(count + 1, entryStart);
      }
      fields[count++] = reader.readInt();
    }

    if (count > 0) {
      if (count !== 1 && count !== 4 && count !== 5) {
        throw invalidFieldCount(count, entryStart);
      }

      const previousColumn = genColumn;
      genColumn += fields[0];
      if (genColumn < 0) {
        throw negativeValue('generated column', entryStart);
      }
      if (genColumn < previousColumn) {
        reordered = true;
      }

      if (count === 1) {
        records.push(
          Object.freeze({
            genLine,
            genColumn,
            sourceIndex: NO_INDEX,
            sourceLine: 0,
            sourceColumn: 0,
            nameIndex: NO_INDEX,
          }),
        );
      } else {
        sourceIndex += fields[1];
        sourceLine += fields[2];
        sourceColumn += fields[3];
        if (sourceIndex < 0) throw negativeValue('source index', entryStart);
        if (sourceLine < 1) throw negativeValue('source line', entryStart);
        if (sourceColumn < 0) throw negativeValue('source column', entryStart);

        let entryName = NO_INDEX;
        if (count === 5) {
          nameIndex += fields[4];
          if (nameIndex < 0) throw negativeValue('name index', entryStart);
          entryName = nameIndex;
        }

        records.push(
          Object.freeze({
            genLine,
            genColumn,
            sourceIndex,
            sourceLine,
            sourceColumn,
            nameIndex: entryName,
          }),
        );
      }
    }

    if (reader.peek() === LINE_SEPARATOR) {
      genLine++;
      genColumn = 0;
    }
    reader.skip();
  }

  if (reordered) {
    records.sort(compareGenerated);
  }

  return { records: Object.freeze(records), reordered };
}

/**
 * Orders records by generated line, then generated column.
 */
export function compareGenerated(a: MappingRecord, b: MappingRecord): number {
  return a.genLine - b.genLine || a.genColumn - b.genColumn;
}

function invalidFieldCount(count: number, offset: number): SourceMapError {
  return SourceMapError.malformedMappings(
    `entry at offset ${offset} has ${count} fields, expected 1, 4 or 5`,
    { offset, fields: count },
  );
}

function negativeValue(field: string, offset: number): SourceMapError {
  return SourceMapError.malformedMappings(
    `${field} becomes negative at offset ${offset}`,
    { offset },
  );
}
