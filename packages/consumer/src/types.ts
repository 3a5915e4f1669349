/**
 * Sentinel stored in a record's `sourceIndex`/`nameIndex` when the entry
 * carries no source or name.
 */
export const NO_INDEX = -1;

/**
 * One decoded mapping entry. Lines are one-based, columns zero-based.
 * Generated positions are local to the sub-map that owns the record.
 */
export interface MappingRecord {
  readonly genLine: number;
  readonly genColumn: number;
  readonly sourceIndex: number;
  readonly sourceLine: number;
  readonly sourceColumn: number;
  readonly nameIndex: number;
}

/**
 * Zero-based generated line and column where a section begins.
 */
export interface SectionOffset {
  readonly line: number;
  readonly column: number;
}

/**
 * Result of a position query. When `found` is false every other field holds
 * its empty value.
 */
export interface SourceLookupResult {
  readonly source: string;
  readonly name: string;
  readonly line: number;
  readonly column: number;
  readonly found: boolean;
}

export const NOT_FOUND: SourceLookupResult = Object.freeze({
  source: '',
  name: '',
  line: 0,
  column: 0,
  found: false,
});
