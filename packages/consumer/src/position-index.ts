import type { MappingRecord } from './types.js';

/**
 * Sorted mapping records of one sub-map plus the nearest-preceding search
 * over them.
 */
export class PositionIndex {
  public constructor(public readonly records: readonly MappingRecord[]) {}

  public get size(): number {
    return this.records.length;
  }

  /**
   * Finds the record for a generated position: the exact match if there is
   * one, otherwise the closest record before the query.
   *
   * @param genLine - One-based generated line
   * @param genColumn - Zero-based generated column
   * @returns The matching record, or undefined when no record at or after the
   *   query exists or the query precedes every record
   */
  public lookup(genLine: number, genColumn: number): MappingRecord | undefined {
    const i = this.lowerBound(genLine, genColumn);

    // Mapping not found.
    if (i === this.records.length) {
      return undefined;
    }

    const match = this.records[i];
    if (match.genLine > genLine || match.genColumn > genColumn) {
      // Fuzzy match.
      return i === 0 ? undefined : this.records[i - 1];
    }
    return match;
  }

  /**
   * Index of the first record not less than the query position.
   */
  private lowerBound(genLine: number, genColumn: number): number {
    let low = 0;
    let high = this.records.length;
    while (low < high) {
      const mid = (low + high) >>> 1;
      const record = this.records[mid];
      const before =
        record.genLine < genLine ||
        (record.genLine === genLine && record.genColumn < genColumn);
      if (before) {
        low = mid + 1;
      } else {
        high = mid;
      }
    }
    return low;
  }
}
