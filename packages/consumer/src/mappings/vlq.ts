import { SourceMapError } from '../errors/index.js';

const BASE64_ALPHABET =
  'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789+/';

const VLQ_BASE_SHIFT = 5;
const VLQ_BASE_MASK = 0b11111;
const VLQ_CONTINUATION_BIT = 0b100000;
// 7 digits carry 35 bits, enough for any 32-bit signed value
const VLQ_MAX_SHIFT = 30;
const MAX_INT32 = 2 ** 31 - 1;

export const ENTRY_SEPARATOR = ','.charCodeAt(0);
export const LINE_SEPARATOR = ';'.charCodeAt(0);

const DIGIT_VALUES = new Int8Array(128).fill(-1);
for (let i = 0; i < BASE64_ALPHABET.length; i++) {
  DIGIT_VALUES[BASE64_ALPHABET.charCodeAt(i)] = i;
}

/**
 * Reads base64 VLQ integers out of a mappings string. The reader never
 * crosses an entry or line separator: a continuation bit right before one is
 * reported as a truncated integer.
 */
export class VlqReader {
  private pos = 0;

  public constructor(private readonly text: string) {}

  public get offset(): number {
    return this.pos;
  }

  public atEnd(): boolean {
    return this.pos >= this.text.length;
  }

  /**
   * Char code at the cursor, or -1 at the end of input.
   */
  public peek(): number {
    return this.pos < this.text.length ? this.text.charCodeAt(this.pos) : -1;
  }

  public skip(): void {
    this.pos++;
  }

  /**
   * Decodes one zig-zag signed integer starting at the cursor.
   * @throws SourceMapError with code MALFORMED_MAPPINGS on an invalid
   *   character, a truncated integer, or a value outside 32-bit range
   */
  public readInt(): number {
    const start = this.pos;
    let result = 0;
    let shift = 0;

    for (;;) {
      const code = this.peek();
      if (code === -1 || code === ENTRY_SEPARATOR || code === LINE_SEPARATOR) {
        throw SourceMapError.malformedMappings(
          `truncated integer at offset ${start}`,
          { offset: start },
        );
      }
      const digit = code < 128 ? DIGIT_VALUES[code] : -1;
      if (digit === -1) {
        throw SourceMapError.malformedMappings(
          `invalid character ${JSON.stringify(this.text[this.pos])} at offset ${this.pos}`,
          { offset: this.pos },
        );
      }
      this.pos++;

      result += (digit & VLQ_BASE_MASK) * 2 ** shift;
      if ((digit & VLQ_CONTINUATION_BIT) === 0) {
        break;
      }
      shift += VLQ_BASE_SHIFT;
      if (shift > VLQ_MAX_SHIFT) {
        throw SourceMapError.malformedMappings(
          `integer too long at offset ${start}`,
          { offset: start },
        );
      }
    }

    const magnitude = Math.floor(result / 2);
    if (magnitude > MAX_INT32) {
      throw SourceMapError.malformedMappings(
        `integer out of range at offset ${start}`,
        { offset: start },
      );
    }
    return result % 2 === 1 ? 0 - magnitude : magnitude;
  }
}
