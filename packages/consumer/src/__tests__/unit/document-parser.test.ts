import { describe, it, expect } from 'vitest';
import { parseDocument, checkVersion } from '../../document-parser.js';
import { SourceMapError, SourceMapErrorCode } from '../../errors/index.js';

function captureError(fn: () => unknown): SourceMapError {
  try {
    fn();
  } catch (error) {
    if (error instanceof SourceMapError) return error;
    throw error;
  }
  throw new Error('expected a SourceMapError');
}

const flat = {
  version: 3,
  file: 'app.js',
  sourceRoot: 'src',
  sources: ['a.ts', 'b.ts'],
  names: ['main', 7],
  mappings: 'AAAA',
};

describe('parseDocument', () => {
  describe('flat documents', () => {
    it('wraps the top-level fields in one section at 0:0', () => {
      const doc = parseDocument(JSON.stringify(flat));

      expect(doc.indexed).toBe(false);
      expect(doc.file).toBe('app.js');
      expect(doc.sections).toHaveLength(1);
      expect(doc.sections[0].offset).toEqual({ line: 0, column: 0 });
      expect(doc.sections[0].map).toEqual({
        version: 3,
        file: 'app.js',
        sourceRoot: 'src',
        sources: ['a.ts', 'b.ts'],
        names: ['main', 7],
        mappings: 'AAAA',
      });
    });

    it('defaults missing optional fields', () => {
      const doc = parseDocument('{"mappings":"AAAA"}');

      expect(doc.file).toBe('');
      expect(doc.sections[0].map.sources).toEqual([]);
      expect(doc.sections[0].map.names).toEqual([]);
    });

    it('reads null sources as empty names', () => {
      const doc = parseDocument('{"version":3,"sources":["a.ts",null],"mappings":"AAAA"}');
      expect(doc.sections[0].map.sources).toEqual(['a.ts', '']);
    });

    it('treats an empty sections list as a flat document', () => {
      const doc = parseDocument(JSON.stringify({ ...flat, sections: [] }));
      expect(doc.indexed).toBe(false);
      expect(doc.sections[0].map.mappings).toBe('AAAA');
    });

    it('accepts UTF-8 bytes, a byte order mark and an XSSI guard line', () => {
      const text = JSON.stringify(flat);
      expect(parseDocument(new TextEncoder().encode(text)).file).toBe('app.js');
      expect(parseDocument(`\uFEFF${text}`).file).toBe('app.js');
      expect(parseDocument(`)]}'\n${text}`).file).toBe('app.js');
    });
  });

  describe('indexed documents', () => {
    it('keeps sections in document order', () => {
      const doc = parseDocument(
        JSON.stringify({
          version: 3,
          file: 'bundle.js',
          sections: [
            { offset: { line: 0, column: 0 }, map: { ...flat, file: 'one.js' } },
            { offset: { line: 4, column: 2 }, map: { ...flat, file: 'two.js' } },
          ],
        }),
      );

      expect(doc.indexed).toBe(true);
      expect(doc.file).toBe('bundle.js');
      expect(doc.sections.map((s) => [s.offset.line, s.offset.column, s.map.file])).toEqual([
        [0, 0, 'one.js'],
        [4, 2, 'two.js'],
      ]);
    });

    it('rejects sections out of offset order', () => {
      const error = captureError(() =>
        parseDocument(
          JSON.stringify({
            version: 3,
            sections: [
              { offset: { line: 4, column: 0 }, map: flat },
              { offset: { line: 2, column: 0 }, map: flat },
            ],
          }),
        ),
      );
      expect(error.code).toBe(SourceMapErrorCode.MALFORMED_DOCUMENT);
      expect(error.message).toBe(
        'Malformed source map: sections.1.offset: Section offset 2:0 precedes 4:0',
      );
    });

    it('rejects nested indexed maps', () => {
      const error = captureError(() =>
        parseDocument(
          JSON.stringify({
            version: 3,
            sections: [{ offset: { line: 0, column: 0 }, map: { ...flat, sections: [] } }],
          }),
        ),
      );
      expect(error.code).toBe(SourceMapErrorCode.MALFORMED_DOCUMENT);
      expect(error.message).toBe(
        'Malformed source map: sections.0.map.sections: Nested indexed maps are not supported',
      );
    });

    it('rejects sections that reference external maps', () => {
      const error = captureError(() =>
        parseDocument(
          JSON.stringify({
            version: 3,
            sections: [{ offset: { line: 0, column: 0 }, url: 'part.js.map' }],
          }),
        ),
      );
      expect(error.message).toBe(
        'Malformed source map: sections.0.map: Sections referencing external maps are not supported (part.js.map)',
      );
    });

    it('rejects sections without an offset', () => {
      const error = captureError(() =>
        parseDocument(JSON.stringify({ version: 3, sections: [{ map: flat }] })),
      );
      expect(error.code).toBe(SourceMapErrorCode.MALFORMED_DOCUMENT);
      expect(error.details.issues).toEqual([
        { path: 'sections.0.offset', message: 'Required' },
      ]);
    });
  });

  describe('version', () => {
    it('accepts version 3, 0 or no version', () => {
      expect(() => parseDocument('{"version":3,"mappings":"A"}')).not.toThrow();
      expect(() => parseDocument('{"version":0,"mappings":"A"}')).not.toThrow();
      expect(() => parseDocument('{"version":null,"mappings":"A"}')).not.toThrow();
      expect(() => parseDocument('{"mappings":"A"}')).not.toThrow();
    });

    it('rejects other versions with the offending value', () => {
      const error = captureError(() => parseDocument('{"version":2,"mappings":"A"}'));
      expect(error.code).toBe(SourceMapErrorCode.UNSUPPORTED_VERSION);
      expect(error.details).toEqual({ version: 2 });
      expect(error.message).toBe(
        'Unsupported source map version 2, only version 3 is supported',
      );
    });

    it('reports the version before shape problems', () => {
      const error = captureError(() => parseDocument('{"version":2,"sources":"a.ts"}'));
      expect(error.code).toBe(SourceMapErrorCode.UNSUPPORTED_VERSION);
    });

    it('checks the version of every section map', () => {
      const error = captureError(() =>
        parseDocument(
          JSON.stringify({
            version: 3,
            sections: [
              { offset: { line: 0, column: 0 }, map: flat },
              { offset: { line: 1, column: 0 }, map: { ...flat, version: 4 } },
            ],
          }),
        ),
      );
      expect(error.code).toBe(SourceMapErrorCode.UNSUPPORTED_VERSION);
      expect(error.details).toEqual({ version: 4 });
    });

    it('checkVersion accepts only unset and 3', () => {
      expect(() => checkVersion(undefined)).not.toThrow();
      expect(() => checkVersion(3)).not.toThrow();
      expect(() => checkVersion(1)).toThrow(SourceMapError);
    });
  });

  describe('malformed input', () => {
    it('rejects invalid JSON', () => {
      const error = captureError(() => parseDocument('{"version":3,'));
      expect(error.code).toBe(SourceMapErrorCode.MALFORMED_DOCUMENT);
      expect(error.message).toBe('Malformed source map: invalid JSON');
      expect(error.cause).toBeInstanceOf(SyntaxError);
    });

    it('rejects a document that is not an object', () => {
      const error = captureError(() => parseDocument('[]'));
      expect(error.code).toBe(SourceMapErrorCode.MALFORMED_DOCUMENT);
    });

    it('rejects fields of the wrong type', () => {
      const error = captureError(() => parseDocument('{"version":3,"sources":"a.ts"}'));
      expect(error.code).toBe(SourceMapErrorCode.MALFORMED_DOCUMENT);
      expect(error.message).toMatch(/^Malformed source map: sources: /);
    });

    it('rejects names that are neither strings nor numbers', () => {
      const error = captureError(() =>
        parseDocument('{"version":3,"names":["ok",true],"mappings":"A"}'),
      );
      expect(error.code).toBe(SourceMapErrorCode.MALFORMED_DOCUMENT);
      expect(error.message).toMatch(/^Malformed source map: names\.1: /);
    });

    it('rejects a non-integer version', () => {
      const error = captureError(() => parseDocument('{"version":3.5,"mappings":"A"}'));
      expect(error.code).toBe(SourceMapErrorCode.MALFORMED_DOCUMENT);
    });
  });
});
