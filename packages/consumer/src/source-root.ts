import path from 'node:path';
import { SourceMapError } from './errors/index.js';

const URI_SCHEME = /^[A-Za-z][A-Za-z0-9+.-]*:/;
// eslint-disable-next-line no-control-regex
const CONTROL_CHARACTER = /[\u0000-\u001f\u007f]/;
const BAD_PERCENT_ESCAPE = /%(?![0-9A-Fa-f]{2})/;

/**
 * Checks if a string has a URI scheme.
 *
 * @param value - String to check for URI scheme
 * @returns True if string has a URI scheme (e.g., "http://", "file://")
 */
export function hasUriScheme(value: string): boolean {
  return URI_SCHEME.test(value);
}

/**
 * Parses a URL reference.
 *
 * @param value - Absolute URL or relative reference
 * @returns The parsed URL when `value` is absolute, undefined for a relative reference
 * @throws TypeError When `value` is not a well-formed URL reference
 */
export function parseUrlReference(value: string): URL | undefined {
  if (CONTROL_CHARACTER.test(value)) {
    throw new TypeError('URL contains a control character');
  }
  if (BAD_PERCENT_ESCAPE.test(value)) {
    throw new TypeError('URL contains an invalid percent escape');
  }
  if (hasUriScheme(value)) {
    return new URL(value);
  }
  const [firstSegment = ''] = value.split(/[/?#]/, 1);
  if (firstSegment.includes(':')) {
    throw new TypeError('first path segment of a relative URL contains a colon');
  }
  return undefined;
}

/**
 * Returns true when `value` is an absolute URL. Unparseable strings are not.
 */
export function isAbsoluteUrl(value: string): boolean {
  if (!hasUriScheme(value)) {
    return false;
  }
  try {
    return parseUrlReference(value) !== undefined;
  } catch {
    return false;
  }
}

/**
 * Picks the URL that relative source names resolve against: an absolute
 * `sourceRoot`, or, when the map has no `sourceRoot`, the directory of an
 * absolute origin.
 *
 * @throws SourceMapError with code INVALID_ROOT or INVALID_ORIGIN when the
 *   string consulted is not a well-formed URL reference
 */
function resolveBase(sourceRoot: string, origin: string): URL | undefined {
  if (sourceRoot !== '') {
    try {
      return parseUrlReference(sourceRoot);
    } catch (error) {
      throw SourceMapError.invalidRoot(sourceRoot, toError(error));
    }
  }

  if (origin === '') {
    return undefined;
  }

  let originUrl: URL | undefined;
  try {
    originUrl = parseUrlReference(origin);
  } catch (error) {
    throw SourceMapError.invalidOrigin(origin, toError(error));
  }
  if (!originUrl) {
    return undefined;
  }
  originUrl.pathname = path.posix.dirname(originUrl.pathname);
  return originUrl;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Resolves the names listed in a map's `sources` to absolute locations.
 *
 * @example
 * ```typescript
 * const resolver = new SourceRootResolver('', 'https://cdn.example.com/js/app.js.map');
 * resolver.absSource('../src/app.ts'); // 'https://cdn.example.com/src/app.ts'
 * ```
 */
export class SourceRootResolver {
  private readonly base: URL | undefined;

  public constructor(
    private readonly sourceRoot: string,
    origin: string,
  ) {
    this.base = resolveBase(sourceRoot, origin);
  }

  /**
   * The URL relative sources are joined onto, or '' when they fall back to
   * plain path joining with `sourceRoot`.
   */
  public get resolvedRoot(): string {
    return this.base?.href ?? '';
  }

  /**
   * Makes a `sources` entry absolute.
   *
   * Absolute paths and URLs pass through. Relative names are path-joined onto
   * the resolved URL, else onto the raw `sourceRoot`, else returned as is.
   */
  public absSource(source: string): string {
    if (path.posix.isAbsolute(source) || isAbsoluteUrl(source)) {
      return source;
    }

    if (this.base) {
      // Source names are plain paths; a literal '%' is data, not an escape
      const url = new URL(this.base.href);
      url.pathname = path.posix.join(this.base.pathname, source.replaceAll('%', '%25'));
      return url.href;
    }

    if (this.sourceRoot !== '') {
      return path.posix.join(this.sourceRoot, source);
    }

    return source;
  }
}
