/**
 * Error codes for the ways building a consumer can fail
 */
export enum SourceMapErrorCode {
  MALFORMED_DOCUMENT = 'malformed_document',
  UNSUPPORTED_VERSION = 'unsupported_version',
  MALFORMED_MAPPINGS = 'malformed_mappings',
  INVALID_ROOT = 'invalid_root',
  INVALID_ORIGIN = 'invalid_origin',
  INVALID_OPTIONS = 'invalid_options',
}

/**
 * Raised by `parse` for every construction failure. A position with no
 * mapping is a normal lookup result and never produces one of these.
 */
export class SourceMapError extends Error {
  public readonly code: SourceMapErrorCode;
  public readonly details: Readonly<Record<string, unknown>>;

  public constructor(
    message: string,
    code: SourceMapErrorCode,
    details: Record<string, unknown> = {},
    cause?: Error,
  ) {
    super(message, cause ? { cause } : undefined);
    this.name = 'SourceMapError';
    this.code = code;
    this.details = Object.freeze({ ...details });

    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, SourceMapError.prototype);
  }

  /**
   * Convert the error to a JSON representation (useful for logging/debugging)
   * @returns JSON object containing error details
   */
  public toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      details: this.details,
      stack: this.stack,
      cause: this.cause instanceof Error ? this.cause.message : undefined,
    };
  }

  public static malformedDocument(
    m: string,
    details?: Record<string, unknown>,
    c?: Error,
  ): SourceMapError {
    return new SourceMapError(
      `Malformed source map: ${m}`,
      SourceMapErrorCode.MALFORMED_DOCUMENT,
      details,
      c,
    );
  }

  public static unsupportedVersion(version: number): SourceMapError {
    return new SourceMapError(
      `Unsupported source map version ${version}, only version 3 is supported`,
      SourceMapErrorCode.UNSUPPORTED_VERSION,
      { version },
    );
  }

  public static malformedMappings(
    m: string,
    details?: Record<string, unknown>,
  ): SourceMapError {
    return new SourceMapError(
      `Malformed mappings: ${m}`,
      SourceMapErrorCode.MALFORMED_MAPPINGS,
      details,
    );
  }

  public static invalidRoot(sourceRoot: string, c?: Error): SourceMapError {
    return new SourceMapError(
      `Invalid sourceRoot: ${sourceRoot}`,
      SourceMapErrorCode.INVALID_ROOT,
      { sourceRoot },
      c,
    );
  }

  public static invalidOrigin(origin: string, c?: Error): SourceMapError {
    return new SourceMapError(
      `Invalid origin: ${origin}`,
      SourceMapErrorCode.INVALID_ORIGIN,
      { origin },
      c,
    );
  }

  public static invalidOptions(
    m: string,
    details?: Record<string, unknown>,
    c?: Error,
  ): SourceMapError {
    return new SourceMapError(
      `Invalid parse options: ${m}`,
      SourceMapErrorCode.INVALID_OPTIONS,
      details,
      c,
    );
  }

  /**
   * Checks whether an unknown thrown value is a SourceMapError, optionally
   * with a specific code.
   */
  public static is(
    error: unknown,
    code?: SourceMapErrorCode,
  ): error is SourceMapError {
    return (
      error instanceof SourceMapError &&
      (code === undefined || error.code === code)
    );
  }
}
