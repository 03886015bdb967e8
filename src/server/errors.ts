/**
 * Error types raised outside the pure pipeline: reading backups,
 * locating archives, loading configuration and serving the preview API.
 *
 * Each carries a machine-readable `code`; the preview server's error
 * handler maps codes to HTTP statuses.
 */

export class SiteError extends Error {
  readonly code: string;
  readonly statusCode?: number;
  readonly details?: unknown;

  constructor(
    message: string,
    code: string,
    options: { statusCode?: number; details?: unknown; cause?: unknown } = {},
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'SiteError';
    this.code = code;
    this.statusCode = options.statusCode;
    this.details = options.details;
  }
}

/** Raised when the backup source is a file with an unrecognised archive extension. */
export class UnsupportedFormatError extends SiteError {
  readonly extension: string;
  readonly supported: readonly string[];

  constructor(extension: string, supported: readonly string[]) {
    super(
      `Unsupported archive format: ${extension || '(none)'}. ` +
      `Supported formats are: ${supported.join(', ')}`,
      'UNSUPPORTED_FORMAT',
      { details: { extension, supported } },
    );
    this.name = 'UnsupportedFormatError';
    this.extension = extension;
    this.supported = supported;
  }
}
