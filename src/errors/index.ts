/**
 * Error classes raised by the playlist engine and its HTTP collaborator.
 *
 * Each carries a machine-readable code and a context record suitable for
 * structured logging.
 */

export enum ErrorCode {
  EXTRACTION_MARKER_MISSING = 'EXTRACTION_MARKER_MISSING',
  DATA_MALFORMED = 'DATA_MALFORMED',
  PAGINATION_FETCH_FAILED = 'PAGINATION_FETCH_FAILED',
  HTTP_REQUEST_FAILED = 'HTTP_REQUEST_FAILED',
  REFERENCE_INVALID = 'REFERENCE_INVALID',
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

export class PlaylistError extends Error {
  public readonly code: ErrorCode;
  public readonly context: Record<string, unknown>;

  constructor(
    message: string,
    code: ErrorCode,
    context: Record<string, unknown> = {},
    cause?: unknown
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'PlaylistError';
    this.code = code;
    this.context = context;
    Object.setPrototypeOf(this, PlaylistError.prototype);
  }
}

/**
 * The embedded initial-data assignment was not found in the document.
 * Retrying the same document cannot succeed.
 */
export class ExtractionError extends PlaylistError {
  constructor(public readonly markers: readonly string[], message?: string) {
    super(
      message || `Initial data marker not found (tried: ${markers.join(', ')})`,
      ErrorCode.EXTRACTION_MARKER_MISSING,
      { markers }
    );
    this.name = 'ExtractionError';
    Object.setPrototypeOf(this, ExtractionError.prototype);
  }
}

export class MalformedDataError extends PlaylistError {
  constructor(public readonly source: string, cause: unknown) {
    super(`Malformed JSON in ${source}: ${describeCause(cause)}`, ErrorCode.DATA_MALFORMED, { source }, cause);
    this.name = 'MalformedDataError';
    Object.setPrototypeOf(this, MalformedDataError.prototype);
  }
}

/**
 * A continuation page could not be fetched or decoded. Entries gathered
 * from earlier pages stay with the caller; `entriesReceived` counts them as
 * they arrived, before de-duplication.
 */
export class PaginationFetchError extends PlaylistError {
  constructor(
    public readonly page: number,
    public readonly url: string,
    public readonly entriesReceived: number,
    cause: unknown
  ) {
    super(
      `Failed to fetch continuation page ${page}: ${describeCause(cause)}`,
      ErrorCode.PAGINATION_FETCH_FAILED,
      { page, url, entriesReceived },
      cause
    );
    this.name = 'PaginationFetchError';
    Object.setPrototypeOf(this, PaginationFetchError.prototype);
  }
}

export class HttpRequestError extends PlaylistError {
  constructor(
    public readonly url: string,
    public readonly status: number | undefined,
    cause?: unknown
  ) {
    super(
      `Request to ${url} failed: ${status !== undefined ? `HTTP ${status}` : describeCause(cause ?? 'network error')}`,
      ErrorCode.HTTP_REQUEST_FAILED,
      { url, status },
      cause
    );
    this.name = 'HttpRequestError';
    Object.setPrototypeOf(this, HttpRequestError.prototype);
  }
}

export class InvalidPlaylistReferenceError extends PlaylistError {
  constructor(public readonly input: string) {
    super(`Not a playlist URL or id: "${input}"`, ErrorCode.REFERENCE_INVALID, { input });
    this.name = 'InvalidPlaylistReferenceError';
    Object.setPrototypeOf(this, InvalidPlaylistReferenceError.prototype);
  }
}
