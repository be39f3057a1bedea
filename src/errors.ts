// ---------------------------------------------------------------------------
// Error taxonomy
//
// No decode errors: dropped cells and rows shrink the desired set and are
// never raised.
// ---------------------------------------------------------------------------

export class SyncError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SyncError';
  }
}

/** Configuration or user source unreadable, malformed, or unreachable. */
export class SourceError extends SyncError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SourceError';
  }
}

/** Bearer credential could not be obtained for a backend. */
export class AuthError extends SyncError {
  constructor(
    readonly backend: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`${backend}: ${message}`, options);
    this.name = 'AuthError';
  }
}

export type BackendFailureReason =
  | 'conflict'
  | 'notFound'
  | 'unauthorized'
  | 'forbidden'
  | 'invalid'
  | 'unavailable'
  | 'unknown';

/** A create/update/delete/role call against a backend failed. */
export class BackendApiError extends SyncError {
  readonly reason: BackendFailureReason;

  constructor(
    readonly backend: string,
    readonly method: string,
    readonly path: string,
    readonly status: number | null,
    readonly detail: string,
    options?: { cause?: unknown; reason?: BackendFailureReason },
  ) {
    super(
      `${backend}: ${method} ${path} failed${status === null ? '' : ` with ${status}`}: ${detail}`,
      { cause: options?.cause },
    );
    this.name = 'BackendApiError';
    this.reason =
      options?.reason ?? (status === null ? 'unavailable' : classifyHttpStatus(status));
  }
}

/**
 * Maps an HTTP status to a coarse failure reason.  A null status means the
 * request never produced a response (network error, timeout).
 */
export function classifyHttpStatus(status: number): BackendFailureReason {
  if (status === 409) return 'conflict';
  if (status === 404) return 'notFound';
  if (status === 401) return 'unauthorized';
  if (status === 403) return 'forbidden';
  if (status === 400 || status === 422) return 'invalid';
  if (status === 429 || status === 502 || status === 503 || status === 504) {
    return 'unavailable';
  }
  return 'unknown';
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
