/**
 * Error types for the dagkit client
 */

/**
 * Error categories surfaced to callers.
 *
 * - IO: connection, TLS or socket failure
 * - INVALID_DATA: undecodable response, or a size mismatch on dereference
 * - INVALID_INPUT: empty or absolute path given to local traversal
 * - NOT_FOUND: local traversal found no link with the requested name
 * - OTHER: the server answered non-2xx; message is the server's Message
 */
export type ApiErrorKind = "IO" | "INVALID_DATA" | "INVALID_INPUT" | "NOT_FOUND" | "OTHER";

export type ApiErrorExtras = {
  /** HTTP status of the failed response */
  status?: number;
  /** `Code` field of the server's error body */
  remoteCode?: number;
  /** Underlying error */
  cause?: unknown;
};

export class ApiError extends Error {
  readonly kind: ApiErrorKind;
  readonly status?: number;
  readonly remoteCode?: number;

  constructor(kind: ApiErrorKind, message: string, extras: ApiErrorExtras = {}) {
    super(message, extras.cause === undefined ? undefined : { cause: extras.cause });
    this.name = "ApiError";
    this.kind = kind;
    this.status = extras.status;
    this.remoteCode = extras.remoteCode;
  }
}

/**
 * Create an ApiError.
 */
export const createApiError = (
  kind: ApiErrorKind,
  message: string,
  extras?: ApiErrorExtras
): ApiError => new ApiError(kind, message, extras);

/**
 * Check if an error is an ApiError, optionally of a given kind.
 */
export const isApiError = (error: unknown, kind?: ApiErrorKind): error is ApiError =>
  error instanceof ApiError && (kind === undefined || error.kind === kind);

/**
 * Coerce anything thrown by a request into an ApiError.
 * Non-ApiErrors are treated as transport failures.
 */
export const toApiError = (error: unknown): ApiError => {
  if (error instanceof ApiError) return error;
  return createApiError("IO", error instanceof Error ? error.message : "Network request failed", {
    cause: error,
  });
};
