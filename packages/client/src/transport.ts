/**
 * Transport facade over the object store HTTP API.
 *
 * Every call:
 * - resolves `path` beneath the endpoint in effect when the call starts
 * - sends `encoding=<codec.encoding>` ahead of the caller's query pairs
 * - decodes 2xx bodies with the codec
 * - decodes non-2xx bodies as `{ Message, Code }` and throws ApiError("OTHER")
 * - throws ApiError("IO") when the request itself fails
 * - throws ApiError("INVALID_INPUT") for a malformed per-call endpoint
 */

import { type ErrorResponse, ErrorResponseSchema } from "@dagkit/protocol";
import { jsonCodec, type Codec } from "./codecs.ts";
import { getApiEndpoint, normalizeEndpoint } from "./endpoint.ts";
import { type ApiError, createApiError, isApiError } from "./utils/errors.ts";

// ============================================================================
// Types
// ============================================================================

/** Ordered query pairs; keys may repeat */
export type QueryParams = ReadonlyArray<readonly [string, string]>;

/**
 * Per-call overrides
 */
export type RequestContext = {
  /** Endpoint to use instead of the process-wide one */
  endpoint?: string;
  /** Fetch implementation (default: global fetch) */
  fetch?: typeof fetch;
};

type SendOptions = {
  method: "GET" | "POST";
  headers?: Record<string, string>;
  body?: FormData;
};

const errorCodec = jsonCodec(ErrorResponseSchema);

// ============================================================================
// Helpers
// ============================================================================

/**
 * Build the request URL for `path` beneath `endpoint`.
 */
export const buildUrl = (
  endpoint: string,
  path: string,
  query: QueryParams,
  encoding: string | null
): string => {
  const url = new URL(path, endpoint);
  if (encoding !== null) {
    url.searchParams.append("encoding", encoding);
  }
  for (const [key, value] of query) {
    url.searchParams.append(key, value);
  }
  return url.toString();
};

/**
 * Turn a non-2xx response body into an ApiError.
 */
export const createErrorFromResponse = (status: number, body: Uint8Array): ApiError => {
  let remote: ErrorResponse;
  try {
    remote = errorCodec.parse(body);
  } catch (err) {
    return createApiError("INVALID_DATA", `Unreadable error response (HTTP ${status})`, {
      status,
      cause: err,
    });
  }
  return createApiError("OTHER", remote.Message, { status, remoteCode: remote.Code });
};

/**
 * Endpoint for one request: the context's, validated, or the process-wide one.
 */
const endpointFor = (ctx: RequestContext): string => {
  if (ctx.endpoint === undefined) {
    return getApiEndpoint();
  }
  try {
    return normalizeEndpoint(ctx.endpoint);
  } catch (err) {
    throw createApiError(
      "INVALID_INPUT",
      `Invalid API endpoint "${ctx.endpoint}": ${err instanceof Error ? err.message : String(err)}`,
      { cause: err }
    );
  }
};

const send = async <T>(
  path: string,
  query: QueryParams,
  codec: Codec<T>,
  options: SendOptions,
  ctx: RequestContext = {}
): Promise<T> => {
  const endpoint = endpointFor(ctx);
  const doFetch = ctx.fetch ?? fetch;
  const url = buildUrl(endpoint, path, query, codec.encoding);

  let response: Response;
  let body: Uint8Array;
  try {
    response = await doFetch(url, {
      method: options.method,
      headers: options.headers,
      body: options.body,
    });
    body = new Uint8Array(await response.arrayBuffer());
  } catch (err) {
    throw createApiError("IO", err instanceof Error ? err.message : "Network request failed", {
      cause: err,
    });
  }

  if (!response.ok) {
    throw createErrorFromResponse(response.status, body);
  }

  try {
    return codec.parse(body);
  } catch (err) {
    if (isApiError(err)) throw err;
    throw createApiError(
      "INVALID_DATA",
      err instanceof Error ? err.message : "Response could not be decoded",
      { cause: err }
    );
  }
};

// ============================================================================
// Requests
// ============================================================================

/**
 * GET `<endpoint>/<path>`
 */
export const get = <T>(
  path: string,
  query: QueryParams,
  codec: Codec<T>,
  ctx?: RequestContext
): Promise<T> => send(path, query, codec, { method: "GET" }, ctx);

/**
 * POST `<endpoint>/<path>` without a body
 */
export const post = <T>(
  path: string,
  query: QueryParams,
  codec: Codec<T>,
  ctx?: RequestContext
): Promise<T> => send(path, query, codec, { method: "POST" }, ctx);

/**
 * POST `<endpoint>/<path>` with `data` as the single multipart part named "data".
 */
export const postData = <T>(
  path: string,
  query: QueryParams,
  data: Uint8Array,
  codec: Codec<T>,
  ctx?: RequestContext
): Promise<T> => {
  const form = new FormData();
  form.append("data", new Blob([data]), "data");
  return send(path, query, codec, { method: "POST", headers: { Connection: "close" }, body: form }, ctx);
};
