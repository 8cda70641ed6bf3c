/**
 * @dagkit/client
 *
 * Typed request surface over an IPFS-compatible HTTP API.
 *
 * @example
 * ```typescript
 * import { get, jsonCodec, setApiEndpoint } from "@dagkit/client";
 * import { ResolveResponseSchema } from "@dagkit/protocol";
 *
 * setApiEndpoint("http://127.0.0.1:5001/api/v0/");
 * const { Path } = await get("resolve", [["arg", "/ipns/example"]], jsonCodec(ResolveResponseSchema));
 * ```
 *
 * @packageDocumentation
 */

// Codecs
export type { Codec } from "./codecs.ts";
export { ignoreCodec, jsonCodec, protobufCodec } from "./codecs.ts";

// Endpoint
export {
  API_ENDPOINT_ENV,
  DEFAULT_API_ENDPOINT,
  getApiEndpoint,
  loadEndpointFromEnv,
  normalizeEndpoint,
  readEndpointFromEnv,
  resetApiEndpoint,
  setApiEndpoint,
} from "./endpoint.ts";

// Transport
export type { QueryParams, RequestContext } from "./transport.ts";
export { buildUrl, createErrorFromResponse, get, post, postData } from "./transport.ts";

// Errors
export type { ApiErrorExtras, ApiErrorKind } from "./utils/errors.ts";
export { ApiError, createApiError, isApiError, toApiError } from "./utils/errors.ts";
