/**
 * dagkit Protocol - Schemas and constants for the object store HTTP API
 *
 * @packageDocumentation
 */

// ============================================================================
// Paths and query values
// ============================================================================

export {
  API_PATHS,
  boolToQuery,
  formatLifetime,
  IPFS_PATH_PREFIX,
  lastPathSegment,
  toIpfsPath,
} from "./common.ts";

// ============================================================================
// Response schemas
// ============================================================================

export type { PutResponse, ResolveResponse, StatResponse } from "./responses.ts";
export { PutResponseSchema, ResolveResponseSchema, StatResponseSchema } from "./responses.ts";

// ============================================================================
// Errors
// ============================================================================

export type { ErrorResponse } from "./errors.ts";
export { ErrorResponseSchema, INVALID_REF, NOT_PINNED } from "./errors.ts";
