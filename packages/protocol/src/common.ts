/**
 * Endpoint paths, query value helpers and IPFS path utilities
 */

// ============================================================================
// API Paths
// ============================================================================

/**
 * Request paths, relative to the API endpoint
 */
export const API_PATHS = {
  RESOLVE: "resolve",
  OBJECT_GET: "object/get",
  OBJECT_STAT: "object/stat",
  OBJECT_PUT: "object/put",
  PIN_ADD: "pin/add",
  PIN_RM: "pin/rm",
  NAME_PUBLISH: "name/publish",
} as const;

// ============================================================================
// Query Values
// ============================================================================

/**
 * Booleans travel as the literal strings "true" / "false"
 */
export const boolToQuery = (value: boolean): "true" | "false" => (value ? "true" : "false");

/**
 * Format a lifetime for name/publish as `<secs>s<nanos>ns`.
 *
 * @example formatLifetime(86_400_000) → "86400s0ns"
 * @example formatLifetime(1500) → "1s500000000ns"
 */
export const formatLifetime = (lifetimeMs: number): string => {
  if (!Number.isFinite(lifetimeMs) || lifetimeMs < 0) {
    throw new Error(`Invalid lifetime: ${lifetimeMs}`);
  }
  const secs = Math.floor(lifetimeMs / 1000);
  const nanos = Math.round((lifetimeMs - secs * 1000) * 1_000_000);
  return `${secs}s${nanos}ns`;
};

// ============================================================================
// Paths
// ============================================================================

export const IPFS_PATH_PREFIX = "/ipfs/";

/**
 * Canonical display form of a hash
 */
export const toIpfsPath = (hash: string): string => `${IPFS_PATH_PREFIX}${hash}`;

/**
 * Substring after the final "/" (the whole string when there is none)
 */
export const lastPathSegment = (path: string): string => path.slice(path.lastIndexOf("/") + 1);
