/**
 * @dagkit/encoding
 *
 * Shared encoding utilities for dagkit.
 *
 * - base58btc encode/decode and multihash validation
 * - Human-readable sizes and durations
 *
 * Imported by `@dagkit/core`, `@dagkit/protocol` and the CLI.
 */

export { decodeBase58, decodeMultihash, encodeBase58, isValidMultihash } from "./base58.ts";
export { formatSize, parseDuration } from "./format.ts";
