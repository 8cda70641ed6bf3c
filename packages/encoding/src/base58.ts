/**
 * Base58 (bitcoin alphabet) encoding for multihash strings.
 *
 * Hashes cross the library surface as base58 strings and the protobuf wire
 * as raw multihash bytes. Conversion happens only here.
 */

import { base58btc } from "multiformats/bases/base58";
import * as Digest from "multiformats/hashes/digest";

/**
 * Encode raw bytes as a base58btc string (no multibase prefix).
 */
export function encodeBase58(bytes: Uint8Array): string {
  return base58btc.baseEncode(bytes);
}

/**
 * Decode a base58btc string (no multibase prefix) into bytes.
 *
 * @throws Error if the string contains characters outside the alphabet
 */
export function decodeBase58(text: string): Uint8Array {
  return base58btc.baseDecode(text);
}

/**
 * Decode a base58 multihash string, checking the multihash framing
 * (varint code, varint length, digest of that length).
 *
 * @throws Error if the string is not base58 or not a well-formed multihash
 */
export function decodeMultihash(hash: string): Uint8Array {
  const bytes = decodeBase58(hash);
  return Digest.decode(bytes).bytes;
}

/**
 * Check whether a string is a base58-encoded multihash.
 */
export function isValidMultihash(hash: string): boolean {
  if (hash.length === 0) return false;
  try {
    decodeMultihash(hash);
    return true;
  } catch {
    return false;
  }
}
