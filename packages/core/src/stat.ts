/**
 * Object metadata lookup
 */

import { get, jsonCodec, type RequestContext } from "@dagkit/client";
import { API_PATHS, StatResponseSchema } from "@dagkit/protocol";
import type { Stat } from "./types.ts";

const statCodec = jsonCodec(StatResponseSchema);

/**
 * Look up metadata for the object at `path` without downloading its body.
 */
export const stat = async (path: string, ctx?: RequestContext): Promise<Stat> => {
  const result = await get(API_PATHS.OBJECT_STAT, [["arg", path]], statCodec, ctx);
  return {
    hash: result.Hash,
    numLinks: result.NumLinks,
    dataSize: result.DataSize,
    cumulativeSize: result.CumulativeSize,
  };
};
