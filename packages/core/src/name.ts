/**
 * Name resolution and publishing
 */

import { get, ignoreCodec, jsonCodec, post, type RequestContext } from "@dagkit/client";
import {
  API_PATHS,
  boolToQuery,
  formatLifetime,
  ResolveResponseSchema,
} from "@dagkit/protocol";
import type { CommittedObject } from "./object.ts";
import { Reference } from "./reference.ts";
import { stat } from "./stat.ts";

const resolveCodec = jsonCodec(ResolveResponseSchema);

/** Default record lifetime for `publish`: 24 hours */
export const DEFAULT_PUBLISH_LIFETIME_MS = 24 * 60 * 60 * 1000;

/**
 * Anything with a hash that can be published under the node's name
 */
export type Publishable = CommittedObject | Reference;

/**
 * Resolve an IPFS or IPNS path to an `/ipfs/<hash>` path.
 *
 * With `recursive`, IPNS names that point at other names are followed to
 * the end.
 */
export const resolve = async (
  path: string,
  recursive = true,
  ctx?: RequestContext
): Promise<string> => {
  const result = await get(
    API_PATHS.RESOLVE,
    [
      ["recursive", boolToQuery(recursive)],
      ["arg", path],
    ],
    resolveCodec,
    ctx
  );
  return result.Path;
};

/**
 * Get a Reference to the object at `path` without materializing it.
 *
 * The store still fetches the object to stat it.
 */
export const lookup = async (path: string, ctx?: RequestContext): Promise<Reference> => {
  const stats = await stat(path, ctx);
  return new Reference(stats.hash, stats.cumulativeSize);
};

/**
 * Publish `target` under this node's identity for 24 hours.
 */
export const publish = (target: Publishable, ctx?: RequestContext): Promise<void> =>
  publishFor(target, DEFAULT_PUBLISH_LIFETIME_MS, ctx);

/**
 * Publish `target` under this node's identity for `lifetimeMs`.
 */
export const publishFor = async (
  target: Publishable,
  lifetimeMs: number,
  ctx?: RequestContext
): Promise<void> => {
  await post(
    API_PATHS.NAME_PUBLISH,
    [
      ["resolve", "false"],
      ["lifetime", formatLifetime(lifetimeMs)],
      ["arg", target.hash],
    ],
    ignoreCodec,
    ctx
  );
};
