/**
 * @dagkit/core
 *
 * Merkle-DAG object model over an IPFS-compatible HTTP API.
 *
 * - DagObject: mutable draft (data + ordered links)
 * - CommittedObject: stored object bound to its Reference
 * - Reference: hash + cumulative size; the only pointer into the store
 *
 * References and committed objects have no public constructor. They come
 * from `commit`, `getObject`, `lookup` and links of fetched objects.
 *
 * @example
 * ```typescript
 * import { DagObject, getObject } from "@dagkit/core";
 *
 * const leaf = await new DagObject(new TextEncoder().encode("hello")).commit();
 * const root = await new DagObject().addLink("greeting", leaf).commit();
 * const again = await getObject(`${root.hash}/greeting`);
 * ```
 */

// Types
export type { Link, Stat } from "./types.ts";

// Object model
export type { CommittedObject } from "./object.ts";
export { CommitError, DagObject, getObject, isCommittedObject } from "./object.ts";

// References
export type { Reference } from "./reference.ts";
export { isReference } from "./reference.ts";

// Name resolution
export type { Publishable } from "./name.ts";
export { DEFAULT_PUBLISH_LIFETIME_MS, lookup, publish, publishFor, resolve } from "./name.ts";
export { stat } from "./stat.ts";
