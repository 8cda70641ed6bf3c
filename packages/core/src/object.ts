/**
 * Merkle-DAG Object Model
 *
 * - DagObject: a mutable draft (data + ordered links)
 * - CommittedObject: an immutable object bound to the Reference the store
 *   computed for it
 *
 * Links always point at committed objects, so a draft's children must be
 * committed before the draft itself.
 */

import {
  type ApiError,
  createApiError,
  get,
  jsonCodec,
  postData,
  protobufCodec,
  type RequestContext,
  toApiError,
} from "@dagkit/client";
import { decodeBase58, encodeBase58, isValidMultihash } from "@dagkit/encoding";
import { decodePBNode, encodePBNode, type PBNode } from "@dagkit/merkledag";
import { API_PATHS, lastPathSegment, PutResponseSchema } from "@dagkit/protocol";
import { resolve } from "./name.ts";
import { Reference } from "./reference.ts";
import type { Link, Stat } from "./types.ts";

const putCodec = jsonCodec(PutResponseSchema);
const nodeCodec = protobufCodec(decodePBNode);

// ============================================================================
// Internal Helpers
// ============================================================================

/**
 * data.length + Σ link.object.size
 */
const computeSize = (data: Uint8Array, links: readonly Link[]): number =>
  links.reduce((total, link) => total + link.object.size, data.length);

const bytesEqual = (a: Uint8Array, b: Uint8Array): boolean =>
  a.length === b.length && a.every((byte, i) => byte === b[i]);

const linksEqual = (a: readonly Link[], b: readonly Link[]): boolean =>
  a.length === b.length &&
  a.every((link, i) => {
    const other = b[i];
    return other !== undefined && link.name === other.name && link.object.equals(other.object);
  });

const copyLinks = (links: readonly Link[]): Link[] =>
  links.map((link) => ({ name: link.name, object: link.object }));

/**
 * Link hashes come from commits, stats and decoded nodes, so a hash that
 * is not base58 means the caller bypassed the Reference type.
 */
const decodeLinkHash = (link: Link): Uint8Array => {
  try {
    return decodeBase58(link.object.hash);
  } catch (err) {
    throw new Error(`Link "${link.name}" has a non-base58 hash: ${link.object.hash}`, {
      cause: err,
    });
  }
};

const toPBNode = (data: Uint8Array, links: readonly Link[]): PBNode => ({
  Links: links.map((link) => ({
    Hash: decodeLinkHash(link),
    Name: link.name,
    Tsize: link.object.size,
  })),
  Data: data,
});

/**
 * Resolve `path` against `links`.
 *
 * Only the first segment is matched locally; anything after it is sent to
 * the store as `<hash>/<rest>`.
 */
const getChild = async (
  links: readonly Link[],
  path: string,
  ctx?: RequestContext
): Promise<CommittedObject> => {
  if (path === "") {
    throw createApiError("INVALID_INPUT", "cannot resolve empty path");
  }
  if (path.startsWith("/")) {
    throw createApiError("INVALID_INPUT", "expected relative path");
  }

  const slash = path.indexOf("/");
  const prefix = slash === -1 ? path : path.slice(0, slash);
  const suffix = slash === -1 ? "" : path.slice(slash + 1);

  const link = links.find((l) => l.name === prefix);
  if (!link) {
    throw createApiError("NOT_FOUND", "path lookup failed");
  }

  const hash = link.object.hash;
  return getObject(suffix === "" ? hash : `${hash}/${suffix}`, ctx);
};

// ============================================================================
// CommitError
// ============================================================================

/**
 * Thrown when a commit fails. `object` is the draft exactly as it was, so
 * the commit can be retried.
 */
export class CommitError extends Error {
  readonly error: ApiError;
  readonly object: DagObject;

  constructor(error: ApiError, object: DagObject) {
    super(error.message, { cause: error });
    this.name = "CommitError";
    this.error = error;
    this.object = object;
  }
}

// ============================================================================
// DagObject
// ============================================================================

/**
 * A mutable, uncommitted object.
 */
export class DagObject {
  data: Uint8Array;
  links: Link[];

  constructor(data: Uint8Array = new Uint8Array(0), links: Link[] = []) {
    this.data = data;
    this.links = links;
  }

  /**
   * Current cumulative size
   */
  get size(): number {
    return computeSize(this.data, this.links);
  }

  /**
   * Append a link to a committed object.
   */
  addLink(name: string, target: Reference | CommittedObject): this {
    const object = target instanceof CommittedObject ? target.reference : target;
    this.links.push({ name, object });
    return this;
  }

  /**
   * Fetch the object at `path` below this one. The first segment names a
   * link; the rest is resolved by the store.
   *
   * @throws ApiError("INVALID_INPUT") for an empty or absolute path
   * @throws ApiError("NOT_FOUND") if no link has the first segment's name
   */
  get(path: string, ctx?: RequestContext): Promise<CommittedObject> {
    return getChild(this.links, path, ctx);
  }

  /**
   * Store this object.
   *
   * The object is snapshotted when the call starts: later edits to this
   * draft do not affect the committed result.
   *
   * @throws CommitError carrying this draft if the store rejects it
   */
  async commit(ctx?: RequestContext): Promise<CommittedObject> {
    const snapshot = new DagObject(this.data.slice(), copyLinks(this.links));
    const body = encodePBNode(toPBNode(snapshot.data, snapshot.links));

    let hash: string;
    try {
      const result = await postData(
        API_PATHS.OBJECT_PUT,
        [["inputenc", "protobuf"]],
        body,
        putCodec,
        ctx
      );
      hash = result.Hash;
    } catch (err) {
      throw new CommitError(toApiError(err), this);
    }

    if (!isValidMultihash(hash)) {
      throw new CommitError(
        createApiError("INVALID_DATA", `object/put returned an invalid hash: ${hash}`),
        this
      );
    }

    return new CommittedObject(new Reference(hash, snapshot.size), snapshot);
  }

  /**
   * Structural equality: same data bytes and the same links in order.
   */
  equals(other: DagObject | CommittedObject): boolean {
    return bytesEqual(this.data, other.data) && linksEqual(this.links, other.links);
  }
}

// ============================================================================
// CommittedObject
// ============================================================================

/**
 * An object the store has accepted, bound to its Reference.
 *
 * Exported from the package as a type only; instances come from
 * `DagObject.commit`, `getObject` and `Reference.get`.
 */
export class CommittedObject {
  readonly #reference: Reference;
  readonly #data: Uint8Array;
  readonly #links: readonly Link[];

  /** @internal */
  constructor(reference: Reference, object: DagObject) {
    const size = object.size;
    if (reference.size !== size) {
      throw new Error(`Reference size ${reference.size} does not match object size ${size}`);
    }
    this.#reference = reference;
    this.#data = object.data;
    this.#links = Object.freeze(object.links.map((link) => Object.freeze({ ...link })));
  }

  get reference(): Reference {
    return this.#reference;
  }

  get hash(): string {
    return this.#reference.hash;
  }

  /** Precomputed cumulative size */
  get size(): number {
    return this.#reference.size;
  }

  /** A copy of the object's data */
  get data(): Uint8Array {
    return this.#data.slice();
  }

  get links(): readonly Link[] {
    return this.#links;
  }

  /**
   * Same traversal rules as `DagObject.get`.
   */
  get(path: string, ctx?: RequestContext): Promise<CommittedObject> {
    return getChild(this.#links, path, ctx);
  }

  intoReference(): Reference {
    return this.#reference;
  }

  /**
   * A new draft with this object's data and links. Committing it again
   * yields a new address if anything changed.
   */
  edit(): DagObject {
    return new DagObject(this.#data.slice(), copyLinks(this.#links));
  }

  /**
   * Metadata computed locally; no network call.
   */
  stat(): Stat {
    return {
      hash: this.hash,
      numLinks: this.#links.length,
      dataSize: this.#data.length,
      cumulativeSize: this.size,
    };
  }

  pin(recursive: boolean, ctx?: RequestContext): Promise<void> {
    return this.#reference.pin(recursive, ctx);
  }

  unpin(recursive: boolean, ctx?: RequestContext): Promise<void> {
    return this.#reference.unpin(recursive, ctx);
  }

  /**
   * Committed objects are equal when their references are.
   */
  equals(other: CommittedObject): boolean {
    return this.#reference.equals(other.reference);
  }

  /**
   * Compare data and links with a draft or another committed object.
   */
  sameContent(other: DagObject | CommittedObject): boolean {
    return bytesEqual(this.#data, other.data) && linksEqual(this.#links, other.links);
  }

  toString(): string {
    return this.#reference.toString();
  }
}

/**
 * Check whether a value is a CommittedObject
 */
export const isCommittedObject = (value: unknown): value is CommittedObject =>
  value instanceof CommittedObject;

// ============================================================================
// Fetch
// ============================================================================

/**
 * Fetch the object at `path` (a hash, `/ipfs/...` or `/ipns/...` path).
 *
 * The path is resolved recursively first; the hash is the final segment of
 * the resolved path. The reference carries the computed size, so a
 * reference taken from the result dereferences cleanly.
 *
 * @throws ApiError("INVALID_DATA") if the resolved path does not end in a
 *   base58 multihash
 */
export const getObject = async (path: string, ctx?: RequestContext): Promise<CommittedObject> => {
  const resolved = await resolve(path, true, ctx);
  const hash = lastPathSegment(resolved);
  if (!isValidMultihash(hash)) {
    throw createApiError("INVALID_DATA", `Resolved path does not end in a hash: ${resolved}`);
  }

  const node = await get(API_PATHS.OBJECT_GET, [["arg", resolved]], nodeCodec, ctx);
  const links = node.Links.map((link) => ({
    name: link.Name,
    object: new Reference(encodeBase58(link.Hash), link.Tsize),
  }));
  const object = new DagObject(node.Data, links);

  return new CommittedObject(new Reference(hash, object.size), object);
};
