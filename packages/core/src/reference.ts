/**
 * Content-addressed reference
 */

import assert from "node:assert";
import {
  createApiError,
  ignoreCodec,
  isApiError,
  post,
  type QueryParams,
  type RequestContext,
} from "@dagkit/client";
import { API_PATHS, boolToQuery, INVALID_REF, NOT_PINNED, toIpfsPath } from "@dagkit/protocol";
import { type CommittedObject, getObject } from "./object.ts";

/**
 * A thin handle on a committed object: its hash and cumulative size.
 *
 * References originate only from a commit, a stat/lookup, or a decoded
 * node, which is why `get()` can hold the server to the size carried here.
 * The class is exported from the package as a type only.
 */
export class Reference {
  /** Base58 multihash of the referenced object */
  readonly hash: string;
  /** Cumulative size of the referenced sub-DAG in bytes */
  readonly size: number;

  /** @internal */
  constructor(hash: string, size: number) {
    this.hash = hash;
    this.size = size;
    Object.freeze(this);
  }

  /**
   * Fetch the referenced object.
   *
   * @throws ApiError("INVALID_DATA") if the fetched object's size differs
   *   from this reference's size
   */
  async get(ctx?: RequestContext): Promise<CommittedObject> {
    const object = await getObject(this.hash, ctx);
    if (object.size !== this.size) {
      throw createApiError("INVALID_DATA", "reference and referenced object sizes do not match");
    }
    return object;
  }

  /**
   * Pin the referenced object (and, if `recursive`, everything below it).
   */
  async pin(recursive: boolean, ctx?: RequestContext): Promise<void> {
    await post(API_PATHS.PIN_ADD, this.pinQuery(recursive), ignoreCodec, ctx);
  }

  /**
   * Unpin the referenced object. Unpinning something that is not pinned
   * succeeds.
   */
  async unpin(recursive: boolean, ctx?: RequestContext): Promise<void> {
    try {
      await post(API_PATHS.PIN_RM, this.pinQuery(recursive), ignoreCodec, ctx);
    } catch (err) {
      if (isApiError(err, "OTHER")) {
        if (err.message === NOT_PINNED) return;
        if (process.env.NODE_ENV !== "production") {
          assert.notStrictEqual(err.message, INVALID_REF, "sent an invalid ref to the server");
        }
      }
      throw err;
    }
  }

  equals(other: Reference): boolean {
    return this.hash === other.hash && this.size === other.size;
  }

  /** `/ipfs/<hash>` */
  toString(): string {
    return toIpfsPath(this.hash);
  }

  toJSON(): { hash: string; size: number } {
    return { hash: this.hash, size: this.size };
  }

  private pinQuery(recursive: boolean): QueryParams {
    return [
      ["recursive", boolToQuery(recursive)],
      ["arg", this.hash],
    ];
  }
}

/**
 * Check whether a value is a Reference
 */
export const isReference = (value: unknown): value is Reference => value instanceof Reference;
