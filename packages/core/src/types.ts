/**
 * Object Model Types
 */

import type { Reference } from "./reference.ts";

/**
 * A named edge from an object to a committed sub-DAG.
 *
 * Names are short free-form UTF-8 labels. They need not be unique;
 * traversal takes the first link with a matching name.
 */
export type Link = {
  name: string;
  object: Reference;
};

/**
 * Object metadata, as returned by object/stat or derived from a
 * committed object without touching the network.
 */
export type Stat = {
  /** Base58 multihash */
  hash: string;
  /** Number of links */
  numLinks: number;
  /** Bytes in this node's data */
  dataSize: number;
  /** Total size of the DAG rooted here */
  cumulativeSize: number;
};
