/**
 * DAG-PB Node Encoding/Decoding
 *
 * Message types are loaded from merkledag.proto next to this file.
 *
 * Wire layout of a node: every Links entry (field 2) first, then Data
 * (field 1). Hashes are raw multihash bytes.
 */

import { fileURLToPath } from "node:url";
import protobuf from "protobufjs";
import { z } from "zod";

// ============================================================================
// Types
// ============================================================================

export type PBLink = {
  /** Raw multihash of the linked node */
  Hash: Uint8Array;
  Name: string;
  /** Cumulative size of the linked sub-DAG */
  Tsize: number;
};

export type PBNode = {
  Links: PBLink[];
  Data: Uint8Array;
};

// ============================================================================
// Schema
// ============================================================================

const root = protobuf.loadSync(fileURLToPath(new URL("./merkledag.proto", import.meta.url)));
const PBNodeType = root.lookupType("merkledag.PBNode");
const PBLinkType = root.lookupType("merkledag.PBLink");

/** field 2, length-delimited */
const LINKS_TAG = (2 << 3) | 2;
/** field 1, length-delimited */
const DATA_TAG = (1 << 3) | 2;

const bytesSchema = z.instanceof(Uint8Array).transform((bytes) => new Uint8Array(bytes));

const DecodedNodeSchema = z.object({
  Links: z.array(
    z.object({
      Hash: bytesSchema,
      Name: z.string(),
      Tsize: z.number().int().nonnegative(),
    })
  ),
  Data: bytesSchema,
});

// ============================================================================
// Encode / Decode
// ============================================================================

/**
 * Serialize a node. Links are written in the given order.
 */
export function encodePBNode(node: PBNode): Uint8Array {
  const writer = protobuf.Writer.create();

  for (const link of node.Links) {
    const message = PBLinkType.fromObject({
      Hash: link.Hash,
      Name: link.Name,
      Tsize: link.Tsize,
    });
    PBLinkType.encode(message, writer.uint32(LINKS_TAG).fork()).ldelim();
  }
  writer.uint32(DATA_TAG).bytes(node.Data);

  return writer.finish();
}

/**
 * Parse a serialized node. Absent optional fields decode to empty values
 * (empty bytes, "", 0).
 *
 * @throws Error if the bytes are not a well-formed PBNode
 */
export function decodePBNode(bytes: Uint8Array): PBNode {
  const message = PBNodeType.decode(bytes);
  const object = PBNodeType.toObject(message, {
    longs: Number,
    arrays: true,
    defaults: true,
  });

  const parsed = DecodedNodeSchema.safeParse(object);
  if (!parsed.success) {
    throw new Error(`Invalid PBNode: ${parsed.error.issues.map((i) => i.message).join("; ")}`);
  }
  return parsed.data;
}
