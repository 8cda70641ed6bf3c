/**
 * @dagkit/merkledag
 *
 * Protobuf codec for merkle-DAG nodes as exchanged with object/get and
 * object/put.
 */

export type { PBLink, PBNode } from "./pb-node.ts";
export { decodePBNode, encodePBNode } from "./pb-node.ts";
