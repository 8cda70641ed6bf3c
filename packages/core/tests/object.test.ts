/**
 * Object model tests: commit, fetch and traversal against the fake node.
 */

import { ApiError, type RequestContext } from "@dagkit/client";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { CommitError, CommittedObject, DagObject, getObject } from "../src/object.ts";
import { Reference } from "../src/reference.ts";
import { stat } from "../src/stat.ts";
import { createFakeNode, type FakeNode, hashBlock } from "./fake-node.ts";

const encoder = new TextEncoder();
const decoder = new TextDecoder();

const bytes = (text: string) => encoder.encode(text);
const text = (data: Uint8Array) => decoder.decode(data);

let node: FakeNode;
let ctx: RequestContext;

beforeEach(() => {
  node = createFakeNode();
  ctx = { endpoint: node.endpoint, fetch: node.fetch };
});

const commitText = (content: string): Promise<CommittedObject> =>
  new DagObject(bytes(content)).commit(ctx);

// ============================================================================
// DagObject
// ============================================================================

describe("DagObject", () => {
  it("should default to empty data and no links", () => {
    const draft = new DagObject();
    expect(draft.data.length).toBe(0);
    expect(draft.links).toEqual([]);
    expect(draft.size).toBe(0);
  });

  it("should add the sizes of linked objects to its own data length", async () => {
    const child = await commitText("testing");
    const draft = new DagObject(bytes("ab")).addLink("t", child).addLink("u", child.reference);

    expect(draft.size).toBe(2 + 7 + 7);
    expect(draft.links.map((l) => l.name)).toEqual(["t", "u"]);
    expect(draft.links[1]?.object.equals(child.reference)).toBe(true);
  });

  it("should compare data and links structurally", async () => {
    const child = await commitText("testing");
    const a = new DagObject(bytes("x"), [{ name: "t", object: child.reference }]);
    const b = new DagObject(bytes("x"), [{ name: "t", object: child.reference }]);
    const renamed = new DagObject(bytes("x"), [{ name: "other", object: child.reference }]);

    expect(a.equals(b)).toBe(true);
    expect(a.equals(renamed)).toBe(false);
    expect(a.equals(new DagObject(bytes("y"), b.links))).toBe(false);
  });
});

// ============================================================================
// Commit
// ============================================================================

describe("commit", () => {
  it("should store a leaf and fetch it back by hash", async () => {
    const committed = await commitText("testing");

    expect(committed.size).toBe(7);
    expect(committed.hash).toBe(node.blocks.keys().next().value);

    const fetched = await getObject(committed.hash, ctx);
    expect(fetched.equals(committed)).toBe(true);
    expect(text(fetched.data)).toBe("testing");
    expect(fetched.links).toEqual([]);
  });

  it("should post protobuf input with a closed connection", async () => {
    await commitText("testing");

    const [request] = node.requestsTo("object/put");
    expect(request?.method).toBe("POST");
    expect([...(request?.query.entries() ?? [])]).toEqual([
      ["encoding", "json"],
      ["inputenc", "protobuf"],
    ]);
    expect(request?.headers.get("connection")).toBe("close");
  });

  it("should keep link order and sizes through a round trip", async () => {
    const b = await commitText("bbb");
    const a = await commitText("a");
    const parent = await new DagObject(bytes("p"))
      .addLink("zeta", b)
      .addLink("alpha", a)
      .commit(ctx);

    const fetched = await getObject(parent.hash, ctx);

    expect(fetched.reference.equals(parent.reference)).toBe(true);
    expect(fetched.size).toBe(1 + 3 + 1);
    expect(fetched.links.map((l) => [l.name, l.object.hash, l.object.size])).toEqual([
      ["zeta", b.hash, 3],
      ["alpha", a.hash, 1],
    ]);
    expect(fetched.sameContent(parent)).toBe(true);
  });

  it("should produce the same hash for the same content", async () => {
    const first = await commitText("same");
    const second = await commitText("same");

    expect(second.hash).toBe(first.hash);
    expect(second.equals(first)).toBe(true);
  });

  it("should snapshot the draft when the call starts", async () => {
    const draft = new DagObject(bytes("original"));
    const pending = draft.commit(ctx);
    draft.data = bytes("changed");
    const committed = await pending;

    expect(text(committed.data)).toBe("original");
    expect(committed.size).toBe(8);
  });

  it("should throw CommitError carrying the draft when the store rejects it", async () => {
    const draft = new DagObject(bytes("testing"));
    node.failNext("object/put", "blockstore full");

    const error = await draft.commit(ctx).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(CommitError);
    if (!(error instanceof CommitError)) return;
    expect(error.object).toBe(draft);
    expect(error.message).toBe("blockstore full");
    expect(error.error.kind).toBe("OTHER");
    expect(error.error.status).toBe(500);

    const retried = await error.object.commit(ctx);
    expect(text(retried.data)).toBe("testing");
  });

  it("should report a refused connection as an IO CommitError", async () => {
    node.setOffline(true);

    const error = await new DagObject(bytes("x")).commit(ctx).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(CommitError);
    if (!(error instanceof CommitError)) return;
    expect(error.error.kind).toBe("IO");
    expect(error.message).toBe("fetch failed");
  });

  it("should report a malformed per-call endpoint as an INVALID_INPUT CommitError", async () => {
    const error = await new DagObject(bytes("x"))
      .commit({ endpoint: "not a url", fetch: node.fetch })
      .catch((err: unknown) => err);

    expect(error).toBeInstanceOf(CommitError);
    if (!(error instanceof CommitError)) return;
    expect(error.error.kind).toBe("INVALID_INPUT");
    expect(node.requests).toEqual([]);
  });

  it("should reject a put response whose hash is not a multihash", async () => {
    const fakePut = vi.fn(async () => new Response(JSON.stringify({ Hash: "0OIl" })));

    const error = await new DagObject(bytes("x"))
      .commit({ endpoint: node.endpoint, fetch: fakePut })
      .catch((err: unknown) => err);

    expect(error).toBeInstanceOf(CommitError);
    if (!(error instanceof CommitError)) return;
    expect(error.error.kind).toBe("INVALID_DATA");
    expect(error.message).toBe("object/put returned an invalid hash: 0OIl");
  });

  it("should refuse to encode a link whose hash is not base58 without sending anything", async () => {
    const draft = new DagObject(new Uint8Array(0), [{ name: "x", object: new Reference("0OIl", 1) }]);

    await expect(draft.commit(ctx)).rejects.toThrow('Link "x" has a non-base58 hash: 0OIl');
    expect(node.requests).toEqual([]);
  });
});

// ============================================================================
// CommittedObject
// ============================================================================

describe("CommittedObject", () => {
  it("should return a copy of its data", async () => {
    const committed = await commitText("abc");
    const data = committed.data;
    data[0] = 0x7a;

    expect(text(committed.data)).toBe("abc");
  });

  it("should expose frozen links", async () => {
    const child = await commitText("c");
    const parent = await new DagObject().addLink("c", child).commit(ctx);

    expect(Object.isFrozen(parent.links)).toBe(true);
    expect(Object.isFrozen(parent.links[0])).toBe(true);
  });

  it("should edit into an independent draft", async () => {
    const committed = await commitText("abc");
    const draft = committed.edit();

    expect(draft.equals(committed)).toBe(true);
    expect(committed.sameContent(draft)).toBe(true);

    draft.data = bytes("abcd");
    const edited = await draft.commit(ctx);

    expect(text(committed.data)).toBe("abc");
    expect(edited.hash).not.toBe(committed.hash);
    expect(edited.size).toBe(4);
  });

  it("should recommit an unchanged edit to the same hash", async () => {
    const committed = await commitText("abc");
    const again = await committed.edit().commit(ctx);

    expect(again.hash).toBe(committed.hash);
  });

  it("should compute stat locally to match the store", async () => {
    const child = await commitText("testing");
    const parent = await new DagObject().addLink("t", child).commit(ctx);
    const requestsBefore = node.requests.length;

    const local = parent.stat();

    expect(node.requests.length).toBe(requestsBefore);
    expect(local).toEqual({
      hash: parent.hash,
      numLinks: 1,
      dataSize: 0,
      cumulativeSize: 7,
    });
    expect(await stat(parent.hash, ctx)).toEqual(local);
  });

  it("should hand back its reference", async () => {
    const committed = await commitText("abc");

    expect(committed.intoReference()).toBe(committed.reference);
    expect(committed.toString()).toBe(`/ipfs/${committed.hash}`);
  });

  it("should refuse a reference whose size does not match the object", () => {
    const hash = hashBlock(bytes("abc"));
    expect(() => new CommittedObject(new Reference(hash, 1), new DagObject(bytes("abc")))).toThrow(
      "Reference size 1 does not match object size 3"
    );
  });
});

// ============================================================================
// Traversal
// ============================================================================

describe("get", () => {
  const unreachable = (): RequestContext => ({
    endpoint: node.endpoint,
    fetch: vi.fn(async () => {
      throw new Error("no request expected");
    }),
  });

  it("should fetch a direct child by link name", async () => {
    const child = await commitText("testing");
    const parent = await new DagObject().addLink("t", child).commit(ctx);

    expect(parent.size).toBe(7);

    const fetched = await parent.get("t", ctx);
    expect(fetched.equals(child)).toBe(true);
    expect(text(fetched.data)).toBe("testing");
  });

  it("should traverse from a draft as well", async () => {
    const child = await commitText("testing");
    const draft = new DagObject().addLink("t", child);

    const fetched = await draft.get("t", ctx);
    expect(fetched.equals(child)).toBe(true);
  });

  it("should send the rest of the path to the store after the first link", async () => {
    const leaf = await commitText("leaf");
    const mid = await new DagObject().addLink("c", leaf).commit(ctx);
    const top = await new DagObject().addLink("b", mid).commit(ctx);
    const root = await new DagObject().addLink("a", top).commit(ctx);

    const fetched = await root.get("a/b/c", ctx);

    expect(fetched.equals(leaf)).toBe(true);
    const [resolveRequest] = node.requestsTo("resolve");
    expect(resolveRequest?.query.get("arg")).toBe(`${top.hash}/b/c`);
    expect(resolveRequest?.query.get("recursive")).toBe("true");
  });

  it("should treat a trailing slash as the child itself", async () => {
    const child = await commitText("testing");
    const parent = await new DagObject().addLink("t", child).commit(ctx);

    const fetched = await parent.get("t/", ctx);

    expect(fetched.equals(child)).toBe(true);
    expect(node.requestsTo("resolve")[0]?.query.get("arg")).toBe(child.hash);
  });

  it("should reject an empty path without a request", async () => {
    const local = unreachable();
    const error = await new DagObject().get("", local).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ApiError);
    if (!(error instanceof ApiError)) return;
    expect(error.kind).toBe("INVALID_INPUT");
    expect(error.message).toBe("cannot resolve empty path");
    expect(local.fetch).not.toHaveBeenCalled();
  });

  it("should reject an absolute path without a request", async () => {
    const child = await commitText("testing");
    const local = unreachable();
    const error = await new DagObject()
      .addLink("t", child)
      .get("/t", local)
      .catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ApiError);
    if (!(error instanceof ApiError)) return;
    expect(error.kind).toBe("INVALID_INPUT");
    expect(error.message).toBe("expected relative path");
    expect(local.fetch).not.toHaveBeenCalled();
  });

  it("should report a missing link name as NOT_FOUND without a request", async () => {
    const child = await commitText("testing");
    const local = unreachable();
    const error = await new DagObject()
      .addLink("t", child)
      .get("missing/t", local)
      .catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ApiError);
    if (!(error instanceof ApiError)) return;
    expect(error.kind).toBe("NOT_FOUND");
    expect(error.message).toBe("path lookup failed");
    expect(local.fetch).not.toHaveBeenCalled();
  });

  it("should report NOT_FOUND on a committed object with no links", async () => {
    const leaf = await commitText("leaf");
    const local = unreachable();

    await expect(leaf.get("missing", local)).rejects.toMatchObject({
      kind: "NOT_FOUND",
      message: "path lookup failed",
    });
    await expect(new DagObject().get("missing", local)).rejects.toMatchObject({
      kind: "NOT_FOUND",
    });
    expect(local.fetch).not.toHaveBeenCalled();
  });

  it("should take the first of several links with the same name", async () => {
    const first = await commitText("first");
    const second = await commitText("second");
    const parent = await new DagObject().addLink("dup", first).addLink("dup", second).commit(ctx);

    const fetched = await parent.get("dup", ctx);
    expect(text(fetched.data)).toBe("first");
  });

  it("should surface store failures below the first segment as OTHER", async () => {
    const child = await commitText("testing");
    const parent = await new DagObject().addLink("t", child).commit(ctx);

    await expect(parent.get("t/nope", ctx)).rejects.toMatchObject({
      kind: "OTHER",
      message: `no link named "nope" under ${child.hash}`,
    });
  });
});

// ============================================================================
// getObject
// ============================================================================

describe("getObject", () => {
  it("should resolve /ipfs/ paths", async () => {
    const committed = await commitText("testing");

    const fetched = await getObject(`/ipfs/${committed.hash}`, ctx);
    expect(fetched.equals(committed)).toBe(true);
  });

  it("should fetch the object named by the resolved path", async () => {
    const committed = await commitText("testing");
    await getObject(committed.hash, ctx);

    expect(node.requestsTo("object/get")[0]?.query.get("arg")).toBe(`/ipfs/${committed.hash}`);
    expect(node.requestsTo("object/get")[0]?.query.get("encoding")).toBe("protobuf");
  });

  it("should reject a resolved path that does not end in a hash", async () => {
    const fakeResolve = vi.fn(
      async () => new Response(JSON.stringify({ Path: "/ipfs/QmSomething/sub/dir" }))
    );

    await expect(
      getObject("/ipns/example", { endpoint: node.endpoint, fetch: fakeResolve })
    ).rejects.toMatchObject({
      kind: "INVALID_DATA",
      message: "Resolved path does not end in a hash: /ipfs/QmSomething/sub/dir",
    });
    expect(fakeResolve).toHaveBeenCalledTimes(1);
  });

  it("should report an unknown object as OTHER", async () => {
    const missing = hashBlock(bytes("never stored"));

    await expect(getObject(missing, ctx)).rejects.toMatchObject({
      kind: "OTHER",
      message: "merkledag: not found",
    });
  });
});
