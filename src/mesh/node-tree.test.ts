import { describe, expect, it } from "vitest";
import {
  buildSyncReply,
  buildSyncRequest,
  createNodeTree,
  decodeNodeTree,
  listTreeNodes,
  nodeTreeFromSync,
  nodeTreesEqual,
  nodeTreeToString,
  treeContainsNode,
} from "./node-tree.js";
import { decodePackage, encodePackage, packagesEqual } from "./packages.js";

describe("buildSyncRequest()", () => {
  it("flattens subtrees into known nodes in the order given", () => {
    const pkg = buildSyncRequest(1, 2, [
      createNodeTree({ nodeId: 3, knownNodes: [4, 5] }),
      createNodeTree({ nodeId: 6 }),
    ]);
    expect(pkg).toEqual({
      type: 5,
      nodeId: 1,
      root: false,
      containsRoot: false,
      knownNodes: [3, 4, 5, 6],
      from: 1,
      dest: 2,
    });
  });

  it("encodes the aggregate with only the members that carry information", () => {
    const pkg = buildSyncRequest(1, 2, [createNodeTree({ nodeId: 3, knownNodes: [4, 5] })]);
    const text = JSON.stringify(encodePackage(pkg));
    expect(text).toBe('{"type":5,"nodeId":1,"dest":2,"from":1,"knownNodes":[3,4,5]}');

    const decoded = decodePackage(JSON.parse(text));
    expect(decoded.ok).toBe(true);
    if (decoded.ok) {
      expect(packagesEqual(decoded.value, pkg)).toBe(true);
      expect(decoded.value).toMatchObject({ containsRoot: false, knownNodes: [3, 4, 5] });
    }
  });

  it("marks the root as reachable when a subtree is or contains it", () => {
    expect(buildSyncRequest(1, 2, [createNodeTree({ nodeId: 3, root: true })]).containsRoot).toBe(true);
    expect(
      buildSyncRequest(1, 2, [createNodeTree({ nodeId: 3, containsRoot: true, knownNodes: [4] })]).containsRoot,
    ).toBe(true);
    expect(buildSyncRequest(1, 2, [createNodeTree({ nodeId: 3 })]).containsRoot).toBe(false);
  });

  it("lets a lone root advertise itself", () => {
    const pkg = buildSyncRequest(1, 2, [], true);
    expect(encodePackage(pkg)).toEqual({ type: 5, nodeId: 1, dest: 2, from: 1, root: true });
  });

  it("rejects an invalid destination", () => {
    expect(() => buildSyncRequest(1, -2, [])).toThrow("destId must be an unsigned 32-bit integer (got -2)");
  });
});

describe("buildSyncReply()", () => {
  it("aggregates like a request under the reply discriminant", () => {
    const subtrees = [createNodeTree({ nodeId: 7, knownNodes: [8] })];
    const reply = buildSyncReply(2, 1, subtrees);
    expect(reply.type).toBe(6);
    expect(nodeTreesEqual(reply, buildSyncRequest(2, 1, subtrees))).toBe(true);
  });

  it("survives the wire", () => {
    const reply = buildSyncReply(2, 1, [createNodeTree({ nodeId: 7, root: true })]);
    expect(decodePackage(encodePackage(reply))).toEqual({ ok: true, value: reply });
  });
});

describe("node tree helpers", () => {
  const tree = createNodeTree({ nodeId: 3, knownNodes: [4, 5] });

  it("lists the tree's own id first", () => {
    expect(listTreeNodes(tree)).toEqual([3, 4, 5]);
  });

  it("finds member nodes", () => {
    expect(treeContainsNode(tree, 3)).toBe(true);
    expect(treeContainsNode(tree, 5)).toBe(true);
    expect(treeContainsNode(tree, 6)).toBe(false);
  });

  it("compares known nodes in order", () => {
    expect(nodeTreesEqual(tree, createNodeTree({ nodeId: 3, knownNodes: [4, 5] }))).toBe(true);
    expect(nodeTreesEqual(tree, createNodeTree({ nodeId: 3, knownNodes: [5, 4] }))).toBe(false);
    expect(nodeTreesEqual(tree, createNodeTree({ nodeId: 3, knownNodes: [4, 5], root: true }))).toBe(false);
  });

  it("keeps a received sync package as a subtree without its addressing", () => {
    const received = buildSyncReply(3, 1, [createNodeTree({ nodeId: 4 })]);
    const subtree = nodeTreeFromSync(received);
    expect(subtree).toEqual({ nodeId: 3, root: false, containsRoot: false, knownNodes: [4] });
    subtree.knownNodes.push(9);
    expect(received.knownNodes).toEqual([4]);
  });

  it("prints compact and indented forms", () => {
    expect(nodeTreeToString(tree)).toBe('{"nodeId":3,"knownNodes":[4,5]}');
    expect(nodeTreeToString(createNodeTree({ nodeId: 1 }), true)).toBe('{\n  "nodeId": 1\n}');
  });
});

describe("decodeNodeTree()", () => {
  it("reads a bare tree", () => {
    expect(decodeNodeTree({ nodeId: 3, containsRoot: true, knownNodes: [4] })).toEqual({
      ok: true,
      value: { nodeId: 3, root: false, containsRoot: true, knownNodes: [4] },
    });
  });

  it("falls back to the sender, then zero, for the node id", () => {
    expect(decodeNodeTree({ from: 5 })).toEqual({
      ok: true,
      value: { nodeId: 5, root: false, containsRoot: false, knownNodes: [] },
    });
    expect(decodeNodeTree({})).toEqual({
      ok: true,
      value: { nodeId: 0, root: false, containsRoot: false, knownNodes: [] },
    });
  });

  it("reports wrongly typed members", () => {
    expect(decodeNodeTree({ nodeId: "3" })).toEqual({
      ok: false,
      code: "INVALID_PACKAGE",
      message: "invalid node tree package: nodeId: Expected number, received string",
    });
  });
});
