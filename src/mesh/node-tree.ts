import type { z } from "zod";
import { PackageType } from "./types.js";
import type {
  DecodeResult,
  NodeId,
  NodeSyncReplyPackage,
  NodeSyncRequestPackage,
  NodeTree,
  WireObject,
} from "./types.js";
import { assertUint32, invalidPackage, NodeTreeSchema } from "./wire-schema.js";
import { arraySize, objectSize, type WireSize } from "./wire-size.js";

type NodeSyncPackage = NodeSyncRequestPackage | NodeSyncReplyPackage;

export function createNodeTree(params: {
  nodeId: NodeId;
  root?: boolean;
  containsRoot?: boolean;
  knownNodes?: NodeId[];
}): NodeTree {
  return {
    nodeId: assertUint32(params.nodeId, "nodeId"),
    root: params.root ?? false,
    containsRoot: params.containsRoot ?? false,
    knownNodes: (params.knownNodes ?? []).map((id) => assertUint32(id, "knownNodes entry")),
  };
}

/** The tree's own id followed by every node reachable through it. */
export function listTreeNodes(tree: NodeTree): NodeId[] {
  return [tree.nodeId, ...tree.knownNodes];
}

export function treeContainsNode(tree: NodeTree, nodeId: NodeId): boolean {
  return tree.nodeId === nodeId || tree.knownNodes.includes(nodeId);
}

export function nodeTreesEqual(a: NodeTree, b: NodeTree): boolean {
  if (
    a.nodeId !== b.nodeId ||
    a.root !== b.root ||
    a.containsRoot !== b.containsRoot ||
    a.knownNodes.length !== b.knownNodes.length
  ) {
    return false;
  }
  return a.knownNodes.every((id, i) => id === b.knownNodes[i]);
}

/** Strip the addressing from a received sync package to keep it as a subtree. */
export function nodeTreeFromSync(pkg: NodeSyncPackage): NodeTree {
  return {
    nodeId: pkg.nodeId,
    root: pkg.root,
    containsRoot: pkg.containsRoot,
    knownNodes: [...pkg.knownNodes],
  };
}

function aggregate(selfId: NodeId, subtrees: readonly NodeTree[], selfIsRoot: boolean): NodeTree {
  const knownNodes: NodeId[] = [];
  let containsRoot = false;
  for (const subtree of subtrees) {
    knownNodes.push(...listTreeNodes(subtree));
    if (subtree.root || subtree.containsRoot) {
      containsRoot = true;
    }
  }
  return {
    nodeId: assertUint32(selfId, "selfId"),
    root: selfIsRoot,
    containsRoot,
    knownNodes,
  };
}

/**
 * Advertise this node's view of the mesh to a neighbour.
 *
 * Each subtree must already carry the flattened closure of its own
 * descendants; they are concatenated in the given order, each as its node id
 * followed by its known nodes. The mesh is flattened one level per hop as
 * every node repeats this with the trees its neighbours sent it.
 */
export function buildSyncRequest(
  selfId: NodeId,
  destId: NodeId,
  subtrees: readonly NodeTree[],
  selfIsRoot = false,
): NodeSyncRequestPackage {
  return {
    type: PackageType.NODE_SYNC_REQUEST,
    ...aggregate(selfId, subtrees, selfIsRoot),
    from: selfId,
    dest: assertUint32(destId, "destId"),
  };
}

/** Answer half of the sync exchange; same aggregation as {@link buildSyncRequest}. */
export function buildSyncReply(
  selfId: NodeId,
  destId: NodeId,
  subtrees: readonly NodeTree[],
  selfIsRoot = false,
): NodeSyncReplyPackage {
  return {
    type: PackageType.NODE_SYNC_REPLY,
    ...aggregate(selfId, subtrees, selfIsRoot),
    from: selfId,
    dest: assertUint32(destId, "destId"),
  };
}

// ─── Wire fields ────────────────────────────────────────────────────

/** Optional tree members are left out entirely when false or empty. */
export function writeTreeOptionals(into: WireObject, tree: NodeTree): WireObject {
  if (tree.root) into.root = true;
  if (tree.containsRoot) into.containsRoot = true;
  if (tree.knownNodes.length > 0) {
    into.knownNodes = [...tree.knownNodes];
  }
  return into;
}

export function readNodeTree(fields: z.infer<typeof NodeTreeSchema>): NodeTree {
  return {
    nodeId: fields.nodeId ?? fields.from ?? 0,
    root: fields.root ?? false,
    containsRoot: fields.containsRoot ?? false,
    knownNodes: fields.knownNodes ?? [],
  };
}

export function estimateTreeSize(tree: NodeTree, requiredMembers: number): WireSize {
  let members = requiredMembers;
  if (tree.root) members++;
  if (tree.containsRoot) members++;
  if (tree.knownNodes.length > 0) members++;
  return {
    slots: objectSize(members) + arraySize(tree.knownNodes.length),
    bytes: 0,
  };
}

export function encodeNodeTree(tree: NodeTree, into: WireObject = {}): WireObject {
  into.nodeId = tree.nodeId;
  return writeTreeOptionals(into, tree);
}

/** A bare tree without `nodeId` takes its id from `from`, or 0. */
export function decodeNodeTree(doc: unknown): DecodeResult<NodeTree> {
  const parsed = NodeTreeSchema.safeParse(doc);
  if (!parsed.success) {
    return invalidPackage("node tree", parsed.error);
  }
  return { ok: true, value: readNodeTree(parsed.data) };
}

export function nodeTreeToString(tree: NodeTree, pretty = false): string {
  return JSON.stringify(encodeNodeTree(tree), null, pretty ? 2 : undefined);
}
