import type { z } from "zod";
import {
  estimateTreeSize,
  nodeTreesEqual,
  readNodeTree,
  writeTreeOptionals,
} from "./node-tree.js";
import { PackageType, TimePhase } from "./types.js";
import type {
  BroadcastPackage,
  DecodeResult,
  MeshPackage,
  MeshPackageType,
  NodeId,
  NodeSyncReplyPackage,
  NodeSyncRequestPackage,
  PackageOfType,
  SinglePackage,
  TimeDelayPackage,
  TimeSyncMessage,
  TimeSyncPackage,
  WireObject,
} from "./types.js";
import {
  assertUint32,
  invalidPackage,
  NodeSyncSchema,
  PackageTypeSchema,
  TextPackageSchema,
  TimeSyncMessageSchema,
  TimeSyncSchema,
} from "./wire-schema.js";
import { objectSize, utf8Length, type WireSize } from "./wire-size.js";

// ─── Builders ───────────────────────────────────────────────────────

type TextParams = {
  from: NodeId;
  dest: NodeId;
  msg?: string;
};

export function createSinglePackage(params: TextParams): SinglePackage {
  return {
    type: PackageType.SINGLE,
    from: assertUint32(params.from, "from"),
    dest: assertUint32(params.dest, "dest"),
    msg: params.msg ?? "",
  };
}

export function createBroadcastPackage(params: TextParams): BroadcastPackage {
  return {
    type: PackageType.BROADCAST,
    from: assertUint32(params.from, "from"),
    dest: assertUint32(params.dest, "dest"),
    msg: params.msg ?? "",
  };
}

type TimeParams = {
  from: NodeId;
  dest: NodeId;
  t0?: number;
  t1?: number;
  t2?: number;
};

/**
 * The phase follows from the readings given: none starts a sync request,
 * `t0` alone is a time request, `t0` with `t1` (and `t2`, default 0) a reply.
 * A later reading without the earlier ones throws.
 */
export function buildTimeSyncMessage(params: Omit<TimeParams, "from" | "dest">): TimeSyncMessage {
  if (params.t0 === undefined) {
    if (params.t1 !== undefined || params.t2 !== undefined) {
      throw new RangeError("t1 and t2 need t0");
    }
    return { type: TimePhase.TIME_SYNC_REQUEST };
  }
  const t0 = assertUint32(params.t0, "t0");
  if (params.t1 === undefined) {
    if (params.t2 !== undefined) {
      throw new RangeError("t2 needs t1");
    }
    return { type: TimePhase.TIME_REQUEST, t0 };
  }
  return {
    type: TimePhase.TIME_REPLY,
    t0,
    t1: assertUint32(params.t1, "t1"),
    t2: assertUint32(params.t2 ?? 0, "t2"),
  };
}

export function createTimeSyncPackage(params: TimeParams): TimeSyncPackage {
  return {
    type: PackageType.TIME_SYNC,
    from: assertUint32(params.from, "from"),
    dest: assertUint32(params.dest, "dest"),
    msg: buildTimeSyncMessage(params),
  };
}

export function createTimeDelayPackage(params: TimeParams): TimeDelayPackage {
  return {
    type: PackageType.TIME_DELAY,
    from: assertUint32(params.from, "from"),
    dest: assertUint32(params.dest, "dest"),
    msg: buildTimeSyncMessage(params),
  };
}

// ─── Encoding ───────────────────────────────────────────────────────

function encodeTextFields(pkg: SinglePackage | BroadcastPackage, into: WireObject): WireObject {
  into.type = PackageType.SINGLE;
  into.dest = pkg.dest;
  into.from = pkg.from;
  into.msg = pkg.msg;
  return into;
}

function encodeSyncFields(
  pkg: NodeSyncRequestPackage | NodeSyncReplyPackage,
  into: WireObject,
): WireObject {
  into.type = PackageType.NODE_SYNC_REQUEST;
  into.nodeId = pkg.nodeId;
  into.dest = pkg.dest;
  into.from = pkg.from;
  return writeTreeOptionals(into, pkg);
}

export function encodeTimeSyncMessage(msg: TimeSyncMessage): WireObject {
  const out: WireObject = { type: msg.type };
  if (msg.type !== TimePhase.TIME_SYNC_REQUEST) {
    out.t0 = msg.t0;
  }
  if (msg.type === TimePhase.TIME_REPLY) {
    out.t1 = msg.t1;
    out.t2 = msg.t2;
  }
  return out;
}

function encodeTimeFields(pkg: TimeSyncPackage | TimeDelayPackage, into: WireObject): WireObject {
  into.type = PackageType.TIME_SYNC;
  into.dest = pkg.dest;
  into.from = pkg.from;
  into.msg = encodeTimeSyncMessage(pkg.msg);
  return into;
}

/**
 * Add the package's fields to `into` and return it. Variants sharing a layout
 * share a field writer; every variant writes its own discriminant last.
 */
export function encodePackage(pkg: MeshPackage, into: WireObject = {}): WireObject {
  switch (pkg.type) {
    case PackageType.SINGLE:
    case PackageType.BROADCAST:
      encodeTextFields(pkg, into);
      break;
    case PackageType.NODE_SYNC_REQUEST:
    case PackageType.NODE_SYNC_REPLY:
      encodeSyncFields(pkg, into);
      break;
    case PackageType.TIME_SYNC:
    case PackageType.TIME_DELAY:
      encodeTimeFields(pkg, into);
      break;
  }
  into.type = pkg.type;
  return into;
}

// ─── Decoding ───────────────────────────────────────────────────────

function readTimeSyncMessage(msg: z.infer<typeof TimeSyncMessageSchema>): TimeSyncMessage {
  switch (msg.type) {
    case TimePhase.TIME_SYNC_REQUEST:
      return { type: TimePhase.TIME_SYNC_REQUEST };
    case TimePhase.TIME_REQUEST:
      return { type: TimePhase.TIME_REQUEST, t0: msg.t0 ?? 0 };
    case TimePhase.TIME_REPLY:
      return { type: TimePhase.TIME_REPLY, t0: msg.t0 ?? 0, t1: msg.t1 ?? 0, t2: msg.t2 ?? 0 };
  }
}

type PackageDecoders = {
  [K in MeshPackageType]: (doc: WireObject) => DecodeResult<PackageOfType<K>>;
};

const DECODERS: PackageDecoders = {
  [PackageType.SINGLE]: (doc) => {
    const parsed = TextPackageSchema.safeParse(doc);
    if (!parsed.success) {
      return invalidPackage("single", parsed.error);
    }
    const { from, dest, msg } = parsed.data;
    return { ok: true, value: { type: PackageType.SINGLE, from, dest, msg } };
  },
  [PackageType.BROADCAST]: (doc) => {
    const parsed = TextPackageSchema.safeParse(doc);
    if (!parsed.success) {
      return invalidPackage("broadcast", parsed.error);
    }
    const { from, dest, msg } = parsed.data;
    return { ok: true, value: { type: PackageType.BROADCAST, from, dest, msg } };
  },
  [PackageType.NODE_SYNC_REQUEST]: (doc) => {
    const parsed = NodeSyncSchema.safeParse(doc);
    if (!parsed.success) {
      return invalidPackage("node sync request", parsed.error);
    }
    return {
      ok: true,
      value: {
        type: PackageType.NODE_SYNC_REQUEST,
        ...readNodeTree(parsed.data),
        from: parsed.data.from,
        dest: parsed.data.dest,
      },
    };
  },
  [PackageType.NODE_SYNC_REPLY]: (doc) => {
    const parsed = NodeSyncSchema.safeParse(doc);
    if (!parsed.success) {
      return invalidPackage("node sync reply", parsed.error);
    }
    return {
      ok: true,
      value: {
        type: PackageType.NODE_SYNC_REPLY,
        ...readNodeTree(parsed.data),
        from: parsed.data.from,
        dest: parsed.data.dest,
      },
    };
  },
  [PackageType.TIME_SYNC]: (doc) => {
    const parsed = TimeSyncSchema.safeParse(doc);
    if (!parsed.success) {
      return invalidPackage("time sync", parsed.error);
    }
    const { from, dest, msg } = parsed.data;
    return {
      ok: true,
      value: { type: PackageType.TIME_SYNC, from, dest, msg: readTimeSyncMessage(msg) },
    };
  },
  [PackageType.TIME_DELAY]: (doc) => {
    const parsed = TimeSyncSchema.safeParse(doc);
    if (!parsed.success) {
      return invalidPackage("time delay", parsed.error);
    }
    const { from, dest, msg } = parsed.data;
    return {
      ok: true,
      value: { type: PackageType.TIME_DELAY, from, dest, msg: readTimeSyncMessage(msg) },
    };
  },
};

/**
 * Decode `doc` with the field rules of `kind`, whatever its own `type` says.
 * Check the discriminant first: a document of another kind that happens to
 * carry the required fields decodes into a wrong but well-formed package.
 */
export function decodePackageAs<K extends MeshPackageType>(
  kind: K,
  doc: WireObject,
): DecodeResult<PackageOfType<K>> {
  const decode = DECODERS[kind];
  return decode(doc);
}

/** Decode `doc` as the variant named by its own `type` field. */
export function decodePackage(doc: WireObject): DecodeResult<MeshPackage> {
  const kind = PackageTypeSchema.safeParse(doc.type);
  if (!kind.success) {
    return {
      ok: false,
      code: "INVALID_PACKAGE",
      message: `unknown package type ${JSON.stringify(doc.type ?? null)}`,
    };
  }
  return decodePackageAs(kind.data, doc);
}

// ─── Size and equality ──────────────────────────────────────────────

function timeMessageMembers(msg: TimeSyncMessage): number {
  switch (msg.type) {
    case TimePhase.TIME_SYNC_REQUEST:
      return 1;
    case TimePhase.TIME_REQUEST:
      return 2;
    case TimePhase.TIME_REPLY:
      return 4;
  }
}

/**
 * Capacity the encoded package needs. Used to pre-size buffers on the nodes;
 * an undershoot only costs a reallocation there.
 */
export function estimateWireSize(pkg: MeshPackage): WireSize {
  switch (pkg.type) {
    case PackageType.SINGLE:
    case PackageType.BROADCAST:
      return { slots: objectSize(4), bytes: Math.ceil(1.1 * utf8Length(pkg.msg)) };
    case PackageType.NODE_SYNC_REQUEST:
    case PackageType.NODE_SYNC_REPLY:
      // nodeId, type, dest, from
      return estimateTreeSize(pkg, 4);
    case PackageType.TIME_SYNC:
    case PackageType.TIME_DELAY:
      return { slots: objectSize(4) + objectSize(timeMessageMembers(pkg.msg)), bytes: 0 };
  }
}

export function timeSyncMessagesEqual(a: TimeSyncMessage, b: TimeSyncMessage): boolean {
  switch (a.type) {
    case TimePhase.TIME_SYNC_REQUEST:
      return b.type === TimePhase.TIME_SYNC_REQUEST;
    case TimePhase.TIME_REQUEST:
      return b.type === TimePhase.TIME_REQUEST && a.t0 === b.t0;
    case TimePhase.TIME_REPLY:
      return b.type === TimePhase.TIME_REPLY && a.t0 === b.t0 && a.t1 === b.t1 && a.t2 === b.t2;
  }
}

export function packagesEqual(a: MeshPackage, b: MeshPackage): boolean {
  if (a.type !== b.type || a.from !== b.from || a.dest !== b.dest) {
    return false;
  }
  switch (a.type) {
    case PackageType.SINGLE:
    case PackageType.BROADCAST:
      return (b.type === PackageType.SINGLE || b.type === PackageType.BROADCAST) && a.msg === b.msg;
    case PackageType.NODE_SYNC_REQUEST:
    case PackageType.NODE_SYNC_REPLY:
      return (
        (b.type === PackageType.NODE_SYNC_REQUEST || b.type === PackageType.NODE_SYNC_REPLY) &&
        nodeTreesEqual(a, b)
      );
    case PackageType.TIME_SYNC:
    case PackageType.TIME_DELAY:
      return (
        (b.type === PackageType.TIME_SYNC || b.type === PackageType.TIME_DELAY) &&
        timeSyncMessagesEqual(a.msg, b.msg)
      );
  }
}

const PACKAGE_TYPE_NAMES: Record<number, string> = {
  [PackageType.TIME_DELAY]: "time-delay",
  [PackageType.TIME_SYNC]: "time-sync",
  [PackageType.NODE_SYNC_REQUEST]: "node-sync-request",
  [PackageType.NODE_SYNC_REPLY]: "node-sync-reply",
  [PackageType.CONTROL]: "control",
  [PackageType.BROADCAST]: "broadcast",
  [PackageType.SINGLE]: "single",
};

export function packageTypeName(type: number): string {
  return PACKAGE_TYPE_NAMES[type] ?? "unknown";
}
