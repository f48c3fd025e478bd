/** 32-bit unsigned node identifier. `0` is reserved for "no destination". */
export type NodeId = number;

export const UINT32_MAX = 0xffff_ffff;

/**
 * Wire discriminants carried in the `type` field of every package.
 * These values are part of the wire contract and must never be renumbered.
 */
export const PackageType = {
  TIME_DELAY: 3,
  TIME_SYNC: 4,
  NODE_SYNC_REQUEST: 5,
  NODE_SYNC_REPLY: 6,
  /** Deprecated; no package variant decodes to it. */
  CONTROL: 7,
  /** Application data for every node. */
  BROADCAST: 8,
  /** Application data for a single node. */
  SINGLE: 9,
} as const;

export type PackageType = (typeof PackageType)[keyof typeof PackageType];

/**
 * How a package travels through the mesh.
 *
 * NEIGHBOUR packages are handled by the node that receives them and never
 * forwarded. SINGLE packages are relayed hop by hop towards `dest` and only
 * handled there. BROADCAST packages are handled by every node and relayed to
 * every neighbour except the one they arrived from.
 */
export const RoutingType = {
  ROUTING_ERROR: -1,
  NEIGHBOUR: 0,
  SINGLE: 1,
  BROADCAST: 2,
} as const;

export type RoutingType = (typeof RoutingType)[keyof typeof RoutingType];

export const TimePhase = {
  /** Internal marker only, never written to the wire. */
  TIME_SYNC_ERROR: -1,
  TIME_SYNC_REQUEST: 0,
  TIME_REQUEST: 1,
  TIME_REPLY: 2,
} as const;

export type TimePhase = (typeof TimePhase)[keyof typeof TimePhase];

export type WirePhase = Exclude<TimePhase, typeof TimePhase.TIME_SYNC_ERROR>;

// ─── Wire documents ─────────────────────────────────────────────────

export type WireScalar = string | number | boolean | null;
export type WireValue = WireScalar | WireValue[] | WireObject;
export type WireObject = { [key: string]: WireValue };

// ─── Package variants ───────────────────────────────────────────────

type Addressed = {
  from: NodeId;
  dest: NodeId;
};

export type SinglePackage = Addressed & {
  type: typeof PackageType.SINGLE;
  msg: string;
};

/** Same fields as a single package; only the discriminant differs. */
export type BroadcastPackage = Addressed & {
  type: typeof PackageType.BROADCAST;
  msg: string;
};

export type NodeTree = {
  nodeId: NodeId;
  root: boolean;
  /** Whether the mesh root is reachable through this subtree. Maintained by callers. */
  containsRoot: boolean;
  knownNodes: NodeId[];
};

export type NodeSyncRequestPackage = NodeTree &
  Addressed & {
    type: typeof PackageType.NODE_SYNC_REQUEST;
  };

export type NodeSyncReplyPackage = NodeTree &
  Addressed & {
    type: typeof PackageType.NODE_SYNC_REPLY;
  };

export type TimeSyncRequestMessage = {
  type: typeof TimePhase.TIME_SYNC_REQUEST;
};

export type TimeRequestMessage = {
  type: typeof TimePhase.TIME_REQUEST;
  t0: number;
};

export type TimeReplyMessage = {
  type: typeof TimePhase.TIME_REPLY;
  t0: number;
  t1: number;
  t2: number;
};

/** Timestamps present on the wire depend on the phase of the exchange. */
export type TimeSyncMessage = TimeSyncRequestMessage | TimeRequestMessage | TimeReplyMessage;

export type TimeSyncPackage<M extends TimeSyncMessage = TimeSyncMessage> = Addressed & {
  type: typeof PackageType.TIME_SYNC;
  msg: M;
};

/** One-shot delay measurement; same layout as a time sync package. */
export type TimeDelayPackage<M extends TimeSyncMessage = TimeSyncMessage> = Addressed & {
  type: typeof PackageType.TIME_DELAY;
  msg: M;
};

export type MeshPackage =
  | SinglePackage
  | BroadcastPackage
  | NodeSyncRequestPackage
  | NodeSyncReplyPackage
  | TimeSyncPackage
  | TimeDelayPackage;

/** Discriminants that have a package variant (everything but CONTROL). */
export type MeshPackageType = MeshPackage["type"];

export type PackageOfType<K extends MeshPackageType> = Extract<MeshPackage, { type: K }>;

export type TimedPackage = TimeSyncPackage | TimeDelayPackage;

// ─── Results ────────────────────────────────────────────────────────

export type DecodeErrorCode = "EMPTY_INPUT" | "INVALID_INPUT" | "NO_MEMORY" | "INVALID_PACKAGE";

export type DecodeFailure = {
  ok: false;
  code: DecodeErrorCode;
  message: string;
};

export type DecodeResult<T> = { ok: true; value: T } | DecodeFailure;

export type MeshLogger = {
  info: (msg: string) => void;
  warn: (msg: string) => void;
  error: (msg: string) => void;
};
