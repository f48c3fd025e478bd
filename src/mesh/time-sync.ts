import { TimePhase } from "./types.js";
import type {
  NodeId,
  TimedPackage,
  TimeReplyMessage,
  TimeRequestMessage,
  TimeSyncMessage,
  TimeSyncRequestMessage,
  WirePhase,
} from "./types.js";
import { assertUint32 } from "./wire-schema.js";

/**
 * Two round trips carry the clock readings of a time sync exchange; all state
 * travels in the package itself.
 *
 *   phase 0  A → B  no readings
 *   phase 1  B → A  t0: B's clock when sending
 *   phase 2  A → B  t1/t2: A's clock on receipt and when replying
 *
 * Turning the readings into an offset is left to the caller.
 */

type TimedKind = TimedPackage["type"];

/** A time sync or time delay package whose message is in a known phase. */
export type TimedPackageOf<K extends TimedKind, M extends TimeSyncMessage> = {
  type: K;
  from: NodeId;
  dest: NodeId;
  msg: M;
};

export type TimeMessageOfPhase<P extends WirePhase> = Extract<TimeSyncMessage, { type: P }>;

export function timePhaseOf(pkg: TimedPackage): WirePhase {
  return pkg.msg.type;
}

export function isInPhase<P extends TimedPackage, Phase extends WirePhase>(
  pkg: P,
  phase: Phase,
): pkg is P & { msg: TimeMessageOfPhase<Phase> } {
  return pkg.msg.type === phase;
}

/** Answer a phase 0 package: record `t0`, advance to phase 1 and send it back. */
export function replyWithT0<K extends TimedKind>(
  pkg: TimedPackageOf<K, TimeSyncRequestMessage>,
  t0: number,
): TimedPackageOf<K, TimeRequestMessage> {
  return {
    type: pkg.type,
    from: pkg.dest,
    dest: pkg.from,
    msg: { type: TimePhase.TIME_REQUEST, t0: assertUint32(t0, "t0") },
  };
}

/** Answer a phase 1 package: record `t1`/`t2`, advance to phase 2 and send it back. */
export function replyWithT1T2<K extends TimedKind>(
  pkg: TimedPackageOf<K, TimeRequestMessage>,
  t1: number,
  t2: number,
): TimedPackageOf<K, TimeReplyMessage> {
  return {
    type: pkg.type,
    from: pkg.dest,
    dest: pkg.from,
    msg: {
      type: TimePhase.TIME_REPLY,
      t0: pkg.msg.t0,
      t1: assertUint32(t1, "t1"),
      t2: assertUint32(t2, "t2"),
    },
  };
}
