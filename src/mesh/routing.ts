import type { MeshEnvelope } from "./envelope.js";
import { PackageType, RoutingType } from "./types.js";
import type { NodeId, WireObject } from "./types.js";
import { RoutingTypeSchema } from "./wire-schema.js";

/** Routing discipline implied by a package type. Unknown types cannot be routed. */
export function routingForType(type: number): RoutingType {
  switch (type) {
    case PackageType.SINGLE:
    case PackageType.TIME_DELAY:
      return RoutingType.SINGLE;
    case PackageType.BROADCAST:
      return RoutingType.BROADCAST;
    case PackageType.NODE_SYNC_REQUEST:
    case PackageType.NODE_SYNC_REPLY:
    case PackageType.TIME_SYNC:
      return RoutingType.NEIGHBOUR;
    default:
      return RoutingType.ROUTING_ERROR;
  }
}

/**
 * An explicit `routing` member overrides the type-based discipline. Values
 * outside the known disciplines classify as ROUTING_ERROR.
 */
export function resolvePackageRouting(doc: WireObject): RoutingType {
  if (doc.routing !== undefined) {
    const explicit = RoutingTypeSchema.safeParse(doc.routing);
    return explicit.success ? explicit.data : RoutingType.ROUTING_ERROR;
  }
  return typeof doc.type === "number" ? routingForType(doc.type) : RoutingType.ROUTING_ERROR;
}

export function routingName(routing: RoutingType): string {
  switch (routing) {
    case RoutingType.NEIGHBOUR:
      return "neighbour";
    case RoutingType.SINGLE:
      return "single";
    case RoutingType.BROADCAST:
      return "broadcast";
    case RoutingType.ROUTING_ERROR:
      return "routing-error";
  }
}

export type DeliveryPlan =
  | { kind: "handle" }
  | { kind: "forward"; nextHop: NodeId }
  | { kind: "flood"; relayTo: NodeId[] }
  | { kind: "drop"; reason: "decode-error" | "routing-error" | "no-route" };

/**
 * Decide what a node does with an inbound package. Routing tables stay with
 * the caller and are consulted through `resolveNextHop`.
 *
 * A flood is handled locally as well as relayed.
 */
export function planDelivery(params: {
  envelope: MeshEnvelope;
  selfId: NodeId;
  /** Neighbour the package arrived from; excluded from a flood. */
  receivedFrom?: NodeId;
  neighbours: readonly NodeId[];
  resolveNextHop: (dest: NodeId) => NodeId | undefined;
}): DeliveryPlan {
  const { envelope } = params;
  if (envelope.error) {
    return { kind: "drop", reason: "decode-error" };
  }

  switch (envelope.routing()) {
    case RoutingType.NEIGHBOUR:
      return { kind: "handle" };
    case RoutingType.SINGLE: {
      const dest = envelope.dest();
      if (dest === params.selfId) {
        return { kind: "handle" };
      }
      const nextHop = dest === 0 ? undefined : params.resolveNextHop(dest);
      return nextHop === undefined ? { kind: "drop", reason: "no-route" } : { kind: "forward", nextHop };
    }
    case RoutingType.BROADCAST:
      return {
        kind: "flood",
        relayTo: params.neighbours.filter((id) => id !== params.receivedFrom),
      };
    case RoutingType.ROUTING_ERROR:
      return { kind: "drop", reason: "routing-error" };
  }
}
