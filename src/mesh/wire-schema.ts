import { z } from "zod";
import { PackageType, RoutingType, TimePhase, UINT32_MAX } from "./types.js";
import type { DecodeFailure } from "./types.js";

/**
 * Zod schemas for the fields each package variant reads off the wire.
 * Unknown members are stripped, never rejected.
 */

export const NodeIdSchema = z.number().int().min(0).max(UINT32_MAX);

/** Local clock readings wrap at 32 bits on the nodes. */
export const TimestampSchema = z.number().int().min(0).max(UINT32_MAX);

export const AddressSchema = z.object({
  from: NodeIdSchema,
  dest: NodeIdSchema,
});

export const TextPackageSchema = AddressSchema.extend({
  msg: z.string(),
});

export const NodeTreeSchema = z.object({
  nodeId: NodeIdSchema.optional(),
  from: NodeIdSchema.optional(),
  root: z.boolean().optional(),
  containsRoot: z.boolean().optional(),
  knownNodes: z.array(NodeIdSchema).optional(),
});

export const NodeSyncSchema = NodeTreeSchema.extend({
  from: NodeIdSchema,
  dest: NodeIdSchema,
});

export const TimeSyncMessageSchema = z.object({
  type: z.union([
    z.literal(TimePhase.TIME_SYNC_REQUEST),
    z.literal(TimePhase.TIME_REQUEST),
    z.literal(TimePhase.TIME_REPLY),
  ]),
  t0: TimestampSchema.optional(),
  t1: TimestampSchema.optional(),
  t2: TimestampSchema.optional(),
});

export const TimeSyncSchema = AddressSchema.extend({
  msg: TimeSyncMessageSchema,
});

export const PackageTypeSchema = z.union([
  z.literal(PackageType.TIME_DELAY),
  z.literal(PackageType.TIME_SYNC),
  z.literal(PackageType.NODE_SYNC_REQUEST),
  z.literal(PackageType.NODE_SYNC_REPLY),
  z.literal(PackageType.BROADCAST),
  z.literal(PackageType.SINGLE),
]);

export const RoutingTypeSchema = z.union([
  z.literal(RoutingType.ROUTING_ERROR),
  z.literal(RoutingType.NEIGHBOUR),
  z.literal(RoutingType.SINGLE),
  z.literal(RoutingType.BROADCAST),
]);

export function formatZodIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join(", ");
}

export function invalidPackage(label: string, error: z.ZodError): DecodeFailure {
  return {
    ok: false,
    code: "INVALID_PACKAGE",
    message: `invalid ${label} package: ${formatZodIssues(error)}`,
  };
}

export function assertUint32(value: number, label: string): number {
  if (!Number.isInteger(value) || value < 0 || value > UINT32_MAX) {
    throw new RangeError(`${label} must be an unsigned 32-bit integer (got ${value})`);
  }
  return value;
}
