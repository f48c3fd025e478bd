import { decodePackage, decodePackageAs, encodePackage, estimateWireSize } from "./packages.js";
import { resolvePackageRouting } from "./routing.js";
import type {
  DecodeFailure,
  DecodeResult,
  MeshPackage,
  MeshPackageType,
  NodeId,
  PackageOfType,
  RoutingType,
  WireObject,
  WireValue,
} from "./types.js";
import { NodeIdSchema } from "./wire-schema.js";
import {
  defaultInboundCapacity,
  measureWireValue,
  toCapacity,
  utf8Length,
  type WireSize,
} from "./wire-size.js";

export type ParseEnvelopeOptions = {
  /** Hard bound on the parsed document's size in bytes; larger documents fail with NO_MEMORY. */
  capacityBytes?: number;
};

export type BuildEnvelopeOptions = {
  /** Force a routing discipline instead of the one implied by the package type. */
  routing?: RoutingType;
};

function isWireObject(value: WireValue): value is WireObject {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

const UTF8 = new TextDecoder("utf-8", { fatal: true });

function decodeText(
  raw: string | Uint8Array,
): { ok: true; text: string; byteLength: number } | DecodeFailure {
  if (typeof raw === "string") {
    return { ok: true, text: raw, byteLength: utf8Length(raw) };
  }
  try {
    return { ok: true, text: UTF8.decode(raw), byteLength: raw.length };
  } catch (err) {
    return {
      ok: false,
      code: "INVALID_INPUT",
      message: `package is not valid UTF-8: ${err instanceof Error ? err.message : String(err)}`,
    };
  }
}

function parseWireObject(
  raw: string | Uint8Array,
  capacityBytes: number | undefined,
): { ok: true; doc: WireObject; capacity: number } | DecodeFailure {
  const decoded = decodeText(raw);
  if (!decoded.ok) {
    return decoded;
  }
  const { text, byteLength } = decoded;
  if (text.trim().length === 0) {
    return { ok: false, code: "EMPTY_INPUT", message: "empty package" };
  }

  let parsed: WireValue;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    return {
      ok: false,
      code: "INVALID_INPUT",
      message: `package is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
    };
  }
  if (!isWireObject(parsed)) {
    return { ok: false, code: "INVALID_INPUT", message: "package must be a JSON object" };
  }

  const capacity = capacityBytes ?? defaultInboundCapacity(byteLength);
  if (capacityBytes !== undefined) {
    const needed = toCapacity(measureWireValue(parsed));
    if (needed > capacityBytes) {
      return {
        ok: false,
        code: "NO_MEMORY",
        message: `package needs ${needed} bytes, capacity is ${capacityBytes}`,
      };
    }
  }
  return { ok: true, doc: parsed, capacity };
}

/**
 * Holds exactly one wire document: the boundary object between this layer and
 * the transport. Built either by parsing inbound text or by encoding a package
 * and never modified afterwards.
 */
export class MeshEnvelope {
  /** Set when parsing failed; the document is then empty. */
  readonly error?: DecodeFailure;
  /** Bytes reserved for the document: the package estimate, or the parse capacity. */
  readonly capacityHint: number;

  private readonly doc: WireObject;

  private constructor(doc: WireObject, capacityHint: number, error?: DecodeFailure) {
    this.doc = doc;
    this.capacityHint = capacityHint;
    this.error = error;
  }

  /** Parse inbound text or bytes. Never throws; failures are kept on {@link error}. */
  static parse(raw: string | Uint8Array, opts: ParseEnvelopeOptions = {}): MeshEnvelope {
    const result = parseWireObject(raw, opts.capacityBytes);
    if (!result.ok) {
      return new MeshEnvelope({}, 0, result);
    }
    return new MeshEnvelope(result.doc, result.capacity);
  }

  static from(pkg: MeshPackage, opts: BuildEnvelopeOptions = {}): MeshEnvelope {
    const doc = encodePackage(pkg);
    if (opts.routing !== undefined) {
      doc.routing = opts.routing;
    }
    return new MeshEnvelope(doc, toCapacity(estimateWireSize(pkg)));
  }

  get ok(): boolean {
    return this.error === undefined;
  }

  /** Raw discriminant, or 0 when absent. */
  type(): number {
    const type = this.doc.type;
    return typeof type === "number" && Number.isInteger(type) ? type : 0;
  }

  routing(): RoutingType {
    return resolvePackageRouting(this.doc);
  }

  /** Destination node, or 0 when absent. */
  dest(): NodeId {
    const dest = NodeIdSchema.safeParse(this.doc.dest);
    return dest.success ? dest.data : 0;
  }

  is(kind: MeshPackageType): boolean {
    return this.ok && this.type() === kind;
  }

  /**
   * Decode under the field rules of `kind` without consulting the
   * discriminant. Guard with {@link is}: a document of another kind may
   * decode into a wrong package.
   */
  to<K extends MeshPackageType>(kind: K): DecodeResult<PackageOfType<K>> {
    if (this.error) {
      return this.error;
    }
    return decodePackageAs(kind, this.doc);
  }

  /** Decode as the kind the document declares. */
  toPackage(): DecodeResult<MeshPackage> {
    if (this.error) {
      return this.error;
    }
    return decodePackage(this.doc);
  }

  /** Copy of the document; the envelope keeps sole ownership of its own. */
  toWireObject(): WireObject {
    return structuredClone(this.doc);
  }

  size(): WireSize {
    return measureWireValue(this.doc);
  }

  serialize(opts: { pretty?: boolean } = {}): string {
    return JSON.stringify(this.doc, null, opts.pretty ? 2 : undefined);
  }

  toBytes(opts: { pretty?: boolean } = {}): Uint8Array {
    return new TextEncoder().encode(this.serialize(opts));
  }
}
