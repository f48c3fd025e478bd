import type { WireValue } from "./types.js";

/**
 * Capacity accounting for wire documents.
 *
 * Nodes build documents in a fixed-size pool where every object member and
 * array element occupies one slot and copied strings take their UTF-8 length
 * plus a terminator. Estimates let a caller size that pool before encoding.
 */
export type WireSize = {
  /** Object members and array elements. */
  slots: number;
  /** Extra bytes for copied strings. */
  bytes: number;
};

/** Bytes per slot on a 32-bit node. */
export const WIRE_SLOT_SIZE = 16;

export function objectSize(members: number): number {
  return members;
}

export function arraySize(elements: number): number {
  return elements;
}

export function addWireSizes(...sizes: WireSize[]): WireSize {
  let slots = 0;
  let bytes = 0;
  for (const size of sizes) {
    slots += size.slots;
    bytes += size.bytes;
  }
  return { slots, bytes };
}

export function toCapacity(size: WireSize): number {
  return size.slots * WIRE_SLOT_SIZE + size.bytes;
}

export function utf8Length(text: string): number {
  return Buffer.byteLength(text, "utf8");
}

/**
 * Capacity reserved for parsing a raw document when the caller gives none:
 * room for a package with a nested time sync object plus twice the input.
 */
export function defaultInboundCapacity(rawLength: number): number {
  return toCapacity({ slots: objectSize(5) + objectSize(4), bytes: 2 * rawLength });
}

/**
 * Actual size a parsed document occupies: one slot per member or element,
 * and every key and string value copied with a terminator.
 */
export function measureWireValue(value: WireValue): WireSize {
  if (typeof value === "string") {
    return { slots: 0, bytes: utf8Length(value) + 1 };
  }
  if (Array.isArray(value)) {
    return addWireSizes(
      { slots: arraySize(value.length), bytes: 0 },
      ...value.map((item) => measureWireValue(item)),
    );
  }
  if (value !== null && typeof value === "object") {
    const entries = Object.entries(value);
    return addWireSizes(
      { slots: objectSize(entries.length), bytes: 0 },
      ...entries.map(([key, item]) =>
        addWireSizes({ slots: 0, bytes: utf8Length(key) + 1 }, measureWireValue(item)),
      ),
    );
  }
  return { slots: 0, bytes: 0 };
}
