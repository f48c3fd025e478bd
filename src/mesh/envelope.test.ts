import { describe, expect, it } from "vitest";
import { MeshEnvelope } from "./envelope.js";
import { createBroadcastPackage, createSinglePackage, createTimeSyncPackage } from "./packages.js";
import { PackageType, RoutingType } from "./types.js";

const SINGLE_TEXT = '{"type":9,"dest":123,"from":456,"msg":"hello"}';

describe("MeshEnvelope.parse()", () => {
  it("reads type, routing and destination without decoding the package", () => {
    const envelope = MeshEnvelope.parse(SINGLE_TEXT);
    expect(envelope.ok).toBe(true);
    expect(envelope.type()).toBe(9);
    expect(envelope.routing()).toBe(RoutingType.SINGLE);
    expect(envelope.dest()).toBe(123);
    expect(envelope.is(PackageType.SINGLE)).toBe(true);
    expect(envelope.is(PackageType.BROADCAST)).toBe(false);
  });

  it("accepts raw bytes", () => {
    const envelope = MeshEnvelope.parse(new TextEncoder().encode(SINGLE_TEXT));
    expect(envelope.toPackage()).toEqual({
      ok: true,
      value: { type: 9, from: 456, dest: 123, msg: "hello" },
    });
  });

  it("reserves room for twice the input when no capacity is configured", () => {
    expect(MeshEnvelope.parse(SINGLE_TEXT).capacityHint).toBe(236);
  });

  it("reserves by UTF-8 byte length rather than string length", () => {
    const text = '{"type":9,"dest":1,"from":2,"msg":"ü"}';
    expect(MeshEnvelope.parse(text).capacityHint).toBe(222);
    expect(MeshEnvelope.parse(new TextEncoder().encode(text)).capacityHint).toBe(222);
  });

  it("keeps the configured capacity as its hint", () => {
    expect(MeshEnvelope.parse(SINGLE_TEXT, { capacityBytes: 512 }).capacityHint).toBe(512);
  });

  it("fails with NO_MEMORY when the document outgrows the capacity", () => {
    const envelope = MeshEnvelope.parse(SINGLE_TEXT, { capacityBytes: 88 });
    expect(envelope.ok).toBe(false);
    expect(envelope.error).toEqual({
      ok: false,
      code: "NO_MEMORY",
      message: "package needs 89 bytes, capacity is 88",
    });
    expect(MeshEnvelope.parse(SINGLE_TEXT, { capacityBytes: 89 }).ok).toBe(true);
  });

  it("reports blank input as EMPTY_INPUT", () => {
    expect(MeshEnvelope.parse("").error?.code).toBe("EMPTY_INPUT");
    expect(MeshEnvelope.parse("  \n").error?.code).toBe("EMPTY_INPUT");
  });

  it("reports malformed JSON as INVALID_INPUT", () => {
    const envelope = MeshEnvelope.parse('{"type":9,');
    expect(envelope.error?.code).toBe("INVALID_INPUT");
    expect(envelope.error?.message).toMatch(/^package is not valid JSON: /);
  });

  it("reports bytes that are not valid UTF-8 as INVALID_INPUT", () => {
    const head = new TextEncoder().encode('{"type":9,"dest":1,"from":2,"msg":"');
    const tail = new TextEncoder().encode('"}');
    const raw = new Uint8Array([...head, 0xff, 0xfe, ...tail]);
    const envelope = MeshEnvelope.parse(raw);
    expect(envelope.ok).toBe(false);
    expect(envelope.error?.code).toBe("INVALID_INPUT");
    expect(envelope.error?.message).toMatch(/^package is not valid UTF-8: /);
    expect(envelope.toPackage()).toBe(envelope.error);
  });

  it("requires a JSON object at the top level", () => {
    expect(MeshEnvelope.parse("[1,2]").error).toEqual({
      ok: false,
      code: "INVALID_INPUT",
      message: "package must be a JSON object",
    });
    expect(MeshEnvelope.parse("42").error?.code).toBe("INVALID_INPUT");
  });

  it("answers with neutral values once parsing failed", () => {
    const envelope = MeshEnvelope.parse("not json");
    expect(envelope.type()).toBe(0);
    expect(envelope.dest()).toBe(0);
    expect(envelope.routing()).toBe(RoutingType.ROUTING_ERROR);
    expect(envelope.capacityHint).toBe(0);
    expect(envelope.is(PackageType.SINGLE)).toBe(false);
    expect(envelope.to(PackageType.SINGLE)).toBe(envelope.error);
    expect(envelope.toPackage()).toBe(envelope.error);
  });

  it("reads a non-numeric type or destination as zero", () => {
    const envelope = MeshEnvelope.parse('{"type":"single","dest":-4}');
    expect(envelope.ok).toBe(true);
    expect(envelope.type()).toBe(0);
    expect(envelope.dest()).toBe(0);
  });
});

describe("MeshEnvelope.from()", () => {
  it("serializes the package in wire order", () => {
    const envelope = MeshEnvelope.from(createSinglePackage({ from: 456, dest: 123, msg: "hello" }));
    expect(envelope.serialize()).toBe(SINGLE_TEXT);
    expect(new TextDecoder().decode(envelope.toBytes())).toBe(SINGLE_TEXT);
  });

  it("sizes itself from the package estimate", () => {
    const envelope = MeshEnvelope.from(createSinglePackage({ from: 456, dest: 123, msg: "hello" }));
    expect(envelope.capacityHint).toBe(70);
    expect(envelope.size()).toEqual({ slots: 4, bytes: 25 });
  });

  it("writes a routing override after the package fields", () => {
    const envelope = MeshEnvelope.from(createSinglePackage({ from: 1, dest: 2, msg: "x" }), {
      routing: RoutingType.BROADCAST,
    });
    expect(envelope.serialize()).toBe('{"type":9,"dest":2,"from":1,"msg":"x","routing":2}');
    expect(envelope.routing()).toBe(RoutingType.BROADCAST);
  });

  it("indents on request", () => {
    const envelope = MeshEnvelope.from(createSinglePackage({ from: 1, dest: 2, msg: "x" }));
    expect(envelope.serialize({ pretty: true })).toBe(
      '{\n  "type": 9,\n  "dest": 2,\n  "from": 1,\n  "msg": "x"\n}',
    );
  });

  it("hands out copies of its document", () => {
    const envelope = MeshEnvelope.from(createTimeSyncPackage({ from: 1, dest: 2, t0: 5 }));
    const copy = envelope.toWireObject();
    copy.dest = 99;
    expect(envelope.dest()).toBe(2);
  });
});

describe("MeshEnvelope.to()", () => {
  it("decodes under the requested kind", () => {
    const envelope = MeshEnvelope.from(createBroadcastPackage({ from: 1, dest: 0, msg: "all" }));
    expect(envelope.to(PackageType.BROADCAST)).toEqual({
      ok: true,
      value: { type: 8, from: 1, dest: 0, msg: "all" },
    });
  });

  it("reports missing fields of the requested kind", () => {
    const envelope = MeshEnvelope.parse('{"type":9,"dest":1}');
    expect(envelope.ok).toBe(true);
    expect(envelope.to(PackageType.SINGLE)).toEqual({
      ok: false,
      code: "INVALID_PACKAGE",
      message: "invalid single package: from: Required, msg: Required",
    });
  });
});

describe("MeshEnvelope.toPackage()", () => {
  it("carries a parsed document through to the package it encodes", () => {
    const envelope = MeshEnvelope.parse('{"type":4,"dest":456,"from":123,"msg":{"type":1,"t0":1000}}');
    expect(envelope.routing()).toBe(RoutingType.NEIGHBOUR);
    expect(envelope.toPackage()).toEqual({
      ok: true,
      value: { type: 4, from: 123, dest: 456, msg: { type: 1, t0: 1000 } },
    });
  });

  it("refuses a parsed document of the deprecated control type", () => {
    expect(MeshEnvelope.parse('{"type":7,"dest":1,"from":2}').toPackage()).toEqual({
      ok: false,
      code: "INVALID_PACKAGE",
      message: "unknown package type 7",
    });
  });
});
