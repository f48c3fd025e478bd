import { Command, InvalidArgumentError } from "commander";
import { loadProtocolConfig } from "../config/protocol-config.js";
import { DEFAULT_LOGGER, MeshCodec } from "../mesh/codec.js";
import type { MeshEnvelope } from "../mesh/envelope.js";
import { buildSyncReply, buildSyncRequest, decodeNodeTree } from "../mesh/node-tree.js";
import {
  createBroadcastPackage,
  createSinglePackage,
  createTimeDelayPackage,
  createTimeSyncPackage,
  packageTypeName,
} from "../mesh/packages.js";
import { routingName } from "../mesh/routing.js";
import { UINT32_MAX } from "../mesh/types.js";
import type { NodeTree } from "../mesh/types.js";

function collectOption(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

function parseUint32(value: string): number {
  const parsed = Number(value.trim());
  if (value.trim() === "" || !Number.isInteger(parsed) || parsed < 0 || parsed > UINT32_MAX) {
    throw new InvalidArgumentError(`expected an unsigned 32-bit integer, got "${value}"`);
  }
  return parsed;
}

export function parseSubtreeSpec(spec: string): NodeTree {
  let raw: unknown;
  try {
    raw = JSON.parse(spec);
  } catch {
    throw new Error(`invalid subtree "${spec}" (use a JSON node tree, e.g. '{"nodeId":3,"knownNodes":[4,5]}')`);
  }
  const decoded = decodeNodeTree(raw);
  if (!decoded.ok) {
    throw new Error(`invalid subtree "${spec}": ${decoded.message}`);
  }
  return decoded.value;
}

/** Human-readable summary of a decoded envelope, one line per field. */
export function describeEnvelope(envelope: MeshEnvelope): string[] {
  const type = envelope.type();
  const lines = [
    `Type:     ${type} (${packageTypeName(type)})`,
    `Routing:  ${routingName(envelope.routing())}`,
    `Dest:     ${envelope.dest()}`,
  ];
  const pkg = envelope.toPackage();
  lines.push(pkg.ok ? `Package:  ${JSON.stringify(pkg.value)}` : `Package:  invalid (${pkg.message})`);
  return lines;
}

export function createMeshwireCli(): Command {
  const program = new Command();
  program
    .name("meshwire")
    .description("Inspect and build mesh wire packages")
    .version("0.1.0")
    .option("--config <path>", "Protocol config file (JSON)");

  const codecFor = (): MeshCodec => {
    const { config } = program.opts<{ config?: string }>();
    return new MeshCodec({
      config: config ? loadProtocolConfig(config) : undefined,
      log: DEFAULT_LOGGER,
    });
  };

  // ── inspect ──────────────────────────────────────────────
  program
    .command("inspect <json>")
    .description("Decode one wire package and show its type, routing and destination")
    .action((json: string) => {
      const decoded = codecFor().decode(json);
      if (!decoded.ok) {
        console.log(`Error:    ${decoded.code}: ${decoded.message}`);
        process.exitCode = 1;
        return;
      }
      for (const line of describeEnvelope(decoded.value)) {
        console.log(line);
      }
    });

  // ── encode ───────────────────────────────────────────────
  const encode = program.command("encode").description("Build a wire package and print it");

  for (const kind of ["single", "broadcast"] as const) {
    encode
      .command(kind)
      .description(kind === "single" ? "Application data for one node" : "Application data for every node")
      .requiredOption("--from <nodeId>", "Sending node", parseUint32)
      .requiredOption("--dest <nodeId>", "Destination node", parseUint32)
      .option("--msg <text>", "Payload", "")
      .action((opts: { from: number; dest: number; msg: string }) => {
        const pkg = kind === "single" ? createSinglePackage(opts) : createBroadcastPackage(opts);
        console.log(codecFor().encode(pkg));
      });
  }

  encode
    .command("node-sync")
    .description("Advertise this node's subtrees to a neighbour")
    .requiredOption("--from <nodeId>", "This node", parseUint32)
    .requiredOption("--dest <nodeId>", "Neighbour", parseUint32)
    .option("--root", "This node is the mesh root")
    .option(
      "--subtree <json>",
      'Subtree learned from a neighbour, e.g. \'{"nodeId":3,"knownNodes":[4,5]}\' (repeatable)',
      collectOption,
      [],
    )
    .option("--reply", "Build the reply half of the exchange")
    .action((opts: { from: number; dest: number; root?: boolean; subtree: string[]; reply?: boolean }) => {
      const subtrees = opts.subtree.map(parseSubtreeSpec);
      const build = opts.reply ? buildSyncReply : buildSyncRequest;
      console.log(codecFor().encode(build(opts.from, opts.dest, subtrees, !!opts.root)));
    });

  encode
    .command("time-sync")
    .description("Build a time sync package; the phase follows from the readings given")
    .requiredOption("--from <nodeId>", "Sending node", parseUint32)
    .requiredOption("--dest <nodeId>", "Neighbour", parseUint32)
    .option("--t0 <micros>", "Responder clock when sending", parseUint32)
    .option("--t1 <micros>", "Initiator clock on receipt", parseUint32)
    .option("--t2 <micros>", "Initiator clock when replying", parseUint32)
    .option("--delay", "Build a time delay package instead")
    .action(
      (opts: { from: number; dest: number; t0?: number; t1?: number; t2?: number; delay?: boolean }) => {
        const pkg = opts.delay ? createTimeDelayPackage(opts) : createTimeSyncPackage(opts);
        console.log(codecFor().encode(pkg));
      },
    );

  return program;
}
