import type { ProtocolConfig } from "../config/types.protocol.js";
import { MeshEnvelope, type BuildEnvelopeOptions } from "./envelope.js";
import type { DecodeResult, MeshLogger, MeshPackage, NodeId, RoutingType } from "./types.js";

export type MeshCodecOptions = {
  config?: ProtocolConfig;
  log?: MeshLogger;
};

export const DEFAULT_LOGGER: MeshLogger = {
  info: (msg) => console.log(msg),
  warn: (msg) => console.warn(msg),
  error: (msg) => console.error(msg),
};

const PREVIEW_LENGTH = 80;

function preview(raw: string | Uint8Array): string {
  const text = typeof raw === "string" ? raw : new TextDecoder().decode(raw);
  return text.length <= PREVIEW_LENGTH ? text : `${text.slice(0, PREVIEW_LENGTH)}…`;
}

/**
 * What the transport sees of this layer: text in, envelopes out, and
 * packages back to text.
 */
export class MeshCodec {
  private readonly config: ProtocolConfig;
  private readonly log: MeshLogger;

  constructor(opts: MeshCodecOptions = {}) {
    this.config = opts.config ?? {};
    this.log = opts.log ?? DEFAULT_LOGGER;
  }

  decode(raw: string | Uint8Array): DecodeResult<MeshEnvelope> {
    const envelope = MeshEnvelope.parse(raw, { capacityBytes: this.config.capacityBytes });
    if (envelope.error) {
      this.log.warn(
        `mesh: dropped undecodable package (${envelope.error.code}): ${envelope.error.message} [${preview(raw)}]`,
      );
      return envelope.error;
    }
    return { ok: true, value: envelope };
  }

  wrap(pkg: MeshPackage, opts: BuildEnvelopeOptions = {}): MeshEnvelope {
    return MeshEnvelope.from(pkg, opts);
  }

  encode(pkg: MeshPackage, opts: BuildEnvelopeOptions = {}): string {
    return this.wrap(pkg, opts).serialize({ pretty: this.config.pretty });
  }

  encodeBytes(pkg: MeshPackage, opts: BuildEnvelopeOptions = {}): Uint8Array {
    return this.wrap(pkg, opts).toBytes({ pretty: this.config.pretty });
  }

  routing(envelope: MeshEnvelope): RoutingType {
    return envelope.routing();
  }

  type(envelope: MeshEnvelope): number {
    return envelope.type();
  }

  dest(envelope: MeshEnvelope): NodeId {
    return envelope.dest();
  }
}
