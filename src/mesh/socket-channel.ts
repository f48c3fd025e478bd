import { WebSocket } from "ws";
import { DEFAULT_LOGGER, type MeshCodec } from "./codec.js";
import type { BuildEnvelopeOptions, MeshEnvelope } from "./envelope.js";
import { RoutingType } from "./types.js";
import type { MeshLogger, MeshPackage, NodeId } from "./types.js";

export type MeshSocketChannelOptions = {
  /** An already-open connection to a neighbour. */
  socket: WebSocket;
  codec: MeshCodec;
  /** Node on the other end of the socket, when known. */
  peerId?: NodeId;
  /** Called with every decodable, routable package. */
  onPackage: (envelope: MeshEnvelope, peerId: NodeId | undefined) => void;
  /** Called once the socket closes. */
  onClosed?: (peerId: NodeId | undefined) => void;
  log?: MeshLogger;
};

function rawDataToBytes(data: WebSocket.RawData): Uint8Array {
  if (Array.isArray(data)) {
    return Buffer.concat(data);
  }
  if (data instanceof ArrayBuffer) {
    return new Uint8Array(data);
  }
  return data;
}

function formatPeer(peerId: NodeId | undefined): string {
  return peerId === undefined ? "unknown peer" : `#${peerId}`;
}

/**
 * Binds one neighbour's WebSocket to the codec. Opening, closing and
 * reconnecting the socket stay with the caller.
 */
export class MeshSocketChannel {
  private readonly opts: MeshSocketChannelOptions;
  private readonly log: MeshLogger;
  private attached = false;

  constructor(opts: MeshSocketChannelOptions) {
    this.opts = opts;
    this.log = opts.log ?? DEFAULT_LOGGER;
  }

  get peerId(): NodeId | undefined {
    return this.opts.peerId;
  }

  attach(): void {
    if (this.attached) {
      return;
    }
    this.attached = true;
    this.opts.socket.on("message", this.handleMessage);
    this.opts.socket.on("close", this.handleClose);
  }

  detach(): void {
    if (!this.attached) {
      return;
    }
    this.attached = false;
    this.opts.socket.off("message", this.handleMessage);
    this.opts.socket.off("close", this.handleClose);
  }

  /** Returns false when the socket is not open or the send failed. */
  send(pkg: MeshPackage, opts: BuildEnvelopeOptions = {}): boolean {
    if (this.opts.socket.readyState !== WebSocket.OPEN) {
      return false;
    }
    try {
      this.opts.socket.send(this.opts.codec.encode(pkg, opts));
      return true;
    } catch (err) {
      this.log.warn(`mesh: send to ${formatPeer(this.opts.peerId)} failed: ${String(err)}`);
      return false;
    }
  }

  private readonly handleMessage = (data: WebSocket.RawData): void => {
    const decoded = this.opts.codec.decode(rawDataToBytes(data));
    if (!decoded.ok) {
      return;
    }
    const envelope = decoded.value;
    if (envelope.routing() === RoutingType.ROUTING_ERROR) {
      this.log.warn(
        `mesh: dropped package of type ${envelope.type()} from ${formatPeer(this.opts.peerId)}: no routing`,
      );
      return;
    }
    this.opts.onPackage(envelope, this.opts.peerId);
  };

  private readonly handleClose = (): void => {
    this.detach();
    this.log.info(`mesh: channel to ${formatPeer(this.opts.peerId)} closed`);
    this.opts.onClosed?.(this.opts.peerId);
  };
}
