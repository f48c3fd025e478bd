/**
 * @module meshwire
 * @description Wire protocol layer of a self-organizing node mesh: package
 * variants and their JSON encoding, the routing classifier, node tree
 * aggregation and the time sync exchange.
 */

export * from "./mesh/types.js";
export * from "./mesh/wire-size.js";
export {
  buildTimeSyncMessage,
  createBroadcastPackage,
  createSinglePackage,
  createTimeDelayPackage,
  createTimeSyncPackage,
  decodePackage,
  decodePackageAs,
  encodePackage,
  encodeTimeSyncMessage,
  estimateWireSize,
  packageTypeName,
  packagesEqual,
  timeSyncMessagesEqual,
} from "./mesh/packages.js";
export {
  buildSyncReply,
  buildSyncRequest,
  createNodeTree,
  decodeNodeTree,
  encodeNodeTree,
  listTreeNodes,
  nodeTreeFromSync,
  nodeTreesEqual,
  nodeTreeToString,
  treeContainsNode,
} from "./mesh/node-tree.js";
export { isInPhase, replyWithT0, replyWithT1T2, timePhaseOf } from "./mesh/time-sync.js";
export type { TimedPackageOf, TimeMessageOfPhase } from "./mesh/time-sync.js";
export { planDelivery, resolvePackageRouting, routingForType, routingName } from "./mesh/routing.js";
export type { DeliveryPlan } from "./mesh/routing.js";
export { MeshEnvelope } from "./mesh/envelope.js";
export type { BuildEnvelopeOptions, ParseEnvelopeOptions } from "./mesh/envelope.js";
export { DEFAULT_LOGGER, MeshCodec } from "./mesh/codec.js";
export type { MeshCodecOptions } from "./mesh/codec.js";
export { MeshSocketChannel } from "./mesh/socket-channel.js";
export type { MeshSocketChannelOptions } from "./mesh/socket-channel.js";
export { loadProtocolConfig, resolveProtocolConfig } from "./config/protocol-config.js";
export type { ProtocolConfig } from "./config/types.protocol.js";
