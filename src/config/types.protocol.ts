export type ProtocolConfig = {
  /** Upper bound in bytes for an inbound document's in-memory size. Default: unbounded. */
  capacityBytes?: number;
  /** Serialize outbound packages with two-space indentation. Default: false. */
  pretty?: boolean;
};
