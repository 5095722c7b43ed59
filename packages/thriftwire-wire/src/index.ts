// Wire value model shared by thriftwire protocols.
//
// This package holds the protocol-agnostic value tree, its type tags, and
// the abstract sink/source/protocol contracts a concrete encoding implements.

// ============================================================================
// Types
// ============================================================================

export { WireType, isWireType, wireTypeName } from "./types.ts";

export type {
  WireBool,
  WireI8,
  WireDouble,
  WireI16,
  WireI32,
  WireI64,
  WireBinary,
  WireField,
  WireStruct,
  WireMapItem,
  WireMap,
  WireSet,
  WireList,
  WireValue,
} from "./types.ts";

// ============================================================================
// Factory Functions
// ============================================================================

export {
  wireBool,
  wireI8,
  wireI16,
  wireI32,
  wireI64,
  wireDouble,
  wireBinary,
  wireString,
  wireField,
  wireStruct,
  wireMapItem,
  wireMap,
  wireSet,
  wireList,
} from "./types.ts";

// ============================================================================
// Utilities
// ============================================================================

export { valuesEqual } from "./equal.ts";
export { formatValue, toHex } from "./format.ts";

// ============================================================================
// Protocol Contracts
// ============================================================================

export { ShortReadError, type ByteSink, type ByteSource, type Protocol } from "./protocol.ts";
