// Thrift Binary Protocol for wire values.
//
// Fixed-width, big-endian, tag-prefixed encoding of the value tree defined
// in @thriftwire/wire.

// ============================================================================
// Protocol
// ============================================================================

export {
  BinaryProtocol,
  binaryProtocol,
  encode,
  decode,
  encodeToBytes,
  decodeFromBytes,
  decodeAt,
  DEFAULT_MAX_DEPTH,
  type DecodeOptions,
} from "./protocol.ts";

// ============================================================================
// Errors
// ============================================================================

export { DecodeError, DecodeErrorCode } from "./errors.ts";
export { ShortReadError } from "@thriftwire/wire";

// ============================================================================
// Byte I/O
// ============================================================================

export { BufferWriter, BufferReader } from "./io.ts";

// ============================================================================
// Primitives
// ============================================================================

export {
  encodeBool,
  decodeBool,
  encodeI8,
  decodeI8,
  encodeI16,
  decodeI16,
  encodeI32,
  decodeI32,
  encodeI64,
  decodeI64,
  encodeU32,
  decodeU32,
  encodeDouble,
  decodeDouble,
  encodeBinary,
  CANONICAL_NAN,
  type DecodeResult,
} from "./primitives.ts";

export { STOP } from "./containers.ts";

// ============================================================================
// Logging
// ============================================================================

export { loggingProtocol, type LoggingOptions } from "./logging.ts";
