// Scalar encodings for the Binary Protocol.
//
// Everything is fixed width and big-endian:
// - bool: 1 byte, 0x00 or 0x01 (decode accepts any nonzero byte as true)
// - i8/i16/i32/i64: two's complement, 1/2/4/8 bytes
// - double: IEEE-754 bit pattern, 8 bytes, NaN canonicalized
// - binary: u32 length + raw bytes (decoded by the container reader)

import { ShortReadError } from "@thriftwire/wire";

// ============================================================================
// Decode result type
// ============================================================================

export interface DecodeResult<T> {
  value: T;
  next: number; // offset after this value
}

/** Bytes emitted for every NaN, whatever its sign or payload. */
export const CANONICAL_NAN: readonly number[] = [0x7f, 0xf8, 0x00, 0x00, 0x00, 0x00, 0x00, 0x01];

function fixed(width: number, fill: (view: DataView) => void): Uint8Array {
  const out = new Uint8Array(width);
  fill(new DataView(out.buffer));
  return out;
}

function viewAt(buf: Uint8Array, offset: number, width: number): DataView {
  if (!Number.isInteger(offset) || offset < 0) {
    throw new RangeError(`offset ${offset} is not a non-negative integer`);
  }
  const available = Math.max(0, buf.length - offset);
  if (width > available) throw new ShortReadError(width, available);
  return new DataView(buf.buffer, buf.byteOffset + offset, width);
}

// ============================================================================
// Bool and integers
// ============================================================================

/** Encode a boolean (1 byte: 0x00 or 0x01). */
export function encodeBool(value: boolean): Uint8Array {
  return Uint8Array.of(value ? 1 : 0);
}

/** Decode a boolean. Any nonzero byte is true. */
export function decodeBool(buf: Uint8Array, offset: number): DecodeResult<boolean> {
  return { value: viewAt(buf, offset, 1).getUint8(0) !== 0, next: offset + 1 };
}

/** Encode an i8 (1 byte, two's complement). */
export function encodeI8(value: number): Uint8Array {
  return fixed(1, (v) => v.setInt8(0, value));
}

export function decodeI8(buf: Uint8Array, offset: number): DecodeResult<number> {
  return { value: viewAt(buf, offset, 1).getInt8(0), next: offset + 1 };
}

/** Encode an i16 (2 bytes, big-endian). Also used for field ids. */
export function encodeI16(value: number): Uint8Array {
  return fixed(2, (v) => v.setInt16(0, value));
}

export function decodeI16(buf: Uint8Array, offset: number): DecodeResult<number> {
  return { value: viewAt(buf, offset, 2).getInt16(0), next: offset + 2 };
}

/** Encode an i32 (4 bytes, big-endian). */
export function encodeI32(value: number): Uint8Array {
  return fixed(4, (v) => v.setInt32(0, value));
}

export function decodeI32(buf: Uint8Array, offset: number): DecodeResult<number> {
  return { value: viewAt(buf, offset, 4).getInt32(0), next: offset + 4 };
}

/** Encode an i64 (8 bytes, big-endian). */
export function encodeI64(value: bigint): Uint8Array {
  return fixed(8, (v) => v.setBigInt64(0, value));
}

export function decodeI64(buf: Uint8Array, offset: number): DecodeResult<bigint> {
  return { value: viewAt(buf, offset, 8).getBigInt64(0), next: offset + 8 };
}

/** Encode a u32 length or count (4 bytes, big-endian). */
export function encodeU32(value: number): Uint8Array {
  return fixed(4, (v) => v.setUint32(0, value));
}

export function decodeU32(buf: Uint8Array, offset: number): DecodeResult<number> {
  return { value: viewAt(buf, offset, 4).getUint32(0), next: offset + 4 };
}

// ============================================================================
// Double
// ============================================================================

/**
 * Encode a double as its IEEE-754 big-endian bit pattern.
 *
 * Hosts may carry any NaN payload, so NaN is always written as
 * `7F F8 00 00 00 00 00 01`. Infinities and -0 keep their natural pattern.
 */
export function encodeDouble(value: number): Uint8Array {
  if (Number.isNaN(value)) return Uint8Array.from(CANONICAL_NAN);
  return fixed(8, (v) => v.setFloat64(0, value));
}

/** Decode a double. NaN payloads are not preserved. */
export function decodeDouble(buf: Uint8Array, offset: number): DecodeResult<number> {
  return { value: viewAt(buf, offset, 8).getFloat64(0), next: offset + 8 };
}

// ============================================================================
// Binary
// ============================================================================

/** Encode a byte string (u32 length + bytes). */
export function encodeBinary(bytes: Uint8Array): Uint8Array {
  const out = new Uint8Array(4 + bytes.length);
  new DataView(out.buffer).setUint32(0, bytes.length);
  out.set(bytes, 4);
  return out;
}
