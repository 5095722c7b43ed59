// Abstract codec and byte I/O contracts.
//
// Protocols are transport-agnostic: they write to a sink and read from a
// source, and never own a socket or a frame.

import type { WireType, WireValue } from "./types.ts";

/**
 * Destination for encoded bytes.
 *
 * `write` may throw; protocols propagate such errors unchanged.
 */
export interface ByteSink {
  write(bytes: Uint8Array): void;
}

/**
 * Origin of bytes to decode.
 *
 * `read` returns exactly `length` bytes, or throws `ShortReadError` when
 * fewer remain. Any other thrown error is an I/O failure and is propagated
 * unchanged by protocols.
 */
export interface ByteSource {
  read(length: number): Uint8Array;
}

/**
 * Raised by a `ByteSource` when it cannot supply the requested bytes.
 */
export class ShortReadError extends Error {
  constructor(
    public readonly requested: number,
    public readonly available: number,
  ) {
    super(`short read: wanted ${requested} bytes, ${available} available`);
    this.name = "ShortReadError";
  }
}

/**
 * A wire protocol. The outermost type is never on the wire, so callers pass
 * it to `decode` out-of-band.
 */
export interface Protocol {
  encode(value: WireValue, sink: ByteSink): void;
  decode(type: WireType, source: ByteSource): WireValue;
}
