// Binary Protocol entry points.
//
// The protocol holds no state between calls; each decode gets its own
// DecodeContext. The outermost type is not on the wire, so decode takes it
// from the caller.

import {
  wireTypeName,
  type ByteSink,
  type ByteSource,
  type Protocol,
  type WireType,
  type WireValue,
} from "@thriftwire/wire";
import { readValue, writeValue } from "./containers.ts";
import { DecodeContext } from "./decode_context.ts";
import { DecodeError, DecodeErrorCode } from "./errors.ts";
import { BufferReader, BufferWriter } from "./io.ts";
import type { DecodeResult } from "./primitives.ts";

/** Default limit on nested struct/map/set/list containers during decode. */
export const DEFAULT_MAX_DEPTH = 64;

export interface DecodeOptions {
  /**
   * Maximum container nesting accepted by decode. Defaults to
   * DEFAULT_MAX_DEPTH. Must be a positive integer.
   */
  maxDepth?: number;
}

function resolveMaxDepth(options: DecodeOptions): number {
  const maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
  if (!Number.isInteger(maxDepth) || maxDepth < 1) {
    throw new RangeError(`maxDepth must be a positive integer, got ${maxDepth}`);
  }
  return maxDepth;
}

/**
 * The Binary Protocol.
 *
 * @example
 * ```typescript
 * const protocol = new BinaryProtocol({ maxDepth: 32 });
 * const bytes = protocol.encodeToBytes(wireStruct(wireField(1, wireBool(true))));
 * // bytes: 02 00 01 01 00
 * const value = protocol.decodeFromBytes(WireType.STRUCT, bytes);
 * ```
 */
export class BinaryProtocol implements Protocol {
  readonly maxDepth: number;

  constructor(options: DecodeOptions = {}) {
    this.maxDepth = resolveMaxDepth(options);
  }

  /**
   * Encode a value into the sink. Only the sink itself can make this fail.
   */
  encode(value: WireValue, sink: ByteSink): void {
    writeValue(sink, value);
  }

  /**
   * Decode a value of `type` from the source.
   *
   * @throws DecodeError on truncated input, an unknown type tag or nesting
   *   past `maxDepth`; errors thrown by the source pass through unchanged
   */
  decode(type: WireType, source: ByteSource): WireValue {
    const ctx = new DecodeContext(source, this.maxDepth);
    return readValue(ctx, ctx.checkType(type, 0));
  }

  encodeToBytes(value: WireValue): Uint8Array {
    const writer = new BufferWriter();
    this.encode(value, writer);
    return writer.bytes;
  }

  /**
   * Decode one value starting at `offset`, returning it with the offset
   * just past it. Error offsets are relative to `offset`.
   */
  decodeAt(type: WireType, buf: Uint8Array, offset = 0): DecodeResult<WireValue> {
    const reader = new BufferReader(buf, offset);
    const value = this.decode(type, reader);
    return { value, next: reader.position };
  }

  /**
   * Decode a buffer that must hold exactly one value.
   *
   * @throws DecodeError with code TRAILING_BYTES if input remains
   */
  decodeFromBytes(type: WireType, buf: Uint8Array): WireValue {
    const reader = new BufferReader(buf);
    const value = this.decode(type, reader);
    if (reader.remaining > 0) {
      throw new DecodeError(
        DecodeErrorCode.TRAILING_BYTES,
        `${reader.remaining} trailing bytes after ${wireTypeName(type)} value`,
        reader.position,
        "<root>",
      );
    }
    return value;
  }
}

/** Shared instance with default options. */
export const binaryProtocol = new BinaryProtocol();

export function encode(value: WireValue, sink: ByteSink): void {
  binaryProtocol.encode(value, sink);
}

export function decode(type: WireType, source: ByteSource): WireValue {
  return binaryProtocol.decode(type, source);
}

export function encodeToBytes(value: WireValue): Uint8Array {
  return binaryProtocol.encodeToBytes(value);
}

export function decodeFromBytes(type: WireType, buf: Uint8Array): WireValue {
  return binaryProtocol.decodeFromBytes(type, buf);
}

export function decodeAt(type: WireType, buf: Uint8Array, offset = 0): DecodeResult<WireValue> {
  return binaryProtocol.decodeAt(type, buf, offset);
}
