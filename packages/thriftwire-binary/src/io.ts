// In-memory byte sink and source.

import { ShortReadError, type ByteSink, type ByteSource } from "@thriftwire/wire";

/**
 * A growable buffer that collects encoded bytes.
 */
export class BufferWriter implements ByteSink {
  private buf: Uint8Array;
  private len = 0;

  constructor(initialCapacity = 64) {
    this.buf = new Uint8Array(initialCapacity);
  }

  /** Copy of the bytes written so far. */
  get bytes(): Uint8Array {
    return this.buf.slice(0, this.len);
  }

  get length(): number {
    return this.len;
  }

  write(bytes: Uint8Array): void {
    this.reserve(bytes.length);
    this.buf.set(bytes, this.len);
    this.len += bytes.length;
  }

  /** Reset the writer for reuse. */
  reset(): void {
    this.len = 0;
  }

  private reserve(extra: number): void {
    const needed = this.len + extra;
    if (needed <= this.buf.length) return;
    let capacity = Math.max(this.buf.length * 2, 16);
    while (capacity < needed) capacity *= 2;
    const next = new Uint8Array(capacity);
    next.set(this.buf.subarray(0, this.len));
    this.buf = next;
  }
}

/**
 * Reads from a byte array, starting at an optional offset.
 *
 * Returned slices are views into the underlying array. A short read throws
 * `ShortReadError` and leaves the position where it was.
 */
export class BufferReader implements ByteSource {
  private pos: number;

  constructor(
    private readonly buf: Uint8Array,
    offset = 0,
  ) {
    if (!Number.isInteger(offset) || offset < 0 || offset > buf.length) {
      throw new RangeError(`offset ${offset} is outside buffer of length ${buf.length}`);
    }
    this.pos = offset;
  }

  get position(): number {
    return this.pos;
  }

  get remaining(): number {
    return this.buf.length - this.pos;
  }

  read(length: number): Uint8Array {
    const available = this.remaining;
    if (length > available) {
      throw new ShortReadError(length, available);
    }
    const out = this.buf.subarray(this.pos, this.pos + length);
    this.pos += length;
    return out;
  }
}
