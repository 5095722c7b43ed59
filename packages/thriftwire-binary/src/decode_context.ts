// Decode state for one `decode` call: the source, the bytes consumed so far,
// the path through the value tree and the container nesting depth.

import { ShortReadError, isWireType, type ByteSource, type WireType } from "@thriftwire/wire";
import { DecodeError, DecodeErrorCode } from "./errors.ts";

export class DecodeContext {
  private path: string[] = [];
  private depth = 0;
  private consumed = 0;

  constructor(
    private readonly source: ByteSource,
    public readonly maxDepth: number,
  ) {}

  /** Bytes consumed since the decode started. */
  get offset(): number {
    return this.consumed;
  }

  /**
   * Read exactly `length` bytes.
   *
   * A short read becomes a TRUNCATED `DecodeError`; anything else the source
   * throws is rethrown as is. A source handing back more than `length` bytes
   * is broken and fails with a plain `Error`.
   */
  read(length: number): Uint8Array {
    const start = this.consumed;
    let bytes: Uint8Array;
    try {
      bytes = this.source.read(length);
    } catch (e) {
      if (e instanceof ShortReadError) {
        throw this.error(
          DecodeErrorCode.TRUNCATED,
          `unexpected end of input: ${e.message}`,
          start,
          e,
        );
      }
      throw e;
    }
    if (bytes.length < length) {
      throw this.error(
        DecodeErrorCode.TRUNCATED,
        `unexpected end of input: wanted ${length} bytes, got ${bytes.length}`,
        start,
      );
    }
    if (bytes.length > length) {
      throw new Error(`byte source returned ${bytes.length} bytes for a read of ${length}`);
    }
    this.consumed += length;
    return bytes;
  }

  /** Read one type-tag byte and check it names a known wire type. */
  readType(): WireType {
    const start = this.consumed;
    const tag = this.read(1)[0];
    return this.checkType(tag, start);
  }

  /** Check a tag that was read at `at`, or supplied by the caller. */
  checkType(tag: number, at: number = this.consumed): WireType {
    if (!isWireType(tag)) {
      throw this.error(
        DecodeErrorCode.UNKNOWN_TYPE,
        `unknown type tag 0x${tag.toString(16).padStart(2, "0")}`,
        at,
      );
    }
    return tag;
  }

  /** Enter a container; fails once nesting passes `maxDepth`. */
  enter(): void {
    if (this.depth >= this.maxDepth) {
      throw this.error(
        DecodeErrorCode.DEPTH_EXCEEDED,
        `nesting deeper than ${this.maxDepth} containers`,
        this.consumed,
      );
    }
    this.depth++;
  }

  leave(): void {
    this.depth--;
  }

  /** Push a path segment (entering a field, element, key or value) */
  push(segment: string): void {
    this.path.push(segment);
  }

  /** Pop a path segment */
  pop(): void {
    this.path.pop();
  }

  currentPath(): string {
    return this.path.length === 0 ? "<root>" : this.path.join(".");
  }

  error(code: DecodeErrorCode, detail: string, offset: number, cause?: unknown): DecodeError {
    return new DecodeError(
      code,
      detail,
      offset,
      this.currentPath(),
      cause === undefined ? undefined : { cause },
    );
  }
}
