// Decode failures for the Binary Protocol.
//
// Sink and source I/O errors are never wrapped in these; they reach the
// caller as thrown.

/** Decode failure kinds */
export const DecodeErrorCode = {
  /** Input ended before a tag, id, length, count or payload was complete */
  TRUNCATED: "truncated",
  /** A type-tag byte is not one of the known wire types */
  UNKNOWN_TYPE: "unknown_type",
  /** Containers are nested deeper than the configured limit */
  DEPTH_EXCEEDED: "depth_exceeded",
  /** Bytes remain after a value that was expected to fill the buffer */
  TRAILING_BYTES: "trailing_bytes",
} as const;

export type DecodeErrorCode = (typeof DecodeErrorCode)[keyof typeof DecodeErrorCode];

/**
 * A decode failure with the position it happened at.
 *
 * `offset` counts bytes from where the decode call started; `path` names
 * the value being read, e.g. `field(2).[1]`.
 */
export class DecodeError extends Error {
  readonly code: DecodeErrorCode;
  readonly detail: string;
  readonly offset: number;
  readonly path: string;

  constructor(
    code: DecodeErrorCode,
    detail: string,
    offset: number,
    path: string,
    options?: { cause?: unknown },
  ) {
    const details = [
      `Error: ${detail}`,
      `Path: ${path}`,
      `Offset: ${offset} (0x${offset.toString(16)})`,
    ].join("\n  ");
    super(`Decode error:\n  ${details}`, options);
    this.name = "DecodeError";
    this.code = code;
    this.detail = detail;
    this.offset = offset;
    this.path = path;
  }

  isTruncated(): boolean {
    return this.code === DecodeErrorCode.TRUNCATED;
  }
}
