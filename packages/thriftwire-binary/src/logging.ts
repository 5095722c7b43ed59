// Logging wrapper for protocols.
//
// Logs each encode/decode with timing information. Enabled through the
// DEBUG environment variable, with the same patterns as npm's debug package.

import { performance } from "node:perf_hooks";
import {
  formatValue,
  isWireType,
  wireTypeName,
  type ByteSink,
  type ByteSource,
  type Protocol,
  type WireType,
  type WireValue,
} from "@thriftwire/wire";
import { DecodeError } from "./errors.ts";

export interface LoggingOptions {
  /**
   * Namespace for debug matching. Defaults to "thriftwire:codec".
   * Logging is enabled when DEBUG matches this namespace.
   * Supports patterns like "thriftwire:*" or "*".
   */
  namespace?: string;

  /**
   * Log encoded and decoded values. Defaults to true.
   */
  logValues?: boolean;

  /**
   * Minimum duration (ms) to log. Faster calls are skipped.
   * Defaults to 0 (log every call).
   */
  minDuration?: number;
}

/**
 * Check if a namespace is enabled by the DEBUG pattern list.
 * Supports wildcards (*) and exclusions (-prefix).
 */
function isEnabled(namespace: string): boolean {
  const debug = process.env.DEBUG;
  if (!debug) return false;

  const patterns = debug.split(/[\s,]+/).filter(Boolean);
  let enabled = false;

  for (const pattern of patterns) {
    if (pattern.startsWith("-")) {
      if (matchPattern(namespace, pattern.slice(1))) {
        enabled = false;
      }
    } else if (matchPattern(namespace, pattern)) {
      enabled = true;
    }
  }

  return enabled;
}

function matchPattern(namespace: string, pattern: string): boolean {
  if (pattern === "*") return true;

  const regexStr = pattern
    .replace(/[.+?^${}()|[\]\\]/g, "\\$&") // Escape special chars except *
    .replace(/\*/g, ".*");

  return new RegExp(`^${regexStr}$`).test(namespace);
}

function describeError(error: unknown): unknown {
  if (error instanceof DecodeError) {
    return {
      name: error.name,
      code: error.code,
      message: error.detail,
      path: error.path,
      offset: error.offset,
    };
  }
  if (error instanceof Error) {
    return { name: error.name, message: error.message };
  }
  return error;
}

/**
 * Wrap a protocol so that every call is logged as a structured object:
 * - `{ type: "encode", wireType, duration, bytes, value? }`
 * - `{ type: "decode", wireType, duration, bytes, value? }`
 * and on failure `ok: false` with an `error` description. Errors are
 * rethrown unchanged.
 *
 * ```sh
 * DEBUG=thriftwire:* node server.js
 * ```
 *
 * @example
 * ```typescript
 * const protocol = loggingProtocol(binaryProtocol);
 * protocol.encode(value, writer);
 * // → encode struct: ✓ 0.02ms { type: "encode", wireType: "struct", bytes: 5, ... }
 * ```
 */
export function loggingProtocol(inner: Protocol, options: LoggingOptions = {}): Protocol {
  const namespace = options.namespace ?? "thriftwire:codec";
  const logValues = options.logValues ?? true;
  const minDuration = options.minDuration ?? 0;

  function report(
    op: "encode" | "decode",
    type: WireType,
    startTime: number,
    bytes: number,
    outcome: { ok: true; value: WireValue } | { ok: false; error: unknown },
  ): void {
    const duration = performance.now() - startTime;
    if (duration < minDuration) return;
    if (!isEnabled(namespace)) return;

    const name = isWireType(type) ? wireTypeName(type) : `0x${Number(type).toString(16)}`;
    const logObj: Record<string, unknown> = {
      type: op,
      wireType: name,
      duration: `${duration.toFixed(2)}ms`,
      bytes,
    };

    if (outcome.ok) {
      logObj.ok = true;
      if (logValues) {
        logObj.value = formatValue(outcome.value);
      }
      console.log(`${op} ${name}: ✓ ${duration.toFixed(2)}ms`, logObj);
    } else {
      logObj.ok = false;
      logObj.error = describeError(outcome.error);
      console.log(`${op} ${name}: ✗ ${duration.toFixed(2)}ms`, logObj);
    }
  }

  return {
    encode(value: WireValue, sink: ByteSink): void {
      let bytes = 0;
      const counting: ByteSink = {
        write(chunk: Uint8Array): void {
          sink.write(chunk);
          bytes += chunk.length;
        },
      };
      const startTime = performance.now();
      try {
        inner.encode(value, counting);
      } catch (error) {
        report("encode", value.type, startTime, bytes, { ok: false, error });
        throw error;
      }
      report("encode", value.type, startTime, bytes, { ok: true, value });
    },

    decode(type: WireType, source: ByteSource): WireValue {
      let bytes = 0;
      const counting: ByteSource = {
        read(length: number): Uint8Array {
          const chunk = source.read(length);
          bytes += chunk.length;
          return chunk;
        },
      };
      const startTime = performance.now();
      let value: WireValue;
      try {
        value = inner.decode(type, counting);
      } catch (error) {
        report("decode", type, startTime, bytes, { ok: false, error });
        throw error;
      }
      report("decode", type, startTime, bytes, { ok: true, value });
      return value;
    },
  };
}
