// One-line rendering of wire values for logs and error messages.

import type { WireValue } from "./types.ts";
import { WireType, wireTypeName } from "./types.ts";

/** Lower-case hex of a byte string, no separators. */
export function toHex(bytes: Uint8Array): string {
  let out = "";
  for (const byte of bytes) {
    out += byte.toString(16).padStart(2, "0");
  }
  return out;
}

function formatDouble(value: number): string {
  return Object.is(value, -0) ? "-0" : String(value);
}

/**
 * Render a value compactly, e.g. `struct{1: bool(true)}` or
 * `list<i16>[i16(1), i16(2)]`. Binary payloads are shown as hex.
 */
export function formatValue(value: WireValue): string {
  switch (value.type) {
    case WireType.BOOL:
    case WireType.I8:
    case WireType.I16:
    case WireType.I32:
    case WireType.I64:
      return `${wireTypeName(value.type)}(${value.value})`;
    case WireType.DOUBLE:
      return `double(${formatDouble(value.value)})`;
    case WireType.BINARY:
      return `binary(${toHex(value.value)})`;
    case WireType.STRUCT: {
      const fields = value.fields.map((f) => `${f.id}: ${formatValue(f.value)}`);
      return `struct{${fields.join(", ")}}`;
    }
    case WireType.MAP: {
      const items = value.items.map((i) => `${formatValue(i.key)}: ${formatValue(i.value)}`);
      const header = `${wireTypeName(value.keyType)}, ${wireTypeName(value.valueType)}`;
      return `map<${header}>{${items.join(", ")}}`;
    }
    case WireType.SET:
    case WireType.LIST: {
      const elements = value.elements.map(formatValue);
      const header = `${wireTypeName(value.type)}<${wireTypeName(value.valueType)}>`;
      return `${header}[${elements.join(", ")}]`;
    }
  }
}
