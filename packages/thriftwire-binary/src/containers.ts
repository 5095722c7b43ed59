// Recursive Binary Protocol encoding of wire values.
//
// Layouts (big-endian throughout):
// - struct: (type:1 id:2 value)* stop:1, stop = 0x00
// - map:    ktype:1 vtype:1 count:4 (key value){count}
// - set:    vtype:1 count:4 (value){count}
// - list:   vtype:1 count:4 (value){count}
//
// Set and list share a layout; only the API tells them apart.

import {
  WireType,
  type ByteSink,
  type WireField,
  type WireList,
  type WireMap,
  type WireMapItem,
  type WireSet,
  type WireStruct,
  type WireValue,
} from "@thriftwire/wire";
import type { DecodeContext } from "./decode_context.ts";
import {
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
} from "./primitives.ts";

/** Struct terminator. */
export const STOP = 0x00;

// ============================================================================
// Encoding
// ============================================================================

/**
 * Write a value depth-first into the sink.
 *
 * Container elements are trusted to match the declared element type.
 */
export function writeValue(sink: ByteSink, value: WireValue): void {
  switch (value.type) {
    case WireType.BOOL:
      sink.write(encodeBool(value.value));
      return;
    case WireType.I8:
      sink.write(encodeI8(value.value));
      return;
    case WireType.DOUBLE:
      sink.write(encodeDouble(value.value));
      return;
    case WireType.I16:
      sink.write(encodeI16(value.value));
      return;
    case WireType.I32:
      sink.write(encodeI32(value.value));
      return;
    case WireType.I64:
      sink.write(encodeI64(value.value));
      return;
    case WireType.BINARY:
      sink.write(encodeBinary(value.value));
      return;
    case WireType.STRUCT:
      writeStruct(sink, value);
      return;
    case WireType.MAP:
      writeMap(sink, value);
      return;
    case WireType.SET:
    case WireType.LIST:
      writeSequence(sink, value);
      return;
    default: {
      const unreachable: never = value;
      throw new Error(`Unknown wire value: ${JSON.stringify(unreachable)}`);
    }
  }
}

function writeStruct(sink: ByteSink, value: WireStruct): void {
  for (const field of value.fields) {
    sink.write(Uint8Array.of(field.value.type));
    sink.write(encodeI16(field.id));
    writeValue(sink, field.value);
  }
  sink.write(Uint8Array.of(STOP));
}

function writeMap(sink: ByteSink, value: WireMap): void {
  sink.write(Uint8Array.of(value.keyType, value.valueType));
  sink.write(encodeU32(value.items.length));
  for (const item of value.items) {
    writeValue(sink, item.key);
    writeValue(sink, item.value);
  }
}

function writeSequence(sink: ByteSink, value: WireSet | WireList): void {
  sink.write(Uint8Array.of(value.valueType));
  sink.write(encodeU32(value.elements.length));
  for (const element of value.elements) {
    writeValue(sink, element);
  }
}

// ============================================================================
// Decoding
// ============================================================================

/**
 * Read a value of the given type. The returned variant always equals `type`.
 */
export function readValue(ctx: DecodeContext, type: WireType): WireValue {
  switch (type) {
    case WireType.BOOL:
      return { type, value: decodeBool(ctx.read(1), 0).value };
    case WireType.I8:
      return { type, value: decodeI8(ctx.read(1), 0).value };
    case WireType.DOUBLE:
      return { type, value: decodeDouble(ctx.read(8), 0).value };
    case WireType.I16:
      return { type, value: decodeI16(ctx.read(2), 0).value };
    case WireType.I32:
      return { type, value: decodeI32(ctx.read(4), 0).value };
    case WireType.I64:
      return { type, value: decodeI64(ctx.read(8), 0).value };
    case WireType.BINARY:
      return { type, value: readBinary(ctx) };
    case WireType.STRUCT:
      return readStruct(ctx);
    case WireType.MAP:
      return readMap(ctx);
    case WireType.SET:
      return { type, ...readSequence(ctx) };
    case WireType.LIST:
      return { type, ...readSequence(ctx) };
    default: {
      const unreachable: never = type;
      throw new Error(`Unknown wire type: ${String(unreachable)}`);
    }
  }
}

function readCount(ctx: DecodeContext): number {
  return decodeU32(ctx.read(4), 0).value;
}

// Copied so the value owns its bytes even when the source hands out views.
function readBinary(ctx: DecodeContext): Uint8Array {
  const length = readCount(ctx);
  return ctx.read(length).slice();
}

function readStruct(ctx: DecodeContext): WireStruct {
  ctx.enter();
  const fields: WireField[] = [];
  while (true) {
    const start = ctx.offset;
    const tag = ctx.read(1)[0];
    if (tag === STOP) break;
    const type = ctx.checkType(tag, start);
    const id = decodeI16(ctx.read(2), 0).value;
    ctx.push(`field(${id})`);
    const value = readValue(ctx, type);
    ctx.pop();
    fields.push({ id, value });
  }
  ctx.leave();
  return { type: WireType.STRUCT, fields };
}

function readMap(ctx: DecodeContext): WireMap {
  ctx.enter();
  const keyType = ctx.readType();
  const valueType = ctx.readType();
  const count = readCount(ctx);
  // No preallocation: the count is untrusted.
  const items: WireMapItem[] = [];
  for (let i = 0; i < count; i++) {
    ctx.push(`{key ${i}}`);
    const key = readValue(ctx, keyType);
    ctx.pop();
    ctx.push(`{value ${i}}`);
    const value = readValue(ctx, valueType);
    ctx.pop();
    items.push({ key, value });
  }
  ctx.leave();
  return { type: WireType.MAP, keyType, valueType, items };
}

function readSequence(ctx: DecodeContext): { valueType: WireType; elements: WireValue[] } {
  ctx.enter();
  const valueType = ctx.readType();
  const count = readCount(ctx);
  const elements: WireValue[] = [];
  for (let i = 0; i < count; i++) {
    ctx.push(`[${i}]`);
    elements.push(readValue(ctx, valueType));
    ctx.pop();
  }
  ctx.leave();
  return { valueType, elements };
}
