// Wire value model for Thrift-family protocols.
//
// A wire value is the protocol-agnostic, schema-less representation of
// anything a protocol can carry. Generated marshalling code builds these
// trees from typed records; protocols turn them into bytes and back.

// ============================================================================
// Wire Types
// ============================================================================

/**
 * Type tags, one byte each on the wire.
 *
 * These appear wherever a type must be declared: struct field headers and
 * container element/key/value headers.
 */
export const WireType = {
  BOOL: 0x02,
  I8: 0x03,
  DOUBLE: 0x04,
  I16: 0x06,
  I32: 0x08,
  I64: 0x0a,
  BINARY: 0x0b,
  STRUCT: 0x0c,
  MAP: 0x0d,
  SET: 0x0e,
  LIST: 0x0f,
} as const;

export type WireType = (typeof WireType)[keyof typeof WireType];

const WIRE_TYPE_NAMES: Record<WireType, string> = {
  [WireType.BOOL]: "bool",
  [WireType.I8]: "i8",
  [WireType.DOUBLE]: "double",
  [WireType.I16]: "i16",
  [WireType.I32]: "i32",
  [WireType.I64]: "i64",
  [WireType.BINARY]: "binary",
  [WireType.STRUCT]: "struct",
  [WireType.MAP]: "map",
  [WireType.SET]: "set",
  [WireType.LIST]: "list",
};

/** Check whether a byte is one of the eleven known type tags. */
export function isWireType(tag: number): tag is WireType {
  return Object.prototype.hasOwnProperty.call(WIRE_TYPE_NAMES, tag);
}

/** Lower-case name of a type tag ("bool", "i16", "list", ...). */
export function wireTypeName(type: WireType): string {
  return WIRE_TYPE_NAMES[type];
}

// ============================================================================
// Scalar Values
// ============================================================================

export interface WireBool {
  type: typeof WireType.BOOL;
  value: boolean;
}

export interface WireI8 {
  type: typeof WireType.I8;
  value: number;
}

export interface WireDouble {
  type: typeof WireType.DOUBLE;
  value: number;
}

export interface WireI16 {
  type: typeof WireType.I16;
  value: number;
}

export interface WireI32 {
  type: typeof WireType.I32;
  value: number;
}

/** 64-bit integers are carried as bigint so both endpoints survive. */
export interface WireI64 {
  type: typeof WireType.I64;
  value: bigint;
}

/** Raw byte string. The value owns its buffer. */
export interface WireBinary {
  type: typeof WireType.BINARY;
  value: Uint8Array;
}

// ============================================================================
// Composite Values
// ============================================================================

/** A struct field: a 16-bit signed id and its value. */
export interface WireField {
  id: number;
  value: WireValue;
}

/**
 * Struct value.
 *
 * Fields are kept in insertion order, which is encoding-significant.
 * Ids are not required to be unique.
 */
export interface WireStruct {
  type: typeof WireType.STRUCT;
  fields: WireField[];
}

export interface WireMapItem {
  key: WireValue;
  value: WireValue;
}

/**
 * Map value. Both type tags are kept even when the map is empty.
 * Keys are not deduplicated.
 */
export interface WireMap {
  type: typeof WireType.MAP;
  keyType: WireType;
  valueType: WireType;
  items: WireMapItem[];
}

/** Set value. Same byte layout as a list. */
export interface WireSet {
  type: typeof WireType.SET;
  valueType: WireType;
  elements: WireValue[];
}

export interface WireList {
  type: typeof WireType.LIST;
  valueType: WireType;
  elements: WireValue[];
}

/**
 * Any encodable value.
 *
 * The variant (`type`) must match the tag it is encoded under. Protocols
 * trust this on encode and guarantee it on decode.
 */
export type WireValue =
  | WireBool
  | WireI8
  | WireDouble
  | WireI16
  | WireI32
  | WireI64
  | WireBinary
  | WireStruct
  | WireMap
  | WireSet
  | WireList;

// ============================================================================
// Factory Functions
// ============================================================================

const I64_MIN = -(1n << 63n);
const I64_MAX = (1n << 63n) - 1n;

function checkInteger(kind: string, value: number, bits: number): number {
  const max = 2 ** (bits - 1) - 1;
  const min = -(2 ** (bits - 1));
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new RangeError(`${kind}: ${value} is not an integer in [${min}, ${max}]`);
  }
  return value;
}

export function wireBool(value: boolean): WireBool {
  return { type: WireType.BOOL, value };
}

/** @throws RangeError if value does not fit in a signed 8-bit integer */
export function wireI8(value: number): WireI8 {
  return { type: WireType.I8, value: checkInteger("i8", value, 8) };
}

/** @throws RangeError if value does not fit in a signed 16-bit integer */
export function wireI16(value: number): WireI16 {
  return { type: WireType.I16, value: checkInteger("i16", value, 16) };
}

/** @throws RangeError if value does not fit in a signed 32-bit integer */
export function wireI32(value: number): WireI32 {
  return { type: WireType.I32, value: checkInteger("i32", value, 32) };
}

/**
 * Create an i64 value. Numbers are accepted when they are safe integers.
 *
 * @throws RangeError if value does not fit in a signed 64-bit integer
 */
export function wireI64(value: bigint | number): WireI64 {
  let big: bigint;
  if (typeof value === "bigint") {
    big = value;
  } else {
    if (!Number.isSafeInteger(value)) {
      throw new RangeError(`i64: ${value} is not a safe integer; pass a bigint`);
    }
    big = BigInt(value);
  }
  if (big < I64_MIN || big > I64_MAX) {
    throw new RangeError(`i64: ${big} is out of range [${I64_MIN}, ${I64_MAX}]`);
  }
  return { type: WireType.I64, value: big };
}

export function wireDouble(value: number): WireDouble {
  return { type: WireType.DOUBLE, value };
}

/** Wrap a byte string. The buffer is handed over, not copied. */
export function wireBinary(value: Uint8Array): WireBinary {
  return { type: WireType.BINARY, value };
}

const textEncoder = new TextEncoder();

/** Create a binary value holding the UTF-8 bytes of a string. */
export function wireString(value: string): WireBinary {
  return wireBinary(textEncoder.encode(value));
}

/** @throws RangeError if id does not fit in a signed 16-bit integer */
export function wireField(id: number, value: WireValue): WireField {
  return { id: checkInteger("field id", id, 16), value };
}

export function wireStruct(...fields: WireField[]): WireStruct {
  return { type: WireType.STRUCT, fields };
}

export function wireMapItem(key: WireValue, value: WireValue): WireMapItem {
  return { key, value };
}

/**
 * Create a map value.
 *
 * Lazily produced item sequences are drained here: the count goes on the
 * wire before the items.
 */
export function wireMap(
  keyType: WireType,
  valueType: WireType,
  items: Iterable<WireMapItem> = [],
): WireMap {
  return { type: WireType.MAP, keyType, valueType, items: Array.from(items) };
}

export function wireSet(valueType: WireType, elements: Iterable<WireValue> = []): WireSet {
  return { type: WireType.SET, valueType, elements: Array.from(elements) };
}

export function wireList(valueType: WireType, elements: Iterable<WireValue> = []): WireList {
  return { type: WireType.LIST, valueType, elements: Array.from(elements) };
}
