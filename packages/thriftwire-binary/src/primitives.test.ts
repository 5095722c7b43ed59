import { describe, it, expect } from "vitest";
import { ShortReadError } from "@thriftwire/wire";
import {
  CANONICAL_NAN,
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

describe("bool", () => {
  it("encodes as a single 0/1 byte", () => {
    expect(encodeBool(true)).toEqual(Uint8Array.of(0x01));
    expect(encodeBool(false)).toEqual(Uint8Array.of(0x00));
  });

  it("decodes any nonzero byte as true", () => {
    expect(decodeBool(Uint8Array.of(0x00), 0)).toEqual({ value: false, next: 1 });
    expect(decodeBool(Uint8Array.of(0x01), 0).value).toBe(true);
    expect(decodeBool(Uint8Array.of(0x02), 0).value).toBe(true);
    expect(decodeBool(Uint8Array.of(0xff), 0).value).toBe(true);
  });
});

describe("integers", () => {
  it("encodes -1 as all ones at every width", () => {
    expect(encodeI8(-1)).toEqual(Uint8Array.of(0xff));
    expect(encodeI16(-1)).toEqual(Uint8Array.of(0xff, 0xff));
    expect(encodeI32(-1)).toEqual(new Uint8Array(4).fill(0xff));
    expect(encodeI64(-1n)).toEqual(new Uint8Array(8).fill(0xff));
  });

  it("encodes big-endian", () => {
    expect(encodeI16(-256)).toEqual(Uint8Array.of(0xff, 0x00));
    expect(encodeI32(0x01020304)).toEqual(Uint8Array.of(1, 2, 3, 4));
    expect(encodeI64(0x0102030405060708n)).toEqual(Uint8Array.of(1, 2, 3, 4, 5, 6, 7, 8));
  });

  it("roundtrips the endpoints of each width", () => {
    for (const value of [-128, 127]) {
      expect(decodeI8(encodeI8(value), 0).value).toBe(value);
    }
    for (const value of [-32768, 32767]) {
      expect(decodeI16(encodeI16(value), 0).value).toBe(value);
    }
    for (const value of [-2147483648, 2147483647]) {
      expect(decodeI32(encodeI32(value), 0).value).toBe(value);
    }
    for (const value of [-9223372036854775808n, 9223372036854775807n]) {
      expect(decodeI64(encodeI64(value), 0).value).toBe(value);
    }
  });

  it("decodes at an offset", () => {
    const buf = Uint8Array.of(0xaa, 0x80, 0x00, 0xbb);
    expect(decodeI16(buf, 1)).toEqual({ value: -32768, next: 3 });
  });

  it("reads counts as unsigned", () => {
    expect(encodeU32(0xffffffff)).toEqual(new Uint8Array(4).fill(0xff));
    expect(decodeU32(new Uint8Array(4).fill(0xff), 0).value).toBe(4294967295);
  });

  it("throws ShortReadError when the buffer is too short", () => {
    expect(() => decodeI32(Uint8Array.of(0, 0, 0), 0)).toThrow(ShortReadError);
    expect(() => decodeI8(new Uint8Array(0), 0)).toThrow(ShortReadError);
    expect(() => decodeI64(new Uint8Array(8), 1)).toThrow("wanted 8 bytes, 7 available");
  });

  it("rejects offsets that are negative or fractional", () => {
    const view = Uint8Array.of(0x7f, 0x01).subarray(1);
    expect(() => decodeI8(view, -1)).toThrow(RangeError);
    expect(() => decodeI8(view, -1)).toThrow("offset -1 is not a non-negative integer");
    expect(() => decodeI8(view, 0.5)).toThrow("offset 0.5 is not a non-negative integer");
    expect(() => decodeU32(new Uint8Array(8), Number.NaN)).toThrow(RangeError);
    expect(decodeI8(view, 0)).toEqual({ value: 1, next: 1 });
  });

  it("reports an offset past the end as a short read", () => {
    expect(() => decodeI16(Uint8Array.of(1, 2), 5)).toThrow("wanted 2 bytes, 0 available");
  });
});

describe("double", () => {
  it("uses the IEEE-754 big-endian pattern", () => {
    expect(encodeDouble(1)).toEqual(Uint8Array.of(0x3f, 0xf0, 0, 0, 0, 0, 0, 0));
    expect(encodeDouble(-0)).toEqual(Uint8Array.of(0x80, 0, 0, 0, 0, 0, 0, 0));
    expect(encodeDouble(Number.NEGATIVE_INFINITY)).toEqual(
      Uint8Array.of(0xff, 0xf0, 0, 0, 0, 0, 0, 0),
    );
  });

  it("canonicalizes every NaN", () => {
    const expected = Uint8Array.of(0x7f, 0xf8, 0, 0, 0, 0, 0, 0x01);
    expect(Uint8Array.from(CANONICAL_NAN)).toEqual(expected);

    // A negative quiet NaN with a nonzero payload.
    const odd = new DataView(new ArrayBuffer(8));
    odd.setUint32(0, 0xfff80000);
    odd.setUint32(4, 0x0000beef);
    const weird = odd.getFloat64(0);
    expect(Number.isNaN(weird)).toBe(true);

    expect(encodeDouble(Number.NaN)).toEqual(expected);
    expect(encodeDouble(weird)).toEqual(expected);
    expect(encodeDouble(0 / 0)).toEqual(expected);
  });

  it("decodes without special cases", () => {
    expect(decodeDouble(encodeDouble(-1.1), 0).value).toBe(-1.1);
    expect(Object.is(decodeDouble(encodeDouble(-0), 0).value, -0)).toBe(true);
    expect(Number.isNaN(decodeDouble(Uint8Array.from(CANONICAL_NAN), 0).value)).toBe(true);
  });
});

describe("binary", () => {
  it("prefixes a u32 length", () => {
    expect(encodeBinary(new Uint8Array(0))).toEqual(new Uint8Array(4));
    expect(encodeBinary(Uint8Array.of(0x68, 0x69))).toEqual(Uint8Array.of(0, 0, 0, 2, 0x68, 0x69));
  });
});
