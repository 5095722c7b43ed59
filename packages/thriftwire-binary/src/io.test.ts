import { describe, it, expect } from "vitest";
import { ShortReadError } from "@thriftwire/wire";
import { BufferReader, BufferWriter } from "./io.ts";

describe("BufferWriter", () => {
  it("collects writes in order and grows as needed", () => {
    const writer = new BufferWriter(2);
    writer.write(Uint8Array.of(1, 2));
    writer.write(Uint8Array.of(3, 4, 5));
    writer.write(new Uint8Array(0));
    expect(writer.length).toBe(5);
    expect(writer.bytes).toEqual(Uint8Array.of(1, 2, 3, 4, 5));
  });

  it("returns a copy of its contents", () => {
    const writer = new BufferWriter();
    writer.write(Uint8Array.of(7));
    const snapshot = writer.bytes;
    writer.write(Uint8Array.of(8));
    expect(snapshot).toEqual(Uint8Array.of(7));
  });

  it("can be reset for reuse", () => {
    const writer = new BufferWriter(0);
    writer.write(Uint8Array.of(1, 2, 3));
    writer.reset();
    writer.write(Uint8Array.of(9));
    expect(writer.bytes).toEqual(Uint8Array.of(9));
  });
});

describe("BufferReader", () => {
  it("reads exact lengths and tracks position", () => {
    const reader = new BufferReader(Uint8Array.of(1, 2, 3, 4), 1);
    expect(reader.read(2)).toEqual(Uint8Array.of(2, 3));
    expect(reader.position).toBe(3);
    expect(reader.remaining).toBe(1);
    expect(reader.read(0)).toEqual(new Uint8Array(0));
  });

  it("throws ShortReadError without consuming anything", () => {
    const reader = new BufferReader(Uint8Array.of(1, 2));
    reader.read(1);
    let caught: unknown;
    try {
      reader.read(4);
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(ShortReadError);
    expect(caught).toMatchObject({ requested: 4, available: 1 });
    expect(reader.position).toBe(1);
    expect(reader.read(1)).toEqual(Uint8Array.of(2));
  });

  it("rejects an offset outside the buffer", () => {
    expect(() => new BufferReader(Uint8Array.of(1), 2)).toThrow(RangeError);
    expect(() => new BufferReader(Uint8Array.of(1), -1)).toThrow(RangeError);
    expect(new BufferReader(Uint8Array.of(1), 1).remaining).toBe(0);
  });
});
