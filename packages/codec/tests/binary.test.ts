/**
 * Tests for the binary primitives.
 */

import { describe, it, expect } from "vitest";
import { BinaryReader, BinaryWriter } from "../src/binary.js";
import { MAX_UNITS, MIN_UNITS, ValidationError } from "@actus-sm/units";
import { MAX_TIMESTAMP } from "@actus-sm/types";

function expectDecodeFailed(fn: () => unknown): void {
  try {
    fn();
    expect.fail("should have thrown");
  } catch (err) {
    expect(err).toBeInstanceOf(ValidationError);
    expect(err).toMatchObject({ code: "DECODE_FAILED" });
  }
}

describe("BinaryWriter", () => {
  it("writes little-endian integers", () => {
    expect([...new BinaryWriter().u32(1).toBytes()]).toEqual([1, 0, 0, 0]);
    expect([...new BinaryWriter().u64(258).toBytes()]).toEqual([2, 1, 0, 0, 0, 0, 0, 0]);
    expect([...new BinaryWriter().i64(-1n).toBytes()]).toEqual([255, 255, 255, 255, 255, 255, 255, 255]);
  });

  it("prefixes strings with their UTF-8 byte length", () => {
    expect([...new BinaryWriter().string("ab").toBytes()]).toEqual([2, 0, 0, 0, 97, 98]);
    expect(new BinaryWriter().string("€").toBytes()).toHaveLength(4 + 3);
  });

  it("tags options", () => {
    expect([...new BinaryWriter().option<number>(undefined, () => undefined).toBytes()]).toEqual([0]);
    const w = new BinaryWriter();
    w.option(7, (v) => w.u8(v));
    expect([...w.toBytes()]).toEqual([1, 7]);
  });

  it("rejects values outside their width", () => {
    expect(() => new BinaryWriter().u8(256)).toThrow(ValidationError);
    expect(() => new BinaryWriter().u32(-1)).toThrow(ValidationError);
    expect(() => new BinaryWriter().u64(-1)).toThrow(ValidationError);
    expect(() => new BinaryWriter().u64(MAX_TIMESTAMP + 1)).toThrow(ValidationError);
    expect(() => new BinaryWriter().i64(MAX_UNITS + 1n)).toThrow(ValidationError);
  });
});

describe("BinaryReader", () => {
  it("reads back what was written", () => {
    const w = new BinaryWriter();
    w.u8(3).u32(70_000).u64(1_700_000_000).i64(MIN_UNITS).string("contract");
    w.vector(["x", "yz"], (v) => w.string(v));
    const r = new BinaryReader(w.toBytes());
    expect(r.u8()).toBe(3);
    expect(r.u32()).toBe(70_000);
    expect(r.u64()).toBe(1_700_000_000);
    expect(r.i64()).toBe(MIN_UNITS);
    expect(r.string()).toBe("contract");
    expect(r.vector(() => r.string())).toEqual(["x", "yz"]);
    expect(() => r.finish()).not.toThrow();
  });

  it("honours the view of a sliced array", () => {
    const bytes = new Uint8Array([9, 9, 42, 9]);
    expect(new BinaryReader(bytes.subarray(2, 3)).u8()).toBe(42);
  });

  it("fails on truncated input", () => {
    expectDecodeFailed(() => new BinaryReader(new Uint8Array([1, 0])).u32());
    expectDecodeFailed(() => new BinaryReader(new Uint8Array([5, 0, 0, 0, 97])).string());
  });

  it("fails on an invalid option tag", () => {
    expectDecodeFailed(() => new BinaryReader(new Uint8Array([2])).option(() => 0));
  });

  it("fails on trailing bytes", () => {
    const r = new BinaryReader(new Uint8Array([1, 2]));
    r.u8();
    expectDecodeFailed(() => r.finish());
  });

  it("rejects timestamps beyond the Date range", () => {
    const edge = new BinaryWriter().u64(MAX_TIMESTAMP).toBytes();
    expect(new BinaryReader(edge).u64()).toBe(MAX_TIMESTAMP);

    for (const raw of [BigInt(MAX_TIMESTAMP) + 1n, -1n]) {
      const bytes = new BinaryWriter().i64(raw).toBytes();
      try {
        new BinaryReader(bytes).u64();
        expect.fail("should have thrown");
      } catch (err) {
        expect(err).toBeInstanceOf(ValidationError);
        expect(err).toMatchObject({ code: "INVALID_TIMESTAMP" });
      }
    }
  });

  it("rejects strings that are not valid UTF-8", () => {
    // 0xC3 starts a two-byte sequence that 0x28 does not continue
    expectDecodeFailed(() => new BinaryReader(new Uint8Array([2, 0, 0, 0, 0xc3, 0x28])).string());
    expectDecodeFailed(() => new BinaryReader(new Uint8Array([1, 0, 0, 0, 0xff])).string());
  });

  it("reads multi-byte characters", () => {
    const bytes = new BinaryWriter().string("€uro").toBytes();
    expect(new BinaryReader(bytes).string()).toBe("€uro");
  });
});
