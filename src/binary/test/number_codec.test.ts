import { describe, expect, it } from "vitest";
import {
  decodeBigInt,
  decodeNumber,
  encodeBigInt,
  encodeNumber,
  type NumberShape,
} from "../number_codec.ts";

describe("encodeNumber", () => {
  it("writes integers in the requested byte order", () => {
    expect(encodeNumber(0x1234, "uint16", "little")._unsafeUnwrap()).toEqual(
      new Uint8Array([0x34, 0x12]),
    );
    expect(encodeNumber(0x1234, "uint16", "big")._unsafeUnwrap()).toEqual(
      new Uint8Array([0x12, 0x34]),
    );
    expect(encodeNumber(-2, "int32", "big")._unsafeUnwrap()).toEqual(
      new Uint8Array([0xff, 0xff, 0xff, 0xfe]),
    );
  });

  it("writes IEEE-754 floats", () => {
    expect(encodeNumber(1, "float32", "big")._unsafeUnwrap()).toEqual(
      new Uint8Array([0x3f, 0x80, 0x00, 0x00]),
    );
    expect(encodeNumber(-2, "float64", "little")._unsafeUnwrap()).toEqual(
      new Uint8Array([0, 0, 0, 0, 0, 0, 0x00, 0xc0]),
    );
  });

  it("rejects out-of-range and fractional integers", () => {
    const cases: Array<[number, NumberShape]> = [
      [128, "int8"],
      [-129, "int8"],
      [256, "uint8"],
      [-1, "uint16"],
      [0x80000000, "int32"],
      [0x100000000, "uint32"],
      [1.5, "int16"],
      [Number.NaN, "uint8"],
    ];
    for (const [value, shape] of cases) {
      expect(encodeNumber(value, shape, "little")._unsafeUnwrapErr()).toEqual({
        code: "EINVAL",
      });
    }
  });
});

describe("number codec extremes", () => {
  const extremes: Array<[NumberShape, number[]]> = [
    ["int8", [-128, 0, 127]],
    ["uint8", [0, 255]],
    ["int16", [-32768, 32767]],
    ["uint16", [0, 65535]],
    ["int32", [-2147483648, 2147483647]],
    ["uint32", [0, 4294967295]],
    ["float64", [Number.MAX_VALUE, -Number.MIN_VALUE, Infinity]],
  ];

  for (const [shape, values] of extremes) {
    it(`decodes what it encodes for ${shape}`, () => {
      for (const endianness of ["little", "big"] as const) {
        for (const value of values) {
          const bytes = encodeNumber(value, shape, endianness)._unsafeUnwrap();
          expect(decodeNumber(bytes, shape, endianness)).toBe(value);
        }
      }
    });
  }

  it("rounds float32 to single precision", () => {
    const bytes = encodeNumber(0.1, "float32", "little")._unsafeUnwrap();
    expect(decodeNumber(bytes, "float32", "little")).toBe(Math.fround(0.1));
  });

  it("handles the full 64-bit ranges as bigint", () => {
    const int64 = [-(2n ** 63n), -1n, 2n ** 63n - 1n];
    const uint64 = [0n, 2n ** 64n - 1n];
    for (const endianness of ["little", "big"] as const) {
      for (const value of int64) {
        const bytes = encodeBigInt(value, "int64", endianness)._unsafeUnwrap();
        expect(decodeBigInt(bytes, "int64", endianness)).toBe(value);
      }
      for (const value of uint64) {
        const bytes = encodeBigInt(value, "uint64", endianness)._unsafeUnwrap();
        expect(decodeBigInt(bytes, "uint64", endianness)).toBe(value);
      }
    }
  });

  it("rejects bigints outside the 64-bit ranges", () => {
    expect(encodeBigInt(2n ** 63n, "int64", "big")._unsafeUnwrapErr()).toEqual({
      code: "EINVAL",
    });
    expect(encodeBigInt(-1n, "uint64", "big")._unsafeUnwrapErr()).toEqual({
      code: "EINVAL",
    });
  });

  it("decodes from a view into a larger buffer", () => {
    const backing = new Uint8Array([9, 0x00, 0x01, 9]);
    expect(decodeNumber(backing.subarray(1, 3), "uint16", "big")).toBe(1);
  });
});
