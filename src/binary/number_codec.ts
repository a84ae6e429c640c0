/**
 * Fixed-width numeric encoding for the binary stream operations.
 *
 * Integers use two's complement and floats use IEEE-754, both at the shape's
 * width in the requested byte order. Encoding validates the value first and
 * never truncates.
 */
import { err, ok } from "neverthrow";
import {
  type FileStreamResult,
  invalidArgument,
} from "../errors/file_stream_error.ts";

export type Endianness = "little" | "big";

/** Shapes whose values fit in a JavaScript number. */
export type NumberShape =
  | "int8"
  | "uint8"
  | "int16"
  | "uint16"
  | "int32"
  | "uint32"
  | "float32"
  | "float64";

/** 64-bit integer shapes, carried as bigint. */
export type BigIntShape = "int64" | "uint64";

export const SHAPE_BYTE_SIZES: Record<NumberShape | BigIntShape, number> = {
  int8: 1,
  uint8: 1,
  int16: 2,
  uint16: 2,
  int32: 4,
  uint32: 4,
  int64: 8,
  uint64: 8,
  float32: 4,
  float64: 8,
};

const INTEGER_RANGES: Record<
  Exclude<NumberShape, "float32" | "float64">,
  readonly [number, number]
> = {
  int8: [-0x80, 0x7f],
  uint8: [0, 0xff],
  int16: [-0x8000, 0x7fff],
  uint16: [0, 0xffff],
  int32: [-0x80000000, 0x7fffffff],
  uint32: [0, 0xffffffff],
};

const BIGINT_RANGES: Record<BigIntShape, readonly [bigint, bigint]> = {
  int64: [-(2n ** 63n), 2n ** 63n - 1n],
  uint64: [0n, 2n ** 64n - 1n],
};

function viewOf(bytes: Uint8Array): DataView {
  return new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}

/**
 * Decodes a number from exactly `SHAPE_BYTE_SIZES[shape]` bytes.
 */
export function decodeNumber(
  bytes: Uint8Array,
  shape: NumberShape,
  endianness: Endianness,
): number {
  const view = viewOf(bytes);
  const littleEndian = endianness === "little";
  switch (shape) {
    case "int8":
      return view.getInt8(0);
    case "uint8":
      return view.getUint8(0);
    case "int16":
      return view.getInt16(0, littleEndian);
    case "uint16":
      return view.getUint16(0, littleEndian);
    case "int32":
      return view.getInt32(0, littleEndian);
    case "uint32":
      return view.getUint32(0, littleEndian);
    case "float32":
      return view.getFloat32(0, littleEndian);
    case "float64":
      return view.getFloat64(0, littleEndian);
  }
}

export function decodeBigInt(
  bytes: Uint8Array,
  shape: BigIntShape,
  endianness: Endianness,
): bigint {
  const view = viewOf(bytes);
  const littleEndian = endianness === "little";
  return shape === "int64"
    ? view.getBigInt64(0, littleEndian)
    : view.getBigUint64(0, littleEndian);
}

/**
 * Encodes `value` at the shape's width. Integer shapes fail with `EINVAL`
 * for non-integers and values outside the shape's range.
 */
export function encodeNumber(
  value: number,
  shape: NumberShape,
  endianness: Endianness,
): FileStreamResult<Uint8Array> {
  const bytes = new Uint8Array(SHAPE_BYTE_SIZES[shape]);
  const view = viewOf(bytes);
  const littleEndian = endianness === "little";

  if (shape === "float32") {
    view.setFloat32(0, value, littleEndian);
    return ok(bytes);
  }
  if (shape === "float64") {
    view.setFloat64(0, value, littleEndian);
    return ok(bytes);
  }

  const [min, max] = INTEGER_RANGES[shape];
  if (!Number.isInteger(value) || value < min || value > max) {
    return err(invalidArgument());
  }

  switch (shape) {
    case "int8":
      view.setInt8(0, value);
      break;
    case "uint8":
      view.setUint8(0, value);
      break;
    case "int16":
      view.setInt16(0, value, littleEndian);
      break;
    case "uint16":
      view.setUint16(0, value, littleEndian);
      break;
    case "int32":
      view.setInt32(0, value, littleEndian);
      break;
    case "uint32":
      view.setUint32(0, value, littleEndian);
      break;
  }
  return ok(bytes);
}

export function encodeBigInt(
  value: bigint,
  shape: BigIntShape,
  endianness: Endianness,
): FileStreamResult<Uint8Array> {
  const [min, max] = BIGINT_RANGES[shape];
  if (value < min || value > max) {
    return err(invalidArgument());
  }

  const bytes = new Uint8Array(8);
  const view = viewOf(bytes);
  const littleEndian = endianness === "little";
  if (shape === "int64") {
    view.setBigInt64(0, value, littleEndian);
  } else {
    view.setBigUint64(0, value, littleEndian);
  }
  return ok(bytes);
}
