/**
 * Character-level encoding and decoding for the supported text encodings.
 *
 * Encoding works on whole strings and either produces every byte or nothing.
 * Decoding works one character at a time so a stream can consume exactly the
 * bytes of the characters it returns.
 */
import { err, ok } from "neverthrow";
import {
  type FileStreamResult,
  noTranslation,
} from "../errors/file_stream_error.ts";
import type { TextEncoding } from "./text_encoding.ts";

/** The most bytes a single character occupies in any supported encoding. */
export const MAX_ENCODED_CHAR_BYTES = 4;

export type DecodedChar =
  | { readonly kind: "char"; readonly text: string; readonly byteLength: number }
  | { readonly kind: "incomplete" }
  | { readonly kind: "invalid" };

const INCOMPLETE: DecodedChar = { kind: "incomplete" };
const INVALID: DecodedChar = { kind: "invalid" };

function decoded(text: string, byteLength: number): DecodedChar {
  return { kind: "char", text, byteLength };
}

function isHighSurrogate(unit: number): boolean {
  return unit >= 0xd800 && unit <= 0xdbff;
}

function isLowSurrogate(unit: number): boolean {
  return unit >= 0xdc00 && unit <= 0xdfff;
}

function isSurrogate(unit: number): boolean {
  return unit >= 0xd800 && unit <= 0xdfff;
}

/**
 * Reads the code point starting at `index`. An unpaired surrogate is returned
 * as its own code unit value.
 */
function codePointAt(text: string, index: number): number {
  const unit = text.charCodeAt(index);
  if (isHighSurrogate(unit)) {
    const next = text.charCodeAt(index + 1);
    if (isLowSurrogate(next)) {
      return ((unit - 0xd800) << 10) + (next - 0xdc00) + 0x10000;
    }
  }
  return unit;
}

function encodedCodePointLength(
  codePoint: number,
  encoding: TextEncoding,
): number | undefined {
  if (encoding === "latin1") {
    return codePoint <= 0xff ? 1 : undefined;
  }
  if (isSurrogate(codePoint)) {
    return undefined;
  }
  switch (encoding) {
    case "utf8":
      if (codePoint < 0x80) return 1;
      if (codePoint < 0x800) return 2;
      if (codePoint < 0x10000) return 3;
      return 4;
    case "utf16le":
    case "utf16be":
      return codePoint < 0x10000 ? 2 : 4;
    case "utf32le":
    case "utf32be":
      return 4;
  }
}

/**
 * Returns the number of bytes `text` occupies in `encoding`, or `undefined`
 * when some character cannot be represented in it.
 */
export function encodedByteLength(
  text: string,
  encoding: TextEncoding,
): number | undefined {
  let length = 0;
  for (let index = 0; index < text.length;) {
    const codePoint = codePointAt(text, index);
    const size = encodedCodePointLength(codePoint, encoding);
    if (size === undefined) {
      return undefined;
    }
    length += size;
    index += codePoint >= 0x10000 ? 2 : 1;
  }
  return length;
}

/**
 * Encodes `text` into `encoding`. Fails with `NO_TRANSLATION` when a
 * character cannot be represented, in which case nothing is produced.
 */
export function encodeText(
  text: string,
  encoding: TextEncoding,
): FileStreamResult<Uint8Array> {
  const length = encodedByteLength(text, encoding);
  if (length === undefined) {
    return err(noTranslation("unicode", encoding));
  }

  const bytes = new Uint8Array(length);
  const view = new DataView(bytes.buffer);
  const littleEndian = encoding === "utf16le" || encoding === "utf32le";
  let offset = 0;

  for (let index = 0; index < text.length;) {
    const codePoint = codePointAt(text, index);
    index += codePoint >= 0x10000 ? 2 : 1;

    switch (encoding) {
      case "latin1":
        bytes[offset++] = codePoint;
        break;
      case "utf8":
        offset = writeUtf8(bytes, offset, codePoint);
        break;
      case "utf16le":
      case "utf16be":
        if (codePoint >= 0x10000) {
          const bits = codePoint - 0x10000;
          view.setUint16(offset, 0xd800 + (bits >> 10), littleEndian);
          view.setUint16(offset + 2, 0xdc00 + (bits & 0x3ff), littleEndian);
          offset += 4;
        } else {
          view.setUint16(offset, codePoint, littleEndian);
          offset += 2;
        }
        break;
      case "utf32le":
      case "utf32be":
        view.setUint32(offset, codePoint, littleEndian);
        offset += 4;
        break;
    }
  }

  return ok(bytes);
}

function writeUtf8(bytes: Uint8Array, offset: number, codePoint: number): number {
  if (codePoint < 0x80) {
    bytes[offset] = codePoint;
    return offset + 1;
  }
  if (codePoint < 0x800) {
    bytes[offset] = 0xc0 | (codePoint >> 6);
    bytes[offset + 1] = 0x80 | (codePoint & 0x3f);
    return offset + 2;
  }
  if (codePoint < 0x10000) {
    bytes[offset] = 0xe0 | (codePoint >> 12);
    bytes[offset + 1] = 0x80 | ((codePoint >> 6) & 0x3f);
    bytes[offset + 2] = 0x80 | (codePoint & 0x3f);
    return offset + 3;
  }
  bytes[offset] = 0xf0 | (codePoint >> 18);
  bytes[offset + 1] = 0x80 | ((codePoint >> 12) & 0x3f);
  bytes[offset + 2] = 0x80 | ((codePoint >> 6) & 0x3f);
  bytes[offset + 3] = 0x80 | (codePoint & 0x3f);
  return offset + 4;
}

/**
 * Decodes the single character starting at `offset`.
 *
 * Returns `incomplete` when the available bytes are a valid but truncated
 * prefix of a character, and `invalid` when they can never form one.
 * Callers must pass at least one available byte.
 */
export function decodeChar(
  bytes: Uint8Array,
  offset: number,
  encoding: TextEncoding,
): DecodedChar {
  switch (encoding) {
    case "latin1":
      return decoded(String.fromCharCode(bytes[offset]), 1);
    case "utf8":
      return decodeUtf8Char(bytes, offset);
    case "utf16le":
    case "utf16be":
      return decodeUtf16Char(bytes, offset, encoding === "utf16le");
    case "utf32le":
    case "utf32be":
      return decodeUtf32Char(bytes, offset, encoding === "utf32le");
  }
}

function decodeUtf8Char(bytes: Uint8Array, offset: number): DecodedChar {
  const lead = bytes[offset];
  if (lead < 0x80) {
    return decoded(String.fromCharCode(lead), 1);
  }

  let continuation: number;
  let codePoint: number;
  // Bounds on the first continuation byte rule out overlong forms,
  // surrogates and code points above U+10FFFF.
  let lower = 0x80;
  let upper = 0xbf;

  if (lead >= 0xc2 && lead <= 0xdf) {
    continuation = 1;
    codePoint = lead & 0x1f;
  } else if (lead >= 0xe0 && lead <= 0xef) {
    continuation = 2;
    codePoint = lead & 0x0f;
    if (lead === 0xe0) lower = 0xa0;
    if (lead === 0xed) upper = 0x9f;
  } else if (lead >= 0xf0 && lead <= 0xf4) {
    continuation = 3;
    codePoint = lead & 0x07;
    if (lead === 0xf0) lower = 0x90;
    if (lead === 0xf4) upper = 0x8f;
  } else {
    return INVALID;
  }

  for (let i = 1; i <= continuation; i++) {
    if (offset + i >= bytes.length) {
      return INCOMPLETE;
    }
    const byte = bytes[offset + i];
    if (byte < lower || byte > upper) {
      return INVALID;
    }
    lower = 0x80;
    upper = 0xbf;
    codePoint = (codePoint << 6) | (byte & 0x3f);
  }

  return decoded(String.fromCodePoint(codePoint), continuation + 1);
}

function decodeUtf16Char(
  bytes: Uint8Array,
  offset: number,
  littleEndian: boolean,
): DecodedChar {
  if (bytes.length - offset < 2) {
    return INCOMPLETE;
  }
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const unit = view.getUint16(offset, littleEndian);

  if (isLowSurrogate(unit)) {
    return INVALID;
  }
  if (!isHighSurrogate(unit)) {
    return decoded(String.fromCharCode(unit), 2);
  }

  if (bytes.length - offset < 4) {
    return INCOMPLETE;
  }
  const next = view.getUint16(offset + 2, littleEndian);
  if (!isLowSurrogate(next)) {
    return INVALID;
  }
  return decoded(String.fromCharCode(unit, next), 4);
}

function decodeUtf32Char(
  bytes: Uint8Array,
  offset: number,
  littleEndian: boolean,
): DecodedChar {
  if (bytes.length - offset < 4) {
    return INCOMPLETE;
  }
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const codePoint = view.getUint32(offset, littleEndian);
  if (codePoint > 0x10ffff || isSurrogate(codePoint)) {
    return INVALID;
  }
  return decoded(String.fromCodePoint(codePoint), 4);
}
