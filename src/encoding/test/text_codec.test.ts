import { describe, expect, it } from "vitest";
import {
  decodeChar,
  encodedByteLength,
  encodeText,
} from "../text_codec.ts";
import {
  encodingName,
  isTextEncoding,
  TEXT_ENCODINGS,
} from "../text_encoding.ts";

function bytesOf(...values: number[]): Uint8Array {
  return new Uint8Array(values);
}

describe("encodeText", () => {
  it("encodes latin-1 one byte per character", () => {
    expect(encodeText("Aé", "latin1")._unsafeUnwrap()).toEqual(
      bytesOf(0x41, 0xe9),
    );
  });

  it("rejects characters above U+00FF under latin-1", () => {
    expect(encodeText("aĀ", "latin1")._unsafeUnwrapErr()).toEqual({
      code: "NO_TRANSLATION",
      from: "unicode",
      to: "latin1",
    });
  });

  it("encodes utf-8 multi-byte sequences", () => {
    expect(encodeText("€👻", "utf8")._unsafeUnwrap()).toEqual(
      bytesOf(0xe2, 0x82, 0xac, 0xf0, 0x9f, 0x91, 0xbb),
    );
  });

  it("encodes astral characters as surrogate pairs in utf-16", () => {
    expect(encodeText("👻", "utf16le")._unsafeUnwrap()).toEqual(
      bytesOf(0x3d, 0xd8, 0x7b, 0xdc),
    );
    expect(encodeText("👻", "utf16be")._unsafeUnwrap()).toEqual(
      bytesOf(0xd8, 0x3d, 0xdc, 0x7b),
    );
  });

  it("encodes utf-32 in both byte orders", () => {
    expect(encodeText("👻", "utf32le")._unsafeUnwrap()).toEqual(
      bytesOf(0x7b, 0xf4, 0x01, 0x00),
    );
    expect(encodeText("A", "utf32be")._unsafeUnwrap()).toEqual(
      bytesOf(0x00, 0x00, 0x00, 0x41),
    );
  });

  it("rejects lone surrogates under unicode encodings", () => {
    expect(encodeText("a\ud800b", "utf8")._unsafeUnwrapErr()).toEqual({
      code: "NO_TRANSLATION",
      from: "unicode",
      to: "utf8",
    });
  });
});

describe("encodedByteLength", () => {
  it("counts bytes per encoding", () => {
    expect(encodedByteLength("a👻", "utf8")).toBe(5);
    expect(encodedByteLength("a👻", "utf16be")).toBe(6);
    expect(encodedByteLength("a👻", "utf32le")).toBe(8);
    expect(encodedByteLength("a👻", "latin1")).toBeUndefined();
  });
});

describe("decodeChar", () => {
  it("decodes latin-1 bytes as code points", () => {
    expect(decodeChar(bytesOf(0xe9), 0, "latin1")).toEqual({
      kind: "char",
      text: "é",
      byteLength: 1,
    });
  });

  it("decodes a utf-8 character at an offset", () => {
    const bytes = bytesOf(0x31, 0xf0, 0x9f, 0xa6, 0x91);
    expect(decodeChar(bytes, 1, "utf8")).toEqual({
      kind: "char",
      text: "🦑",
      byteLength: 4,
    });
  });

  it("reports truncated utf-8 as incomplete", () => {
    expect(decodeChar(bytesOf(0xe2, 0x82), 0, "utf8")).toEqual({
      kind: "incomplete",
    });
  });

  it("rejects overlong and surrogate utf-8 forms", () => {
    expect(decodeChar(bytesOf(0xc0, 0x80), 0, "utf8").kind).toBe("invalid");
    expect(decodeChar(bytesOf(0xe0, 0x80, 0x80), 0, "utf8").kind).toBe(
      "invalid",
    );
    expect(decodeChar(bytesOf(0xed, 0xa0, 0x80), 0, "utf8").kind).toBe(
      "invalid",
    );
    expect(decodeChar(bytesOf(0xf4, 0x90, 0x80, 0x80), 0, "utf8").kind)
      .toBe("invalid");
  });

  it("rejects a stray continuation byte", () => {
    expect(decodeChar(bytesOf(0x80), 0, "utf8").kind).toBe("invalid");
  });

  it("pairs utf-16 surrogates into one character", () => {
    expect(decodeChar(bytesOf(0xd8, 0x3d, 0xdc, 0x7b), 0, "utf16be"))
      .toEqual({ kind: "char", text: "👻", byteLength: 4 });
  });

  it("rejects unpaired utf-16 surrogates", () => {
    expect(decodeChar(bytesOf(0x00, 0xdc), 0, "utf16le").kind).toBe(
      "invalid",
    );
    expect(decodeChar(bytesOf(0x3d, 0xd8, 0x41, 0x00), 0, "utf16le").kind)
      .toBe("invalid");
  });

  it("needs the second unit of a utf-16 pair", () => {
    expect(decodeChar(bytesOf(0x3d, 0xd8), 0, "utf16le").kind).toBe(
      "incomplete",
    );
  });

  it("rejects utf-32 values outside unicode", () => {
    expect(decodeChar(bytesOf(0x00, 0x11, 0x00, 0x00), 0, "utf32be").kind)
      .toBe("invalid");
    expect(decodeChar(bytesOf(0x00, 0xd8, 0x00, 0x00), 0, "utf32le").kind)
      .toBe("invalid");
  });
});

describe("text encodings", () => {
  it("names every encoding", () => {
    expect(TEXT_ENCODINGS.map(encodingName)).toEqual([
      "Latin-1",
      "UTF-8",
      "UTF-16 (little endian)",
      "UTF-16 (big endian)",
      "UTF-32 (little endian)",
      "UTF-32 (big endian)",
    ]);
  });

  it("recognizes encoding identifiers", () => {
    expect(isTextEncoding("utf16be")).toBe(true);
    expect(isTextEncoding("ascii")).toBe(false);
  });
});
