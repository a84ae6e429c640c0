/**
 * Text encodings a stream can use for character operations.
 */
export type TextEncoding =
  | "latin1"
  | "utf8"
  | "utf16le"
  | "utf16be"
  | "utf32le"
  | "utf32be";

export const TEXT_ENCODINGS: readonly TextEncoding[] = [
  "latin1",
  "utf8",
  "utf16le",
  "utf16be",
  "utf32le",
  "utf32be",
];

/** The encoding whose bytes map 1:1 to the first 256 code points. */
export const IDENTITY_ENCODING: TextEncoding = "latin1";

const ENCODING_NAMES: Record<TextEncoding, string> = {
  latin1: "Latin-1",
  utf8: "UTF-8",
  utf16le: "UTF-16 (little endian)",
  utf16be: "UTF-16 (big endian)",
  utf32le: "UTF-32 (little endian)",
  utf32be: "UTF-32 (big endian)",
};

export function encodingName(encoding: TextEncoding): string {
  return ENCODING_NAMES[encoding];
}

export function isTextEncoding(value: unknown): value is TextEncoding {
  return TEXT_ENCODINGS.some((encoding) => encoding === value);
}
