// Streams
export { FileStream, READ_REMAINING_CHUNK_SIZE } from "./streams/file_stream.ts";
export type { FileStreamInit } from "./streams/file_stream.ts";
export {
  open,
  openRead,
  openReadText,
  openWrite,
  openWriteText,
} from "./streams/open.ts";
export type { OpenOptions } from "./streams/open.ts";
export type {
  FileStreamBase,
  ReadableFileStream,
  ReadWriteFileStream,
  WritableFileStream,
} from "./streams/capabilities.ts";

// Open modes
export {
  DEFAULT_DELAYED_WRITE_DELAY_MS,
  DEFAULT_DELAYED_WRITE_SIZE,
  DEFAULT_READ_AHEAD_SIZE,
  FileOpenMode,
  resolveOpenMode,
} from "./streams/open_mode.ts";
export type {
  DelayedWriteConfig,
  ResolvedOpenMode,
} from "./streams/open_mode.ts";

// Positions
export {
  beginningOfFile,
  currentLocation,
  endOfFile,
  resolvePosition,
} from "./streams/location.ts";
export type { Location } from "./streams/location.ts";

// Devices
export { InMemoryFileDevice } from "./devices/in_memory_file_device.ts";
export type {
  DeviceOperation,
  InMemoryFileDeviceOptions,
} from "./devices/in_memory_file_device.ts";
export { NodeFileDevice, nodeFileDevice } from "./devices/node_file_device.ts";
export type {
  DeviceHandle,
  DeviceOpenFlags,
  DeviceStat,
  RawFileDevice,
} from "./devices/raw_file_device.ts";

// Encodings and codecs
export {
  encodingName,
  isTextEncoding,
  TEXT_ENCODINGS,
} from "./encoding/text_encoding.ts";
export type { TextEncoding } from "./encoding/text_encoding.ts";
export { decodeChar, encodeText } from "./encoding/text_codec.ts";
export type { DecodedChar } from "./encoding/text_codec.ts";
export {
  decodeBigInt,
  decodeNumber,
  encodeBigInt,
  encodeNumber,
} from "./binary/number_codec.ts";
export type {
  BigIntShape,
  Endianness,
  NumberShape,
} from "./binary/number_codec.ts";

// Errors
export {
  describe,
  FileStreamException,
  osErrorFromNodeError,
  POSIX_ERROR_CODES,
  unwrap,
} from "./errors/file_stream_error.ts";
export type {
  EndOfStreamError,
  FileStreamError,
  FileStreamResult,
  InvalidUnicodeError,
  NoTranslationError,
  OsError,
  PosixErrorCode,
} from "./errors/file_stream_error.ts";
