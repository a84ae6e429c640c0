/**
 * Capability views of a file stream.
 *
 * The openers that know a stream's direction up front return one of these
 * narrowed interfaces, so calling a write on a read-only stream is a compile
 * error. {@link FileStream} implements all of them and checks at run time.
 */
import type { FileStreamResult } from "../errors/file_stream_error.ts";
import type { TextEncoding } from "../encoding/text_encoding.ts";
import type { Location } from "./location.ts";

export interface FileStreamBase {
  /** Active text encoding; `undefined` for raw streams. */
  readonly encoding: TextEncoding | undefined;
  readonly isRaw: boolean;
  readonly isClosed: boolean;

  /** Moves the cursor and returns the new absolute position. */
  position(location: Location): FileStreamResult<number>;

  /** Switches the encoding used by subsequent text operations. */
  setEncoding(encoding: TextEncoding): FileStreamResult<this>;

  /**
   * Writes pending data through to durable storage. Reports an error left
   * behind by an earlier delayed write.
   */
  sync(): FileStreamResult<void>;

  /**
   * Releases the device handle. Reports an error left behind by an earlier
   * delayed write; the handle is released either way.
   */
  close(): FileStreamResult<void>;
}

export interface ReadableFileStream extends FileStreamBase {
  /** Reads up to `byteCount` bytes; `EOF` only when none are left. */
  readBytes(byteCount: number): FileStreamResult<Uint8Array>;
  /** Reads exactly `byteCount` bytes or fails with `EOF`. */
  readBytesExact(byteCount: number): FileStreamResult<Uint8Array>;
  /** Reads everything up to the end of the file; never fails with `EOF`. */
  readRemainingBytes(): FileStreamResult<Uint8Array>;
  /** Runs `reader` `count` times and collects the results in order. */
  readList<T>(
    reader: (stream: this) => FileStreamResult<T>,
    count: number,
  ): FileStreamResult<T[]>;

  readInt8(): FileStreamResult<number>;
  readUint8(): FileStreamResult<number>;
  readInt16Le(): FileStreamResult<number>;
  readInt16Be(): FileStreamResult<number>;
  readUint16Le(): FileStreamResult<number>;
  readUint16Be(): FileStreamResult<number>;
  readInt32Le(): FileStreamResult<number>;
  readInt32Be(): FileStreamResult<number>;
  readUint32Le(): FileStreamResult<number>;
  readUint32Be(): FileStreamResult<number>;
  readInt64Le(): FileStreamResult<bigint>;
  readInt64Be(): FileStreamResult<bigint>;
  readUint64Le(): FileStreamResult<bigint>;
  readUint64Be(): FileStreamResult<bigint>;
  readFloat32Le(): FileStreamResult<number>;
  readFloat32Be(): FileStreamResult<number>;
  readFloat64Le(): FileStreamResult<number>;
  readFloat64Be(): FileStreamResult<number>;

  /** Reads up to and including the next `\n`; `\r\n` comes back as `\n`. */
  readLine(): FileStreamResult<string>;
  /** Reads up to `count` characters; each code point counts as one. */
  readChars(count: number): FileStreamResult<string>;
}

export interface WritableFileStream extends FileStreamBase {
  writeBytes(bytes: Uint8Array): FileStreamResult<void>;

  writeInt8(value: number): FileStreamResult<void>;
  writeUint8(value: number): FileStreamResult<void>;
  writeInt16Le(value: number): FileStreamResult<void>;
  writeInt16Be(value: number): FileStreamResult<void>;
  writeUint16Le(value: number): FileStreamResult<void>;
  writeUint16Be(value: number): FileStreamResult<void>;
  writeInt32Le(value: number): FileStreamResult<void>;
  writeInt32Be(value: number): FileStreamResult<void>;
  writeUint32Le(value: number): FileStreamResult<void>;
  writeUint32Be(value: number): FileStreamResult<void>;
  writeInt64Le(value: bigint): FileStreamResult<void>;
  writeInt64Be(value: bigint): FileStreamResult<void>;
  writeUint64Le(value: bigint): FileStreamResult<void>;
  writeUint64Be(value: bigint): FileStreamResult<void>;
  writeFloat32Le(value: number): FileStreamResult<void>;
  writeFloat32Be(value: number): FileStreamResult<void>;
  writeFloat64Le(value: number): FileStreamResult<void>;
  writeFloat64Be(value: number): FileStreamResult<void>;

  /** Encodes `text` in the active encoding and writes it. */
  writeChars(text: string): FileStreamResult<void>;
}

export type ReadWriteFileStream = ReadableFileStream & WritableFileStream;
