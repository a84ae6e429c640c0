import { err, ok, type Result } from "neverthrow";
import {
  eof,
  type FileStreamError,
  type FileStreamResult,
  invalidArgument,
  invalidUnicode,
  notSupported,
  type OsError,
  osError,
} from "../errors/file_stream_error.ts";
import {
  IDENTITY_ENCODING,
  type TextEncoding,
} from "../encoding/text_encoding.ts";
import {
  decodeChar,
  encodeText,
  MAX_ENCODED_CHAR_BYTES,
} from "../encoding/text_codec.ts";
import {
  type BigIntShape,
  decodeBigInt,
  decodeNumber,
  encodeBigInt,
  encodeNumber,
  type Endianness,
  type NumberShape,
  SHAPE_BYTE_SIZES,
} from "../binary/number_codec.ts";
import type {
  DeviceHandle,
  RawFileDevice,
} from "../devices/raw_file_device.ts";
import type { ReadWriteFileStream } from "./capabilities.ts";
import { DelayedWriteBuffer } from "./delayed_write_buffer.ts";
import { type Location, resolvePosition } from "./location.ts";
import type { ResolvedOpenMode } from "./open_mode.ts";
import { ReadAheadBuffer } from "./read_ahead_buffer.ts";

/** Chunk size used by {@link FileStream.readRemainingBytes}. */
export const READ_REMAINING_CHUNK_SIZE = 64 * 1024;

// Character decoding peeks a few bytes at a time; this keeps those peeks
// from each reaching the device.
const TEXT_READ_WINDOW = 256;

/**
 * Everything a {@link FileStream} takes ownership of when it is created.
 */
export interface FileStreamInit {
  device: RawFileDevice;
  handle: DeviceHandle;
  mode: ResolvedOpenMode;
  /** Size of the file right after it was opened. */
  size: number;
  /** Millisecond clock for delayed writes. Defaults to `Date.now`. */
  clock?: () => number;
}

function concatBytes(chunks: readonly Uint8Array[], total: number): Uint8Array {
  if (chunks.length === 1) {
    return chunks[0];
  }
  const out = new Uint8Array(total);
  let offset = 0;
  for (const chunk of chunks) {
    out.set(chunk, offset);
    offset += chunk.length;
  }
  return out;
}

function widen<T>(result: Result<T, OsError>): FileStreamResult<T> {
  return result.mapErr((error): FileStreamError => error);
}

/**
 * A single-owner cursor over one open file.
 *
 * Every operation returns a `Result` and never throws. Operations the stream
 * was not opened for fail with `ENOTSUP`, and every operation after
 * {@link close} fails with `EBADF`. Use the openers in `open.ts` to get
 * capability-narrowed views of a stream.
 *
 * @example
 * ```typescript
 * const stream = unwrap(open("data.bin", [FileOpenMode.read]));
 * const magic = stream.readUint32Be();
 * stream.close();
 * ```
 */
export class FileStream implements ReadWriteFileStream {
  #device: RawFileDevice;
  #handle: DeviceHandle | undefined;
  #mode: ResolvedOpenMode;
  #encoding: TextEncoding | undefined;
  #position = 0;
  #size: number;
  #readAhead: ReadAheadBuffer;
  #delayedWrite: DelayedWriteBuffer | undefined;
  #pendingError: FileStreamError | undefined;

  constructor(init: FileStreamInit) {
    this.#device = init.device;
    this.#handle = init.handle;
    this.#mode = init.mode;
    this.#encoding = init.mode.encoding;
    this.#size = init.size;
    this.#readAhead = new ReadAheadBuffer(
      (position, maxBytes) => this.#deviceRead(position, maxBytes),
      init.mode.readAheadSize ?? 0,
    );
    if (init.mode.delayedWrite !== undefined) {
      this.#delayedWrite = new DelayedWriteBuffer(
        init.mode.delayedWrite,
        init.clock ?? Date.now,
      );
    }
  }

  public get encoding(): TextEncoding | undefined {
    return this.#encoding;
  }

  public get isRaw(): boolean {
    return this.#mode.raw;
  }

  public get isClosed(): boolean {
    return this.#handle === undefined;
  }

  public get isReadable(): boolean {
    return this.#mode.readable;
  }

  public get isWritable(): boolean {
    return this.#mode.writable;
  }

  public position(location: Location): FileStreamResult<number> {
    const handle = this.#checkOpen();
    if (handle.isErr()) {
      return err(handle.error);
    }
    return resolvePosition(location, this.#position, this.#size).map(
      (target) => {
        this.#position = target;
        return target;
      },
    );
  }

  public readBytes(byteCount: number): FileStreamResult<Uint8Array> {
    const ready = this.#checkBinary(this.#checkReadable());
    if (ready.isErr()) {
      return err(ready.error);
    }
    if (!Number.isSafeInteger(byteCount) || byteCount < 0) {
      return err(invalidArgument());
    }
    if (byteCount === 0) {
      return ok(new Uint8Array(0));
    }

    const peeked = this.#peek(byteCount, 0);
    if (peeked.isErr()) {
      return peeked;
    }
    if (peeked.value.length === 0) {
      return err(eof());
    }
    this.#position += peeked.value.length;
    return peeked;
  }

  public readBytesExact(byteCount: number): FileStreamResult<Uint8Array> {
    return this.readBytes(byteCount).andThen((bytes) =>
      bytes.length === byteCount ? ok(bytes) : err(eof())
    );
  }

  public readRemainingBytes(): FileStreamResult<Uint8Array> {
    const chunks: Uint8Array[] = [];
    let total = 0;
    for (;;) {
      const chunk = this.readBytes(READ_REMAINING_CHUNK_SIZE);
      if (chunk.isErr()) {
        if (chunk.error.code === "EOF") {
          break;
        }
        return chunk;
      }
      chunks.push(chunk.value);
      total += chunk.value.length;
    }

    return ok(concatBytes(chunks, total));
  }

  public readList<T>(
    reader: (stream: this) => FileStreamResult<T>,
    count: number,
  ): FileStreamResult<T[]> {
    if (!Number.isSafeInteger(count) || count < 0) {
      return err(invalidArgument());
    }
    const items: T[] = [];
    for (let i = 0; i < count; i++) {
      const item = reader(this);
      if (item.isErr()) {
        return err(item.error);
      }
      items.push(item.value);
    }
    return ok(items);
  }

  /**
   * Writes all of `bytes`. In append mode they land at the end of the file
   * and the cursor does not move. A short write fails with `ENOSPC`.
   */
  public writeBytes(bytes: Uint8Array): FileStreamResult<void> {
    const ready = this.#checkBinary(this.#checkWritable());
    if (ready.isErr()) {
      return err(ready.error);
    }
    return this.#write(ready.value, bytes);
  }

  public readInt8(): FileStreamResult<number> {
    return this.#readNumber("int8", "little");
  }

  public readUint8(): FileStreamResult<number> {
    return this.#readNumber("uint8", "little");
  }

  public readInt16Le(): FileStreamResult<number> {
    return this.#readNumber("int16", "little");
  }

  public readInt16Be(): FileStreamResult<number> {
    return this.#readNumber("int16", "big");
  }

  public readUint16Le(): FileStreamResult<number> {
    return this.#readNumber("uint16", "little");
  }

  public readUint16Be(): FileStreamResult<number> {
    return this.#readNumber("uint16", "big");
  }

  public readInt32Le(): FileStreamResult<number> {
    return this.#readNumber("int32", "little");
  }

  public readInt32Be(): FileStreamResult<number> {
    return this.#readNumber("int32", "big");
  }

  public readUint32Le(): FileStreamResult<number> {
    return this.#readNumber("uint32", "little");
  }

  public readUint32Be(): FileStreamResult<number> {
    return this.#readNumber("uint32", "big");
  }

  public readInt64Le(): FileStreamResult<bigint> {
    return this.#readBigInt("int64", "little");
  }

  public readInt64Be(): FileStreamResult<bigint> {
    return this.#readBigInt("int64", "big");
  }

  public readUint64Le(): FileStreamResult<bigint> {
    return this.#readBigInt("uint64", "little");
  }

  public readUint64Be(): FileStreamResult<bigint> {
    return this.#readBigInt("uint64", "big");
  }

  public readFloat32Le(): FileStreamResult<number> {
    return this.#readNumber("float32", "little");
  }

  public readFloat32Be(): FileStreamResult<number> {
    return this.#readNumber("float32", "big");
  }

  public readFloat64Le(): FileStreamResult<number> {
    return this.#readNumber("float64", "little");
  }

  public readFloat64Be(): FileStreamResult<number> {
    return this.#readNumber("float64", "big");
  }

  public writeInt8(value: number): FileStreamResult<void> {
    return this.#writeNumber(value, "int8", "little");
  }

  public writeUint8(value: number): FileStreamResult<void> {
    return this.#writeNumber(value, "uint8", "little");
  }

  public writeInt16Le(value: number): FileStreamResult<void> {
    return this.#writeNumber(value, "int16", "little");
  }

  public writeInt16Be(value: number): FileStreamResult<void> {
    return this.#writeNumber(value, "int16", "big");
  }

  public writeUint16Le(value: number): FileStreamResult<void> {
    return this.#writeNumber(value, "uint16", "little");
  }

  public writeUint16Be(value: number): FileStreamResult<void> {
    return this.#writeNumber(value, "uint16", "big");
  }

  public writeInt32Le(value: number): FileStreamResult<void> {
    return this.#writeNumber(value, "int32", "little");
  }

  public writeInt32Be(value: number): FileStreamResult<void> {
    return this.#writeNumber(value, "int32", "big");
  }

  public writeUint32Le(value: number): FileStreamResult<void> {
    return this.#writeNumber(value, "uint32", "little");
  }

  public writeUint32Be(value: number): FileStreamResult<void> {
    return this.#writeNumber(value, "uint32", "big");
  }

  public writeInt64Le(value: bigint): FileStreamResult<void> {
    return this.#writeBigInt(value, "int64", "little");
  }

  public writeInt64Be(value: bigint): FileStreamResult<void> {
    return this.#writeBigInt(value, "int64", "big");
  }

  public writeUint64Le(value: bigint): FileStreamResult<void> {
    return this.#writeBigInt(value, "uint64", "little");
  }

  public writeUint64Be(value: bigint): FileStreamResult<void> {
    return this.#writeBigInt(value, "uint64", "big");
  }

  public writeFloat32Le(value: number): FileStreamResult<void> {
    return this.#writeNumber(value, "float32", "little");
  }

  public writeFloat32Be(value: number): FileStreamResult<void> {
    return this.#writeNumber(value, "float32", "big");
  }

  public writeFloat64Le(value: number): FileStreamResult<void> {
    return this.#writeNumber(value, "float64", "little");
  }

  public writeFloat64Be(value: number): FileStreamResult<void> {
    return this.#writeNumber(value, "float64", "big");
  }

  public readLine(): FileStreamResult<string> {
    const ready = this.#checkReadable();
    if (ready.isErr()) {
      return err(ready.error);
    }

    const start = this.#position;
    let line = "";
    for (;;) {
      const char = this.#readChar();
      if (char.isErr()) {
        if (char.error.code === "EOF" && line.length > 0) {
          return ok(line);
        }
        this.#position = start;
        return char;
      }
      if (char.value === "\n") {
        return ok(line.endsWith("\r") ? `${line.slice(0, -1)}\n` : `${line}\n`);
      }
      line += char.value;
    }
  }

  public readChars(count: number): FileStreamResult<string> {
    const ready = this.#checkReadable();
    if (ready.isErr()) {
      return err(ready.error);
    }
    if (this.#mode.raw) {
      return err(notSupported());
    }
    if (!Number.isSafeInteger(count) || count < 0) {
      return err(invalidArgument());
    }

    const start = this.#position;
    let text = "";
    for (let i = 0; i < count; i++) {
      const char = this.#readChar();
      if (char.isErr()) {
        if (char.error.code === "EOF" && i > 0) {
          break;
        }
        this.#position = start;
        return char;
      }
      text += char.value;
    }
    return ok(text);
  }

  /**
   * Encodes and writes `text`. When a character cannot be represented in
   * the active encoding the call fails with `NO_TRANSLATION` and nothing is
   * written.
   */
  public writeChars(text: string): FileStreamResult<void> {
    const ready = this.#checkWritable();
    if (ready.isErr()) {
      return err(ready.error);
    }
    return encodeText(text, this.#textEncoding()).andThen((bytes) =>
      this.#write(ready.value, bytes)
    );
  }

  public setEncoding(encoding: TextEncoding): FileStreamResult<this> {
    const handle = this.#checkOpen();
    if (handle.isErr()) {
      return err(handle.error);
    }
    if (this.#mode.raw) {
      return err(notSupported());
    }
    this.#encoding = encoding;
    return ok(this);
  }

  public sync(): FileStreamResult<void> {
    const handle = this.#checkOpen();
    if (handle.isErr()) {
      return err(handle.error);
    }
    const flushed = this.#flushDelayedWrite(handle.value);
    const deferred = this.#takePendingError();
    if (deferred !== undefined) {
      return err(deferred);
    }
    if (flushed.isErr()) {
      return flushed;
    }
    return widen(this.#device.sync(handle.value));
  }

  public close(): FileStreamResult<void> {
    const handle = this.#checkOpen();
    if (handle.isErr()) {
      return err(handle.error);
    }
    const flushed = this.#flushDelayedWrite(handle.value);
    const deferred = this.#takePendingError();
    const closed = this.#device.close(handle.value);
    this.#handle = undefined;
    this.#readAhead.invalidate();

    if (deferred !== undefined) {
      return err(deferred);
    }
    if (flushed.isErr()) {
      return flushed;
    }
    return widen(closed);
  }

  #checkOpen(): FileStreamResult<DeviceHandle> {
    return this.#handle === undefined ? err(osError("EBADF")) : ok(this.#handle);
  }

  #checkReadable(): FileStreamResult<DeviceHandle> {
    return this.#checkOpen().andThen((handle) =>
      this.#mode.readable ? ok(handle) : err(notSupported())
    );
  }

  #checkWritable(): FileStreamResult<DeviceHandle> {
    return this.#checkOpen().andThen((handle) =>
      this.#mode.writable ? ok(handle) : err(notSupported())
    );
  }

  /**
   * Binary operations pass bytes through untouched, so they need a raw
   * stream or the identity encoding.
   */
  #checkBinary(
    checked: FileStreamResult<DeviceHandle>,
  ): FileStreamResult<DeviceHandle> {
    return checked.andThen((handle) =>
      this.#mode.raw || this.#encoding === IDENTITY_ENCODING
        ? ok(handle)
        : err(notSupported())
    );
  }

  #textEncoding(): TextEncoding {
    return this.#encoding ?? "utf8";
  }

  #deviceRead(position: number, maxBytes: number): Result<Uint8Array, OsError> {
    if (this.#handle === undefined) {
      return err(osError("EBADF"));
    }
    return this.#device.read(this.#handle, position, maxBytes);
  }

  /**
   * Returns up to `maxBytes` at the cursor without moving it, reading until
   * the count is met or the file ends.
   */
  #peek(maxBytes: number, minimumWindow: number): FileStreamResult<Uint8Array> {
    this.#flushBeforeRead();

    const chunks: Uint8Array[] = [];
    let filled = 0;
    while (filled < maxBytes) {
      const chunk = this.#readAhead.read(
        this.#position + filled,
        maxBytes - filled,
        minimumWindow,
      );
      if (chunk.isErr()) {
        return err(chunk.error);
      }
      if (chunk.value.length === 0) {
        break;
      }
      chunks.push(chunk.value);
      filled += chunk.value.length;
    }
    return ok(concatBytes(chunks, filled));
  }

  #readChar(): FileStreamResult<string> {
    const peeked = this.#peek(MAX_ENCODED_CHAR_BYTES, TEXT_READ_WINDOW);
    if (peeked.isErr()) {
      return err(peeked.error);
    }
    if (peeked.value.length === 0) {
      return err(eof());
    }
    const char = decodeChar(peeked.value, 0, this.#textEncoding());
    // Every character fits in the peeked bytes, so a truncated one can
    // only mean the file ends mid-character.
    if (char.kind !== "char") {
      return err(invalidUnicode());
    }
    this.#position += char.byteLength;
    return ok(char.text);
  }

  #readNumber(
    shape: NumberShape,
    endianness: Endianness,
  ): FileStreamResult<number> {
    return this.readBytesExact(SHAPE_BYTE_SIZES[shape]).map((bytes) =>
      decodeNumber(bytes, shape, endianness)
    );
  }

  #readBigInt(
    shape: BigIntShape,
    endianness: Endianness,
  ): FileStreamResult<bigint> {
    return this.readBytesExact(SHAPE_BYTE_SIZES[shape]).map((bytes) =>
      decodeBigInt(bytes, shape, endianness)
    );
  }

  #writeNumber(
    value: number,
    shape: NumberShape,
    endianness: Endianness,
  ): FileStreamResult<void> {
    const ready = this.#checkBinary(this.#checkWritable());
    if (ready.isErr()) {
      return err(ready.error);
    }
    return encodeNumber(value, shape, endianness).andThen((bytes) =>
      this.#write(ready.value, bytes)
    );
  }

  #writeBigInt(
    value: bigint,
    shape: BigIntShape,
    endianness: Endianness,
  ): FileStreamResult<void> {
    const ready = this.#checkBinary(this.#checkWritable());
    if (ready.isErr()) {
      return err(ready.error);
    }
    return encodeBigInt(value, shape, endianness).andThen((bytes) =>
      this.#write(ready.value, bytes)
    );
  }

  #write(handle: DeviceHandle, bytes: Uint8Array): FileStreamResult<void> {
    if (bytes.length === 0) {
      return ok(undefined);
    }
    this.#readAhead.invalidate();
    const target = this.#mode.append ? this.#size : this.#position;

    if (this.#delayedWrite !== undefined) {
      return this.#writeDelayed(handle, this.#delayedWrite, target, bytes);
    }

    const written = this.#device.write(handle, target, bytes);
    if (written.isErr()) {
      return err(written.error);
    }
    this.#advance(target, written.value);
    if (written.value !== bytes.length) {
      return err(osError("ENOSPC"));
    }
    return ok(undefined);
  }

  #writeDelayed(
    handle: DeviceHandle,
    buffer: DelayedWriteBuffer,
    target: number,
    bytes: Uint8Array,
  ): FileStreamResult<void> {
    if (!buffer.isContiguous(target)) {
      this.#deferError(this.#flushDelayedWrite(handle));
    }
    buffer.append(target, bytes);
    this.#advance(target, bytes.length);
    if (buffer.shouldFlush()) {
      this.#deferError(this.#flushDelayedWrite(handle));
    }
    return ok(undefined);
  }

  #advance(target: number, byteCount: number): void {
    const end = target + byteCount;
    if (!this.#mode.append) {
      this.#position = end;
    }
    if (end > this.#size) {
      this.#size = end;
    }
  }

  #flushDelayedWrite(handle: DeviceHandle): FileStreamResult<void> {
    const pending = this.#delayedWrite?.take();
    if (pending === undefined) {
      return ok(undefined);
    }
    const written = this.#device.write(handle, pending.position, pending.bytes);
    if (written.isErr()) {
      return err(written.error);
    }
    if (written.value !== pending.bytes.length) {
      return err(osError("ENOSPC"));
    }
    return ok(undefined);
  }

  /** Reads must observe delayed writes, so pending bytes go out first. */
  #flushBeforeRead(): void {
    if (this.#handle === undefined || this.#delayedWrite === undefined) {
      return;
    }
    this.#deferError(this.#flushDelayedWrite(this.#handle));
  }

  #deferError(result: FileStreamResult<void>): void {
    if (result.isErr() && this.#pendingError === undefined) {
      this.#pendingError = result.error;
    }
  }

  #takePendingError(): FileStreamError | undefined {
    const error = this.#pendingError;
    this.#pendingError = undefined;
    return error;
  }
}
