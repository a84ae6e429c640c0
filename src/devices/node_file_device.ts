import {
  closeSync,
  existsSync,
  fsyncSync,
  openSync,
  readSync,
  statSync,
  writeSync,
} from "node:fs";
import { err, ok, type Result } from "neverthrow";
import {
  type OsError,
  osErrorFromNodeError,
} from "../errors/file_stream_error.ts";
import type {
  DeviceHandle,
  DeviceOpenFlags,
  DeviceStat,
  RawFileDevice,
} from "./raw_file_device.ts";

// Cap on one read's buffer; larger requests return short.
const MAX_READ_SIZE = 16 * 1024 * 1024;

/**
 * Returns the `fs.open` flag string for a set of device flags.
 */
export function nodeOpenFlags(
  flags: DeviceOpenFlags,
  fileExists: boolean,
): string {
  const exclusive = flags.exclusive ? "x" : "";
  if (flags.append) {
    return flags.read ? `a${exclusive}+` : `a${exclusive}`;
  }
  if (flags.write) {
    if (flags.read) {
      if (fileExists && !flags.exclusive) {
        return "r+";
      }
      return `w${exclusive}+`;
    }
    return `w${exclusive}`;
  }
  return "r";
}

function attempt<T>(operation: () => T): Result<T, OsError> {
  try {
    return ok(operation());
  } catch (error) {
    return err(osErrorFromNodeError(error));
  }
}

/**
 * {@link RawFileDevice} backed by the synchronous `node:fs` primitives.
 * Thrown errors are converted to {@link OsError} values by their `code`.
 */
export class NodeFileDevice implements RawFileDevice {
  public open(
    path: string,
    flags: DeviceOpenFlags,
  ): Result<DeviceHandle, OsError> {
    return attempt(() => {
      const mode = nodeOpenFlags(flags, existsSync(path));
      return { fd: openSync(path, mode) };
    });
  }

  public stat(path: string): Result<DeviceStat, OsError> {
    return attempt(() => {
      const stats = statSync(path);
      return { isDirectory: stats.isDirectory(), size: stats.size };
    });
  }

  public read(
    handle: DeviceHandle,
    position: number,
    maxBytes: number,
  ): Result<Uint8Array, OsError> {
    return attempt(() => {
      const buffer = new Uint8Array(Math.min(maxBytes, MAX_READ_SIZE));
      const bytesRead = readSync(handle.fd, buffer, 0, buffer.length, position);
      return bytesRead < buffer.length ? buffer.slice(0, bytesRead) : buffer;
    });
  }

  public write(
    handle: DeviceHandle,
    position: number,
    bytes: Uint8Array,
  ): Result<number, OsError> {
    return attempt(() =>
      writeSync(handle.fd, bytes, 0, bytes.length, position)
    );
  }

  public sync(handle: DeviceHandle): Result<void, OsError> {
    return attempt(() => fsyncSync(handle.fd));
  }

  public close(handle: DeviceHandle): Result<void, OsError> {
    return attempt(() => closeSync(handle.fd));
  }
}

/** Shared device used when no other is configured. */
export const nodeFileDevice: RawFileDevice = new NodeFileDevice();
