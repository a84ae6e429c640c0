/**
 * Interface of the operating-system file primitives a stream is built on.
 */
import type { Result } from "neverthrow";
import type { OsError } from "../errors/file_stream_error.ts";

/** Opaque reference to an open file owned by a device. */
export interface DeviceHandle {
  readonly fd: number;
}

/**
 * Flags a device opens a file with.
 *
 * - `write` without `read` or `append` truncates an existing file.
 * - `append` never truncates.
 * - `exclusive` fails with `EEXIST` when the file already exists.
 */
export interface DeviceOpenFlags {
  readonly read: boolean;
  readonly write: boolean;
  readonly append: boolean;
  readonly exclusive: boolean;
}

export interface DeviceStat {
  readonly isDirectory: boolean;
  readonly size: number;
}

/**
 * Positional file primitives. None of the operations has an implicit cursor:
 * streams track their own position and pass it on every call.
 */
export interface RawFileDevice {
  open(path: string, flags: DeviceOpenFlags): Result<DeviceHandle, OsError>;

  stat(path: string): Result<DeviceStat, OsError>;

  /**
   * Reads up to `maxBytes` starting at `position`. An empty result means
   * `position` is at or past the end of the file.
   */
  read(
    handle: DeviceHandle,
    position: number,
    maxBytes: number,
  ): Result<Uint8Array, OsError>;

  /** Writes `bytes` at `position` and returns how many were written. */
  write(
    handle: DeviceHandle,
    position: number,
    bytes: Uint8Array,
  ): Result<number, OsError>;

  sync(handle: DeviceHandle): Result<void, OsError>;

  close(handle: DeviceHandle): Result<void, OsError>;
}
