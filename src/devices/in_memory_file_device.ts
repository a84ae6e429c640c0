import { err, ok, type Result } from "neverthrow";
import {
  type OsError,
  osError,
  type PosixErrorCode,
} from "../errors/file_stream_error.ts";
import type {
  DeviceHandle,
  DeviceOpenFlags,
  DeviceStat,
  RawFileDevice,
} from "./raw_file_device.ts";

export type DeviceOperation =
  | "open"
  | "stat"
  | "read"
  | "write"
  | "sync"
  | "close";

/**
 * Options accepted by {@link InMemoryFileDevice}.
 */
export interface InMemoryFileDeviceOptions {
  /**
   * Largest size any file may grow to. Writes reaching past it are cut short
   * and a write starting at or past it fails with `ENOSPC`.
   */
  capacity?: number;
}

interface InMemoryFile {
  data: Uint8Array;
  length: number;
}

interface OpenHandle {
  readonly file: InMemoryFile;
  readonly readable: boolean;
  readonly writable: boolean;
}

/**
 * {@link RawFileDevice} that keeps files in memory.
 *
 * Key features:
 * - Positional reads and writes with zero-fill when writing past the end.
 * - Per-handle permissions: reading a write-only handle or writing a
 *   read-only handle fails with `EBADF`, as the OS reports it.
 * - Optional capacity to exercise short writes.
 * - One-shot fault injection per operation.
 *
 * @example
 * ```typescript
 * const device = new InMemoryFileDevice();
 * device.writeFile("/data.bin", new Uint8Array([1, 2, 3]));
 * const stream = unwrap(openRead("/data.bin", [], { device }));
 * ```
 */
export class InMemoryFileDevice implements RawFileDevice {
  #files = new Map<string, InMemoryFile>();
  #directories = new Set<string>();
  #handles = new Map<number, OpenHandle>();
  #faults = new Map<DeviceOperation, PosixErrorCode[]>();
  #nextFd = 3;
  #capacity: number | undefined;
  #calls: DeviceOperation[] = [];

  constructor(options?: InMemoryFileDeviceOptions) {
    this.#capacity = options?.capacity;
  }

  /** Creates or replaces a file with the given content. */
  public writeFile(path: string, content: Uint8Array): void {
    const data = content.slice();
    this.#files.set(path, { data, length: data.length });
  }

  /** Returns a copy of a file's content, or `undefined` when it is missing. */
  public readFile(path: string): Uint8Array | undefined {
    const file = this.#files.get(path);
    return file?.data.slice(0, file.length);
  }

  public mkdir(path: string): void {
    this.#directories.add(path);
  }

  /** Makes the next call of `operation` fail with `code`. */
  public injectFault(operation: DeviceOperation, code: PosixErrorCode): void {
    const queued = this.#faults.get(operation) ?? [];
    queued.push(code);
    this.#faults.set(operation, queued);
  }

  /** Number of handles opened and not yet closed. */
  public openHandleCount(): number {
    return this.#handles.size;
  }

  /** Every operation invoked on this device, in order. */
  public calls(): readonly DeviceOperation[] {
    return this.#calls;
  }

  public open(
    path: string,
    flags: DeviceOpenFlags,
  ): Result<DeviceHandle, OsError> {
    const fault = this.#takeFault("open");
    if (fault !== undefined) {
      return err(fault);
    }
    if (this.#directories.has(path)) {
      return err(osError("EISDIR"));
    }

    const writable = flags.write || flags.append;
    let file = this.#files.get(path);
    if (file === undefined) {
      if (!writable) {
        return err(osError("ENOENT"));
      }
      file = { data: new Uint8Array(0), length: 0 };
      this.#files.set(path, file);
    } else if (writable && flags.exclusive) {
      return err(osError("EEXIST"));
    } else if (flags.write && !flags.read && !flags.append) {
      file.length = 0;
    }

    const fd = this.#nextFd++;
    this.#handles.set(fd, {
      file,
      readable: flags.read,
      writable,
    });
    return ok({ fd });
  }

  public stat(path: string): Result<DeviceStat, OsError> {
    const fault = this.#takeFault("stat");
    if (fault !== undefined) {
      return err(fault);
    }
    if (this.#directories.has(path)) {
      return ok({ isDirectory: true, size: 0 });
    }
    const file = this.#files.get(path);
    if (file === undefined) {
      return err(osError("ENOENT"));
    }
    return ok({ isDirectory: false, size: file.length });
  }

  public read(
    handle: DeviceHandle,
    position: number,
    maxBytes: number,
  ): Result<Uint8Array, OsError> {
    const fault = this.#takeFault("read");
    if (fault !== undefined) {
      return err(fault);
    }
    const open = this.#handles.get(handle.fd);
    if (open === undefined || !open.readable) {
      return err(osError("EBADF"));
    }
    if (position < 0 || maxBytes < 0) {
      return err(osError("EINVAL"));
    }
    const { file } = open;
    const end = Math.min(file.length, position + maxBytes);
    if (position >= end) {
      return ok(new Uint8Array(0));
    }
    return ok(file.data.slice(position, end));
  }

  public write(
    handle: DeviceHandle,
    position: number,
    bytes: Uint8Array,
  ): Result<number, OsError> {
    const fault = this.#takeFault("write");
    if (fault !== undefined) {
      return err(fault);
    }
    const open = this.#handles.get(handle.fd);
    if (open === undefined || !open.writable) {
      return err(osError("EBADF"));
    }
    if (position < 0) {
      return err(osError("EINVAL"));
    }
    if (bytes.length === 0) {
      return ok(0);
    }

    let count = bytes.length;
    if (this.#capacity !== undefined) {
      count = Math.min(count, this.#capacity - position);
      if (count <= 0) {
        return err(osError("ENOSPC"));
      }
    }

    const { file } = open;
    const end = position + count;
    this.#ensureCapacity(file, end);
    if (position > file.length) {
      file.data.fill(0, file.length, position);
    }
    file.data.set(bytes.subarray(0, count), position);
    file.length = Math.max(file.length, end);
    return ok(count);
  }

  public sync(handle: DeviceHandle): Result<void, OsError> {
    const fault = this.#takeFault("sync");
    if (fault !== undefined) {
      return err(fault);
    }
    if (!this.#handles.has(handle.fd)) {
      return err(osError("EBADF"));
    }
    return ok(undefined);
  }

  public close(handle: DeviceHandle): Result<void, OsError> {
    const fault = this.#takeFault("close");
    if (fault !== undefined) {
      return err(fault);
    }
    if (!this.#handles.delete(handle.fd)) {
      return err(osError("EBADF"));
    }
    return ok(undefined);
  }

  #takeFault(operation: DeviceOperation): OsError | undefined {
    this.#calls.push(operation);
    const code = this.#faults.get(operation)?.shift();
    return code === undefined ? undefined : osError(code);
  }

  #ensureCapacity(file: InMemoryFile, size: number): void {
    if (file.data.length >= size) {
      return;
    }
    const grown = new Uint8Array(Math.max(size, file.data.length * 2));
    grown.set(file.data.subarray(0, file.length));
    file.data = grown;
  }
}
