/**
 * Open modes and their resolution into a validated stream configuration.
 */
import { err, ok } from "neverthrow";
import {
  type FileStreamResult,
  invalidArgument,
  notSupported,
} from "../errors/file_stream_error.ts";
import {
  IDENTITY_ENCODING,
  type TextEncoding,
} from "../encoding/text_encoding.ts";
import type { DeviceOpenFlags } from "../devices/raw_file_device.ts";

export const DEFAULT_READ_AHEAD_SIZE = 64 * 1024;
export const DEFAULT_DELAYED_WRITE_SIZE = 64 * 1024;
export const DEFAULT_DELAYED_WRITE_DELAY_MS = 2000;

export type FileOpenMode =
  | { readonly type: "read" }
  | { readonly type: "write" }
  | { readonly type: "append" }
  | { readonly type: "exclusive" }
  | { readonly type: "raw" }
  | { readonly type: "readAhead"; readonly size: number }
  | {
    readonly type: "delayedWrite";
    readonly size: number;
    readonly delayMs: number;
  }
  | { readonly type: "encoding"; readonly encoding: TextEncoding };

/**
 * Constructors for {@link FileOpenMode} values.
 *
 * - `read` / `write`: direction. Neither means read.
 * - `append`: every write lands at the end of the file. Implies write.
 * - `exclusive`: fail with `EEXIST` when the file exists. Implies write.
 * - `raw`: no text translation; character operations use UTF-8 only.
 * - `readAhead`: fetch at least `size` bytes per device read.
 * - `delayedWrite`: coalesce writes until `size` bytes are pending or the
 *   oldest is `delayMs` old.
 * - `encoding`: the text encoding for character operations.
 */
export const FileOpenMode = {
  read: { type: "read" },
  write: { type: "write" },
  append: { type: "append" },
  exclusive: { type: "exclusive" },
  raw: { type: "raw" },
  readAhead(size: number = DEFAULT_READ_AHEAD_SIZE): FileOpenMode {
    return { type: "readAhead", size };
  },
  delayedWrite(
    size: number = DEFAULT_DELAYED_WRITE_SIZE,
    delayMs: number = DEFAULT_DELAYED_WRITE_DELAY_MS,
  ): FileOpenMode {
    return { type: "delayedWrite", size, delayMs };
  },
  encoding(encoding: TextEncoding): FileOpenMode {
    return { type: "encoding", encoding };
  },
} as const satisfies Record<
  string,
  FileOpenMode | ((...args: never[]) => FileOpenMode)
>;

export interface DelayedWriteConfig {
  readonly size: number;
  readonly delayMs: number;
}

/**
 * A validated stream configuration. `encoding` is `undefined` exactly when
 * the stream is raw.
 */
export interface ResolvedOpenMode {
  readonly readable: boolean;
  readonly writable: boolean;
  readonly append: boolean;
  readonly exclusive: boolean;
  readonly raw: boolean;
  readonly encoding: TextEncoding | undefined;
  readonly readAheadSize: number | undefined;
  readonly delayedWrite: DelayedWriteConfig | undefined;
}

function isPositiveInteger(value: number): boolean {
  return Number.isInteger(value) && value > 0;
}

/**
 * Turns a list of open modes into a {@link ResolvedOpenMode}, rejecting
 * combinations that cannot be honoured. Nothing here touches a device.
 */
export function resolveOpenMode(
  modes: readonly FileOpenMode[],
): FileStreamResult<ResolvedOpenMode> {
  let read = false;
  let write = false;
  let append = false;
  let exclusive = false;
  let raw = false;
  let encoding: TextEncoding | undefined;
  let readAheadSize: number | undefined;
  let delayedWrite: DelayedWriteConfig | undefined;

  for (const mode of modes) {
    switch (mode.type) {
      case "read":
        read = true;
        break;
      case "write":
        write = true;
        break;
      case "append":
        append = true;
        break;
      case "exclusive":
        exclusive = true;
        break;
      case "raw":
        raw = true;
        break;
      case "readAhead":
        if (!isPositiveInteger(mode.size)) {
          return err(invalidArgument());
        }
        readAheadSize = mode.size;
        break;
      case "delayedWrite":
        if (
          !isPositiveInteger(mode.size) ||
          !Number.isFinite(mode.delayMs) || mode.delayMs < 0
        ) {
          return err(invalidArgument());
        }
        delayedWrite = { size: mode.size, delayMs: mode.delayMs };
        break;
      case "encoding":
        if (encoding !== undefined && encoding !== mode.encoding) {
          return err(invalidArgument());
        }
        encoding = mode.encoding;
        break;
    }
  }

  if (raw && encoding !== undefined) {
    return err(notSupported());
  }

  write ||= append || exclusive;
  if (!read && !write) {
    read = true;
  }

  return ok({
    readable: read,
    writable: write,
    append,
    exclusive,
    raw,
    encoding: raw ? undefined : encoding ?? IDENTITY_ENCODING,
    readAheadSize,
    delayedWrite,
  });
}

export function deviceOpenFlags(mode: ResolvedOpenMode): DeviceOpenFlags {
  return {
    read: mode.readable,
    write: mode.writable,
    append: mode.append,
    exclusive: mode.exclusive,
  };
}

/** Whether opening with `mode` empties an existing file. */
export function truncatesOnOpen(mode: ResolvedOpenMode): boolean {
  return mode.writable && !mode.readable && !mode.append;
}
