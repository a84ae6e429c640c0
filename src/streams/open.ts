import { err, ok } from "neverthrow";
import {
  type FileStreamResult,
  osError,
} from "../errors/file_stream_error.ts";
import type { TextEncoding } from "../encoding/text_encoding.ts";
import { nodeFileDevice } from "../devices/node_file_device.ts";
import type { RawFileDevice } from "../devices/raw_file_device.ts";
import type {
  ReadableFileStream,
  WritableFileStream,
} from "./capabilities.ts";
import { FileStream } from "./file_stream.ts";
import {
  deviceOpenFlags,
  FileOpenMode,
  type ResolvedOpenMode,
  resolveOpenMode,
  truncatesOnOpen,
} from "./open_mode.ts";

/**
 * Options shared by every opener.
 */
export interface OpenOptions {
  /** Device the stream talks to. Defaults to the local file system. */
  device?: RawFileDevice;
  /** Millisecond clock driving delayed writes. Defaults to `Date.now`. */
  clock?: () => number;
}

/**
 * Opens `path` with the given modes. Mode validation happens before the
 * device is touched, so a rejected combination never opens a file.
 *
 * @example
 * ```typescript
 * const stream = unwrap(
 *   open("log.txt", [FileOpenMode.append, FileOpenMode.encoding("utf8")]),
 * );
 * unwrap(stream.writeChars("started\n"));
 * unwrap(stream.close());
 * ```
 */
export function open(
  path: string,
  modes: readonly FileOpenMode[],
  options: OpenOptions = {},
): FileStreamResult<FileStream> {
  return resolveOpenMode(modes).andThen((mode) =>
    openResolved(path, mode, options)
  );
}

function openResolved(
  path: string,
  mode: ResolvedOpenMode,
  options: OpenOptions,
): FileStreamResult<FileStream> {
  const device = options.device ?? nodeFileDevice;

  // A missing file is fine here; the open decides whether that is an error.
  const stat = device.stat(path);
  if (stat.isErr() && stat.error.code !== "ENOENT") {
    return err(stat.error);
  }
  const existing = stat.isOk() ? stat.value : undefined;
  if (existing?.isDirectory) {
    return err(osError("EISDIR"));
  }

  return device.open(path, deviceOpenFlags(mode)).andThen((
    handle,
  ): FileStreamResult<FileStream> =>
    ok(
      new FileStream({
        device,
        handle,
        mode,
        size: truncatesOnOpen(mode) ? 0 : existing?.size ?? 0,
        clock: options.clock,
      }),
    )
  );
}

/** Opens `path` for binary reading. */
export function openRead(
  path: string,
  modes: readonly FileOpenMode[] = [],
  options?: OpenOptions,
): FileStreamResult<ReadableFileStream> {
  return open(path, [FileOpenMode.read, ...modes], options).map(
    (stream): ReadableFileStream => stream,
  );
}

/** Opens `path` for binary writing, truncating an existing file. */
export function openWrite(
  path: string,
  modes: readonly FileOpenMode[] = [],
  options?: OpenOptions,
): FileStreamResult<WritableFileStream> {
  return open(path, [FileOpenMode.write, ...modes], options).map(
    (stream): WritableFileStream => stream,
  );
}

export function openReadText(
  path: string,
  encoding: TextEncoding,
  modes: readonly FileOpenMode[] = [],
  options?: OpenOptions,
): FileStreamResult<ReadableFileStream> {
  return openRead(path, [FileOpenMode.encoding(encoding), ...modes], options);
}

export function openWriteText(
  path: string,
  encoding: TextEncoding,
  modes: readonly FileOpenMode[] = [],
  options?: OpenOptions,
): FileStreamResult<WritableFileStream> {
  return openWrite(path, [FileOpenMode.encoding(encoding), ...modes], options);
}
