/**
 * Error values shared by every layer of the file stream library.
 *
 * Errors are plain readonly objects discriminated by `code` so callers can
 * switch on them exhaustively. They travel inside neverthrow `Result`s and are
 * never thrown by the library itself.
 */
import type { Result } from "neverthrow";
import type { TextEncoding } from "../encoding/text_encoding.ts";

/**
 * POSIX conditions the operating system can report for file operations.
 */
export const POSIX_ERROR_CODES = [
  "EACCES",
  "EAGAIN",
  "EBADF",
  "EBADMSG",
  "EBUSY",
  "EDEADLK",
  "EDEADLOCK",
  "EDQUOT",
  "EEXIST",
  "EFAULT",
  "EFBIG",
  "EFTYPE",
  "EINTR",
  "EINVAL",
  "EIO",
  "EISDIR",
  "ELOOP",
  "EMFILE",
  "EMLINK",
  "EMULTIHOP",
  "ENAMETOOLONG",
  "ENFILE",
  "ENOBUFS",
  "ENODEV",
  "ENOLCK",
  "ENOLINK",
  "ENOENT",
  "ENOMEM",
  "ENOSPC",
  "ENOSR",
  "ENOSTR",
  "ENOSYS",
  "ENOTBLK",
  "ENOTDIR",
  "ENOTSUP",
  "ENXIO",
  "EOPNOTSUPP",
  "EOVERFLOW",
  "EPERM",
  "EPIPE",
  "ERANGE",
  "EROFS",
  "ESPIPE",
  "ESRCH",
  "ESTALE",
  "ETXTBSY",
  "EXDEV",
] as const;

export type PosixErrorCode = typeof POSIX_ERROR_CODES[number];

/** An error reported by the operating system (or a device standing in for it). */
export interface OsError {
  readonly code: PosixErrorCode;
}

/** No more data could be read to satisfy the call. */
export interface EndOfStreamError {
  readonly code: "EOF";
}

/**
 * Characters could not be represented in the target encoding. `from` is
 * `"unicode"` when the source is a host string.
 */
export interface NoTranslationError {
  readonly code: "NO_TRANSLATION";
  readonly from: TextEncoding | "unicode";
  readonly to: TextEncoding;
}

/** Bytes read from the file are not valid under the active encoding. */
export interface InvalidUnicodeError {
  readonly code: "INVALID_UNICODE";
}

export type FileStreamError =
  | OsError
  | EndOfStreamError
  | NoTranslationError
  | InvalidUnicodeError;

export type FileStreamResult<T> = Result<T, FileStreamError>;

const POSIX_CODE_SET: ReadonlySet<string> = new Set(POSIX_ERROR_CODES);

export function isPosixErrorCode(code: unknown): code is PosixErrorCode {
  return typeof code === "string" && POSIX_CODE_SET.has(code);
}

export function osError(code: PosixErrorCode): OsError {
  return { code };
}

export function eof(): EndOfStreamError {
  return { code: "EOF" };
}

/** The call is structurally disallowed given how the stream was opened. */
export function notSupported(): OsError {
  return { code: "ENOTSUP" };
}

export function invalidArgument(): OsError {
  return { code: "EINVAL" };
}

export function noTranslation(
  from: TextEncoding | "unicode",
  to: TextEncoding,
): NoTranslationError {
  return { code: "NO_TRANSLATION", from, to };
}

export function invalidUnicode(): InvalidUnicodeError {
  return { code: "INVALID_UNICODE" };
}

/**
 * Converts an error thrown by `node:fs` into an {@link OsError}. Codes the
 * library does not know are reported as `EIO`.
 */
export function osErrorFromNodeError(error: unknown): OsError {
  if (typeof error === "object" && error !== null && "code" in error) {
    const { code } = error;
    if (isPosixErrorCode(code)) {
      return osError(code);
    }
  }
  return osError("EIO");
}

const POSIX_DESCRIPTIONS: Record<PosixErrorCode, string> = {
  EACCES: "Permission denied",
  EAGAIN: "Resource temporarily unavailable",
  EBADF: "Bad file number",
  EBADMSG: "Not a data message",
  EBUSY: "File busy",
  EDEADLK: "Resource deadlock avoided",
  EDEADLOCK: "File locking deadlock error",
  EDQUOT: "Disk quota exceeded",
  EEXIST: "File already exists",
  EFAULT: "Bad address in system call argument",
  EFBIG: "File too large",
  EFTYPE: "Inappropriate file type or format",
  EINTR: "Interrupted system call",
  EINVAL: "Invalid argument",
  EIO: "I/O error",
  EISDIR: "Illegal operation on a directory",
  ELOOP: "Too many levels of symbolic links",
  EMFILE: "Too many open files",
  EMLINK: "Too many links",
  EMULTIHOP: "Multihop attempted",
  ENAMETOOLONG: "Filename too long",
  ENFILE: "File table overflow",
  ENOBUFS: "No buffer space available",
  ENODEV: "No such device",
  ENOLCK: "No locks available",
  ENOLINK: "Link has been severed",
  ENOENT: "No such file or directory",
  ENOMEM: "Not enough memory",
  ENOSPC: "No space left on device",
  ENOSR: "No stream resources",
  ENOSTR: "Not a stream",
  ENOSYS: "Function not implemented",
  ENOTBLK: "Block device required",
  ENOTDIR: "Not a directory",
  ENOTSUP: "Operation not supported",
  ENXIO: "No such device or address",
  EOPNOTSUPP: "Operation not supported on socket",
  EOVERFLOW: "Value too large to be stored in data type",
  EPERM: "Not owner",
  EPIPE: "Broken pipe",
  ERANGE: "Result too large",
  EROFS: "Read-only file system",
  ESPIPE: "Invalid seek",
  ESRCH: "No such process",
  ESTALE: "Stale remote file handle",
  ETXTBSY: "Text file busy",
  EXDEV: "Cross-domain link",
};

/**
 * Returns a one-line human-readable description of an error, for logs and
 * diagnostics. Branch on `code`, not on this text.
 */
export function describe(error: FileStreamError): string {
  switch (error.code) {
    case "EOF":
      return "End of file stream";
    case "NO_TRANSLATION":
      return `Unable to translate characters from ${error.from} to ${error.to}`;
    case "INVALID_UNICODE":
      return "Invalid bytes for the stream's text encoding";
    default:
      return POSIX_DESCRIPTIONS[error.code];
  }
}

/**
 * Error thrown by {@link unwrap} so callers that prefer exceptions still get
 * the structured error.
 */
export class FileStreamException extends Error {
  /** The structured error that caused the exception. */
  public readonly error: FileStreamError;

  constructor(error: FileStreamError) {
    super(describe(error));
    this.name = "FileStreamException";
    this.error = error;
  }
}

/**
 * Returns the value of a successful result, or throws a
 * {@link FileStreamException} carrying the error.
 */
export function unwrap<T>(result: FileStreamResult<T>): T {
  if (result.isErr()) {
    throw new FileStreamException(result.error);
  }
  return result.value;
}
