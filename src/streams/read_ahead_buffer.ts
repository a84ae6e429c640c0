import { ok, type Result } from "neverthrow";
import type { OsError } from "../errors/file_stream_error.ts";

export type DeviceFetch = (
  position: number,
  maxBytes: number,
) => Result<Uint8Array, OsError>;

/** Device reads are never asked for less than this, up to the request. */
export const FETCH_CHUNK_SIZE = 64 * 1024;

/** Upper bound on a single device read, whatever the window size. */
export const MAX_FETCH_SIZE = 16 * 1024 * 1024;

const EMPTY = new Uint8Array(0);

/**
 * Caches one window of file bytes so small sequential reads do not each
 * reach the device. The window is refilled whenever a read starts outside it
 * and must be invalidated whenever the file is written.
 */
export class ReadAheadBuffer {
  #fetch: DeviceFetch;
  #windowSize: number;
  #start = 0;
  #data: Uint8Array = EMPTY;

  /**
   * @param fetch Reads from the device at an absolute position.
   * @param windowSize Minimum number of bytes requested per device read,
   *   capped at {@link MAX_FETCH_SIZE}.
   */
  constructor(fetch: DeviceFetch, windowSize: number) {
    this.#fetch = fetch;
    this.#windowSize = windowSize;
  }

  /**
   * Returns up to `maxBytes` starting at `position`. Fewer bytes come back
   * when the cached window or the file ends first; an empty array means the
   * position is at or past the end of the file.
   *
   * @param minimumWindow Overrides the window size for this read when larger.
   */
  public read(
    position: number,
    maxBytes: number,
    minimumWindow = 0,
  ): Result<Uint8Array, OsError> {
    if (maxBytes === 0) {
      return ok(EMPTY);
    }
    if (!this.#covers(position)) {
      const size = Math.min(
        Math.max(
          Math.min(maxBytes, FETCH_CHUNK_SIZE),
          this.#windowSize,
          minimumWindow,
        ),
        MAX_FETCH_SIZE,
      );
      const fetched = this.#fetch(position, size);
      if (fetched.isErr()) {
        return fetched;
      }
      this.#start = position;
      this.#data = fetched.value;
    }
    const offset = position - this.#start;
    return ok(this.#data.slice(offset, offset + maxBytes));
  }

  public invalidate(): void {
    this.#data = EMPTY;
  }

  #covers(position: number): boolean {
    return position >= this.#start &&
      position < this.#start + this.#data.length;
  }
}
