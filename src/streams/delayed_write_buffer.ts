import type { DelayedWriteConfig } from "./open_mode.ts";

/** A contiguous run of bytes waiting to be written at `position`. */
export interface PendingWrite {
  readonly position: number;
  readonly bytes: Uint8Array;
}

/**
 * Coalesces contiguous writes into a single device write.
 * Bytes accumulate until {@link shouldFlush} reports that the configured size
 * or delay has been reached; the owner then writes what {@link take} returns.
 */
export class DelayedWriteBuffer {
  #config: DelayedWriteConfig;
  #clock: () => number;
  #target = new Uint8Array(0);
  #position = 0;
  #length = 0;
  #firstWriteAt: number | undefined;

  /**
   * @param config Flush thresholds.
   * @param clock Returns the current time in milliseconds.
   */
  constructor(config: DelayedWriteConfig, clock: () => number) {
    this.#config = config;
    this.#clock = clock;
  }

  public isEmpty(): boolean {
    return this.#length === 0;
  }

  /** Whether bytes written at `position` would extend the pending run. */
  public isContiguous(position: number): boolean {
    return this.isEmpty() || position === this.#position + this.#length;
  }

  /**
   * Copies `bytes` into the pending run. Callers must check
   * {@link isContiguous} first and flush when it is false.
   */
  public append(position: number, bytes: Uint8Array): void {
    if (bytes.length === 0) {
      return;
    }
    if (this.isEmpty()) {
      this.#position = position;
      this.#firstWriteAt = this.#clock();
    }
    const end = this.#length + bytes.length;
    if (end > this.#target.length) {
      const grown = new Uint8Array(Math.max(end, this.#target.length * 2));
      grown.set(this.#target.subarray(0, this.#length));
      this.#target = grown;
    }
    this.#target.set(bytes, this.#length);
    this.#length = end;
  }

  public shouldFlush(): boolean {
    if (this.isEmpty()) {
      return false;
    }
    if (this.#length >= this.#config.size) {
      return true;
    }
    return this.#firstWriteAt !== undefined &&
      this.#clock() - this.#firstWriteAt >= this.#config.delayMs;
  }

  /** Removes and returns the pending run, if any. */
  public take(): PendingWrite | undefined {
    if (this.isEmpty()) {
      return undefined;
    }
    const pending = {
      position: this.#position,
      bytes: this.#target.slice(0, this.#length),
    };
    this.#target = new Uint8Array(0);
    this.#length = 0;
    this.#firstWriteAt = undefined;
    return pending;
  }
}
