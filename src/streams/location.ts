import { err, ok } from "neverthrow";
import {
  type FileStreamResult,
  invalidArgument,
} from "../errors/file_stream_error.ts";

/** A target position relative to one of three reference points. */
export interface Location {
  readonly from: "start" | "current" | "end";
  readonly offset: number;
}

export function beginningOfFile(offset: number): Location {
  return { from: "start", offset };
}

export function currentLocation(offset: number): Location {
  return { from: "current", offset };
}

export function endOfFile(offset: number): Location {
  return { from: "end", offset };
}

/**
 * Resolves a {@link Location} to an absolute byte offset. Offsets that are
 * not integers or that resolve before the start of the file fail with
 * `EINVAL`. Positions past the end are allowed.
 */
export function resolvePosition(
  location: Location,
  current: number,
  size: number,
): FileStreamResult<number> {
  if (!Number.isSafeInteger(location.offset)) {
    return err(invalidArgument());
  }

  let target = location.offset;
  if (location.from === "current") {
    target += current;
  } else if (location.from === "end") {
    target += size;
  }

  if (target < 0) {
    return err(invalidArgument());
  }
  return ok(target);
}
