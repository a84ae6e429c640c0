import { describe, expect, it } from "vitest";
import {
  beginningOfFile,
  currentLocation,
  endOfFile,
  resolvePosition,
} from "../location.ts";

describe("resolvePosition", () => {
  it("resolves each reference point", () => {
    expect(resolvePosition(beginningOfFile(3), 5, 10)._unsafeUnwrap()).toBe(3);
    expect(resolvePosition(currentLocation(-2), 5, 10)._unsafeUnwrap()).toBe(3);
    expect(resolvePosition(endOfFile(-4), 5, 10)._unsafeUnwrap()).toBe(6);
  });

  it("allows positions past the end", () => {
    expect(resolvePosition(endOfFile(5), 0, 10)._unsafeUnwrap()).toBe(15);
  });

  it("rejects negative targets", () => {
    expect(resolvePosition(currentLocation(-6), 5, 10)._unsafeUnwrapErr())
      .toEqual({ code: "EINVAL" });
    expect(resolvePosition(beginningOfFile(-1), 0, 0)._unsafeUnwrapErr())
      .toEqual({ code: "EINVAL" });
  });

  it("rejects non-integer offsets", () => {
    expect(resolvePosition(beginningOfFile(0.5), 0, 0).isErr()).toBe(true);
    expect(resolvePosition(endOfFile(Number.NaN), 0, 0).isErr()).toBe(true);
  });
});
