import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { NodeFileDevice, nodeOpenFlags } from "../node_file_device.ts";

describe("nodeOpenFlags", () => {
  const none = { read: false, write: false, append: false, exclusive: false };

  it("maps read and write combinations", () => {
    expect(nodeOpenFlags({ ...none, read: true }, true)).toBe("r");
    expect(nodeOpenFlags({ ...none, write: true }, true)).toBe("w");
    expect(nodeOpenFlags({ ...none, read: true, write: true }, true)).toBe(
      "r+",
    );
    expect(nodeOpenFlags({ ...none, read: true, write: true }, false)).toBe(
      "w+",
    );
  });

  it("maps append and exclusive", () => {
    expect(nodeOpenFlags({ ...none, write: true, append: true }, true)).toBe(
      "a",
    );
    expect(
      nodeOpenFlags({ ...none, read: true, write: true, append: true }, true),
    ).toBe("a+");
    expect(nodeOpenFlags({ ...none, write: true, exclusive: true }, false))
      .toBe("wx");
    expect(
      nodeOpenFlags(
        { read: true, write: true, append: false, exclusive: true },
        false,
      ),
    ).toBe("wx+");
  });
});

describe("NodeFileDevice", () => {
  const device = new NodeFileDevice();
  let directory = "";

  beforeEach(() => {
    directory = mkdtempSync(join(tmpdir(), "file-device-"));
  });

  afterEach(() => {
    rmSync(directory, { recursive: true, force: true });
  });

  it("reads and writes at explicit positions", () => {
    const path = join(directory, "data.bin");
    writeFileSync(path, new Uint8Array([1, 2, 3, 4]));
    const handle = device.open(path, {
      read: true,
      write: true,
      append: false,
      exclusive: false,
    })._unsafeUnwrap();

    expect(device.read(handle, 2, 10)._unsafeUnwrap()).toEqual(
      new Uint8Array([3, 4]),
    );
    expect(device.write(handle, 1, new Uint8Array([9]))._unsafeUnwrap()).toBe(
      1,
    );
    device.sync(handle)._unsafeUnwrap();
    device.close(handle)._unsafeUnwrap();

    expect(new Uint8Array(readFileSync(path))).toEqual(
      new Uint8Array([1, 9, 3, 4]),
    );
  });

  it("converts thrown errors to os errors", () => {
    const missing = join(directory, "missing");
    expect(device.stat(missing)._unsafeUnwrapErr()).toEqual({
      code: "ENOENT",
    });
    expect(
      device.open(missing, {
        read: true,
        write: false,
        append: false,
        exclusive: false,
      })._unsafeUnwrapErr(),
    ).toEqual({ code: "ENOENT" });
  });

  it("reports directories", () => {
    expect(device.stat(directory)._unsafeUnwrap().isDirectory).toBe(true);
  });
});
