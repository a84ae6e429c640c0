import { describe, expect, it } from "vitest";
import { InMemoryFileDevice } from "../in_memory_file_device.ts";
import type { DeviceOpenFlags } from "../raw_file_device.ts";

const READ: DeviceOpenFlags = {
  read: true,
  write: false,
  append: false,
  exclusive: false,
};
const WRITE: DeviceOpenFlags = { ...READ, read: false, write: true };
const READ_WRITE: DeviceOpenFlags = { ...READ, write: true };

describe("InMemoryFileDevice", () => {
  it("fails to open a missing file for reading", () => {
    const device = new InMemoryFileDevice();
    expect(device.open("/missing", READ)._unsafeUnwrapErr()).toEqual({
      code: "ENOENT",
    });
  });

  it("creates and truncates files opened write-only", () => {
    const device = new InMemoryFileDevice();
    device.writeFile("/a", new Uint8Array([1, 2, 3]));
    device.open("/a", WRITE)._unsafeUnwrap();
    expect(device.readFile("/a")).toEqual(new Uint8Array(0));
    device.open("/b", WRITE)._unsafeUnwrap();
    expect(device.readFile("/b")).toEqual(new Uint8Array(0));
  });

  it("keeps content when opened read-write", () => {
    const device = new InMemoryFileDevice();
    device.writeFile("/a", new Uint8Array([1, 2, 3]));
    const handle = device.open("/a", READ_WRITE)._unsafeUnwrap();
    expect(device.read(handle, 1, 10)._unsafeUnwrap()).toEqual(
      new Uint8Array([2, 3]),
    );
  });

  it("rejects exclusive opens of existing files", () => {
    const device = new InMemoryFileDevice();
    device.writeFile("/a", new Uint8Array(0));
    expect(
      device.open("/a", { ...WRITE, exclusive: true })._unsafeUnwrapErr(),
    ).toEqual({ code: "EEXIST" });
  });

  it("reports directories", () => {
    const device = new InMemoryFileDevice();
    device.mkdir("/dir");
    expect(device.stat("/dir")._unsafeUnwrap()).toEqual({
      isDirectory: true,
      size: 0,
    });
    expect(device.open("/dir", READ)._unsafeUnwrapErr()).toEqual({
      code: "EISDIR",
    });
  });

  it("zero-fills when writing past the end", () => {
    const device = new InMemoryFileDevice();
    const handle = device.open("/a", WRITE)._unsafeUnwrap();
    expect(device.write(handle, 2, new Uint8Array([7]))._unsafeUnwrap()).toBe(
      1,
    );
    expect(device.readFile("/a")).toEqual(new Uint8Array([0, 0, 7]));
  });

  it("enforces handle permissions", () => {
    const device = new InMemoryFileDevice();
    device.writeFile("/a", new Uint8Array([1]));
    const reader = device.open("/a", READ)._unsafeUnwrap();
    expect(
      device.write(reader, 0, new Uint8Array([1]))._unsafeUnwrapErr(),
    ).toEqual({ code: "EBADF" });
    const writer = device.open("/a", WRITE)._unsafeUnwrap();
    expect(device.read(writer, 0, 1)._unsafeUnwrapErr()).toEqual({
      code: "EBADF",
    });
  });

  it("cuts writes short at capacity", () => {
    const device = new InMemoryFileDevice({ capacity: 4 });
    const handle = device.open("/a", WRITE)._unsafeUnwrap();
    expect(
      device.write(handle, 2, new Uint8Array([1, 2, 3]))._unsafeUnwrap(),
    ).toBe(2);
    expect(
      device.write(handle, 4, new Uint8Array([1]))._unsafeUnwrapErr(),
    ).toEqual({ code: "ENOSPC" });
  });

  it("fails the next call of an operation once per injected fault", () => {
    const device = new InMemoryFileDevice();
    const handle = device.open("/a", WRITE)._unsafeUnwrap();
    device.injectFault("sync", "EIO");
    expect(device.sync(handle)._unsafeUnwrapErr()).toEqual({ code: "EIO" });
    expect(device.sync(handle).isOk()).toBe(true);
  });

  it("tracks open handles and calls", () => {
    const device = new InMemoryFileDevice();
    const handle = device.open("/a", WRITE)._unsafeUnwrap();
    expect(device.openHandleCount()).toBe(1);
    device.close(handle)._unsafeUnwrap();
    expect(device.openHandleCount()).toBe(0);
    expect(device.close(handle)._unsafeUnwrapErr()).toEqual({ code: "EBADF" });
    expect(device.calls()).toEqual(["open", "close", "close"]);
  });
});
