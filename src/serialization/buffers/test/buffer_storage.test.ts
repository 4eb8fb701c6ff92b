import { describe, expect, it } from "vitest";

import { BorrowedStorage, OwnedStorage } from "../buffer_storage.ts";
import { AllocationFailureError, OutOfRangeError } from "../buffer_error.ts";

describe("OwnedStorage", () => {
  it("allocates zeroed storage", () => {
    const storage = new OwnedStorage(4);
    expect(storage.kind).toBe("owned");
    expect(storage.capacity()).toBe(4);
    expect(storage.bytes).toEqual(new Uint8Array(4));
  });

  it("grows keeping the used bytes at their offsets", () => {
    const storage = new OwnedStorage(4);
    storage.bytes.set([1, 2, 3, 4]);
    storage.grow(6, 3);
    expect(storage.bytes).toEqual(new Uint8Array([1, 2, 3, 0, 0, 0]));
  });

  it("relocates a region to the tail", () => {
    const storage = new OwnedStorage(4);
    storage.bytes.set([1, 2, 3, 4]);
    const start = storage.relocateToTail(6, 1, 3);
    expect(start).toBe(4);
    expect(storage.bytes).toEqual(new Uint8Array([0, 0, 0, 0, 2, 3]));
  });

  it("compacts to exactly the given region", () => {
    const storage = new OwnedStorage(5);
    storage.bytes.set([1, 2, 3, 4, 5]);
    storage.compact(2, 4);
    expect(storage.bytes).toEqual(new Uint8Array([3, 4]));
  });

  it("releases its bytes", () => {
    const storage = new OwnedStorage(8);
    storage.release();
    expect(storage.capacity()).toBe(0);
  });

  it("maps allocation failures", () => {
    expect(() => new OwnedStorage(Number.MAX_SAFE_INTEGER)).toThrow(
      AllocationFailureError,
    );
  });
});

describe("BorrowedStorage", () => {
  it("shares the region's memory", () => {
    const region = new Uint8Array([1, 2, 3]);
    const storage = new BorrowedStorage(region, 2);
    expect(storage.kind).toBe("borrowed");
    expect(storage.capacity()).toBe(2);
    region[1] = 9;
    expect(storage.bytes[1]).toBe(9);
  });

  it("rejects a fractional size", () => {
    expect(() => new BorrowedStorage(new Uint8Array(4), 1.5)).toThrow(
      OutOfRangeError,
    );
  });
});
