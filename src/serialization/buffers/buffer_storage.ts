import { toUint8Array } from "../../internal/collections/array_utils.ts";
import { AllocationFailureError, OutOfRangeError } from "./buffer_error.ts";

/** The two storage modes a buffer can be in. */
export type BufferMode = "owned" | "borrowed";

/**
 * Allocates zeroed storage, mapping the runtime's allocation RangeError to
 * an AllocationFailureError.
 */
function allocateOrThrow(
  capacity: number,
  offset: number,
  bufferLength: number,
): Uint8Array {
  try {
    return new Uint8Array(capacity);
  } catch (error) {
    if (error instanceof RangeError) {
      throw new AllocationFailureError(capacity, offset, bufferLength, error);
    }
    throw error;
  }
}

/**
 * Storage exclusively owned by a buffer. It can grow, be relocated and
 * shrink. Every reallocation replaces the backing array, so views handed out
 * earlier stop tracking it.
 */
export class OwnedStorage {
  public readonly kind = "owned" as const;
  #bytes: Uint8Array;

  /**
   * @param capacity Initial allocation size.
   * @throws AllocationFailureError if the allocation is refused.
   */
  constructor(capacity: number) {
    this.#bytes = allocateOrThrow(capacity, 0, 0);
  }

  /** The current backing array. */
  public get bytes(): Uint8Array {
    return this.#bytes;
  }

  public capacity(): number {
    return this.#bytes.length;
  }

  /**
   * Reallocates to `capacity` bytes, keeping `[0, usedEnd)` at the same
   * offsets.
   */
  public grow(capacity: number, usedEnd: number): void {
    const next = allocateOrThrow(capacity, usedEnd, this.#bytes.length);
    next.set(this.#bytes.subarray(0, usedEnd));
    this.#bytes = next;
  }

  /**
   * Reallocates to `capacity` bytes and moves `[start, end)` to the tail of
   * the new array, leaving free space in front of it.
   * @returns The new start offset of the moved region.
   */
  public relocateToTail(capacity: number, start: number, end: number): number {
    const next = allocateOrThrow(capacity, start, this.#bytes.length);
    const newStart = capacity - (end - start);
    next.set(this.#bytes.subarray(start, end), newStart);
    this.#bytes = next;
    return newStart;
  }

  /**
   * Shrinks the storage to exactly `[start, end)`, which moves to offset 0.
   */
  public compact(start: number, end: number): void {
    const next = allocateOrThrow(end - start, start, this.#bytes.length);
    next.set(this.#bytes.subarray(start, end));
    this.#bytes = next;
  }

  /** Drops the backing array. The storage is empty afterwards. */
  public release(): void {
    this.#bytes = new Uint8Array(0);
  }
}

/**
 * A read-only view over a region the caller owns. It is never resized,
 * written to or released by the buffer.
 */
export class BorrowedStorage {
  public readonly kind = "borrowed" as const;
  readonly #bytes: Readonly<Uint8Array>;

  /**
   * Wraps the first `size` bytes of `region` without copying them.
   * @throws OutOfRangeError if `size` is not an integer within the region.
   */
  constructor(region: ArrayBuffer | Uint8Array, size?: number) {
    const bytes = toUint8Array(region);
    const length = size ?? bytes.length;
    if (!Number.isInteger(length) || length < 0 || length > bytes.length) {
      throw new OutOfRangeError(
        `Borrowed size must be an integer within the region. size=${length}, regionLength=${bytes.length}`,
        0,
        length,
        bytes.length,
      );
    }
    this.#bytes = length === bytes.length ? bytes : bytes.subarray(0, length);
  }

  public get bytes(): Readonly<Uint8Array> {
    return this.#bytes;
  }

  public capacity(): number {
    return this.#bytes.length;
  }
}

/** Storage of either mode, discriminated by `kind`. */
export type BufferStorage = OwnedStorage | BorrowedStorage;
