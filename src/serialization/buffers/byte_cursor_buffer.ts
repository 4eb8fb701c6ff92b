import { assertSliceRange } from "../../internal/collections/array_utils.ts";
import { InvalidModeError, OutOfRangeError } from "./buffer_error.ts";
import {
  type ByteCursorBufferOptions,
  type ResolvedBufferOptions,
  resolveBufferOptions,
} from "./buffer_options.ts";
import {
  BorrowedStorage,
  type BufferMode,
  type BufferStorage,
  OwnedStorage,
} from "./buffer_storage.ts";
import type { ISyncByteSink, ISyncByteSource } from "./buffer_sync.ts";

/**
 * Growable byte buffer with independent read and write cursors, used to
 * assemble and consume RPC message payloads.
 *
 * Key features:
 * - Header slack: an owned buffer starts with `headerReserve` free bytes in
 *   front of the data, so framing fields can be prepended after the payload
 *   is written without moving it.
 * - Two modes: an owned buffer grows on append; a borrowed buffer is a
 *   read-only view over a caller's bytes and can only be consumed.
 * - Unique ownership: there is no copy operation. Storage moves between
 *   instances only through {@link exchange}.
 *
 * Invariant: `0 <= readPosition <= writePosition <= capacity`.
 *
 * Views from {@link rawBuffer} and {@link readableView} are invalidated by any
 * call that reallocates (append, prepend, consume with compaction, rebind,
 * exchange); do not hold on to them across such calls.
 *
 * @example
 * ```typescript
 * const buffer = new ByteCursorBuffer();
 * buffer.append(new TextEncoder().encode("HELLO"));
 * buffer.prepend(new TextEncoder().encode("ID:"));
 *
 * buffer.readableLength(); // 8
 * buffer.consumeBytes(8); // "ID:HELLO"
 *
 * // This will throw:
 * buffer.consumeBytes(1); // OutOfRangeError: Read exceeds readable data
 * ```
 */
export class ByteCursorBuffer implements ISyncByteSink, ISyncByteSource {
  #storage: BufferStorage;
  #readPosition: number;
  #writePosition: number;
  readonly #options: ResolvedBufferOptions;

  /**
   * Creates an owned buffer of `2 * headerReserve` bytes with both cursors at
   * `headerReserve`.
   * @param options Sizing, compaction and logging options.
   * @param borrowed @internal Storage to start from, used by {@link borrow}.
   */
  constructor(options?: ByteCursorBufferOptions, borrowed?: BorrowedStorage) {
    this.#options = resolveBufferOptions(options);
    if (borrowed !== undefined) {
      this.#storage = borrowed;
      this.#readPosition = 0;
      this.#writePosition = borrowed.capacity();
      return;
    }
    const reserve = this.#options.headerReserve;
    this.#storage = new OwnedStorage(reserve * 2);
    this.#readPosition = reserve;
    this.#writePosition = reserve;
  }

  /**
   * Creates a read-only buffer over the first `size` bytes of `region`.
   * Nothing is copied; the caller keeps ownership of the region.
   * @throws OutOfRangeError if `size` is not within the region.
   */
  public static borrow(
    region: ArrayBuffer | Uint8Array,
    size?: number,
    options?: ByteCursorBufferOptions,
  ): ByteCursorBuffer {
    return new ByteCursorBuffer(options, new BorrowedStorage(region, size));
  }

  public mode(): BufferMode {
    return this.#storage.kind;
  }

  public isBorrowed(): boolean {
    return this.#storage.kind === "borrowed";
  }

  /** Total storage length. */
  public capacity(): number {
    return this.#storage.capacity();
  }

  public readPosition(): number {
    return this.#readPosition;
  }

  public writePosition(): number {
    return this.#writePosition;
  }

  public readableLength(): number {
    return this.#writePosition - this.#readPosition;
  }

  /**
   * The whole backing storage, scratch bytes included.
   */
  public rawBuffer(): Readonly<Uint8Array> {
    return this.#storage.bytes;
  }

  /**
   * View of the unread bytes `[readPosition, writePosition)`, ready to hand
   * to an I/O layer.
   */
  public readableView(): Readonly<Uint8Array> {
    return this.#storage.bytes.subarray(this.#readPosition, this.#writePosition);
  }

  public canAppend(_size: number): boolean {
    return this.#storage.kind === "owned";
  }

  public canConsume(size: number): boolean {
    return Number.isInteger(size) && size >= 0 &&
      size <= this.readableLength();
  }

  /**
   * Appends bytes at the write cursor.
   * @throws InvalidModeError if the buffer is borrowed.
   * @throws AllocationFailureError if growing the storage fails.
   */
  public append(data: Uint8Array): void {
    this.appendBytesFrom(data, 0, data.length);
  }

  /**
   * Appends `data[offset, offset + length)` at the write cursor.
   * @throws InvalidModeError if the buffer is borrowed.
   * @throws RangeError if the source range is invalid.
   * @throws AllocationFailureError if growing the storage fails.
   */
  public appendBytesFrom(
    data: Uint8Array,
    offset: number,
    length: number,
  ): void {
    const storage = this.#ownedOrThrow("append", this.#writePosition, length);
    assertSliceRange(offset, length, data.length);
    if (length === 0) {
      return;
    }
    this.#reserveTail(storage, length);
    storage.bytes.set(
      data.subarray(offset, offset + length),
      this.#writePosition,
    );
    this.#writePosition += length;
  }

  /**
   * Writes `data` directly in front of the unread bytes. The reserved header
   * slack absorbs this without reallocating; when the slack is exhausted the
   * unread bytes are moved to the tail of a larger allocation.
   * @throws InvalidModeError if the buffer is borrowed.
   * @throws AllocationFailureError if the reallocation fails.
   */
  public prepend(data: Uint8Array): void {
    const size = data.length;
    const storage = this.#ownedOrThrow("prepend", this.#readPosition, size);
    if (this.#readPosition < size) {
      const capacity = Math.max(
        size + this.#writePosition,
        this.#writePosition + this.#options.headerReserve,
      );
      this.#options.logger.warn(
        "reallocating for prepend, header reserve exhausted",
        { readPosition: this.#readPosition, size, newCapacity: capacity },
      );
      this.#readPosition = storage.relocateToTail(
        capacity,
        this.#readPosition,
        this.#writePosition,
      );
      this.#writePosition = capacity;
    }
    this.#readPosition -= size;
    storage.bytes.set(data, this.#readPosition);
  }

  /**
   * Copies `size` bytes from the read cursor into `dest` at `destOffset` and
   * advances the cursor.
   * @throws OutOfRangeError if fewer than `size` bytes are readable.
   * @throws RangeError if `dest` cannot hold the bytes at `destOffset`.
   */
  public consume(dest: Uint8Array, size: number, destOffset = 0): void {
    this.#checkReadable(size);
    assertSliceRange(destOffset, size, dest.length);
    const start = this.#readPosition;
    dest.set(this.#storage.bytes.subarray(start, start + size), destOffset);
    this.#readPosition += size;
    this.#compactIfNeeded();
  }

  /**
   * Consumes `size` bytes into a new array.
   * @throws OutOfRangeError if fewer than `size` bytes are readable.
   */
  public consumeBytes(size: number): Uint8Array {
    this.#checkReadable(size);
    const out = new Uint8Array(size);
    this.consume(out, size);
    return out;
  }

  /**
   * Points the buffer at a caller-owned region and makes it read-only.
   * Owned storage held until now is released here.
   * @throws OutOfRangeError if `size` is not within the region.
   */
  public rebind(region: ArrayBuffer | Uint8Array, size?: number): void {
    const next = new BorrowedStorage(region, size);
    const previous = this.#storage;
    if (previous.kind === "owned") {
      this.#options.logger.debug("releasing owned storage on rebind", {
        capacity: previous.capacity(),
      });
      previous.release();
    }
    this.#storage = next;
    this.#readPosition = 0;
    this.#writePosition = next.capacity();
  }

  /**
   * Swaps storage, mode and both cursors with `other`. Options stay with
   * each instance.
   */
  public exchange(other: ByteCursorBuffer): void {
    if (other === this) {
      return;
    }
    const storage = this.#storage;
    const readPosition = this.#readPosition;
    const writePosition = this.#writePosition;

    this.#storage = other.#storage;
    this.#readPosition = other.#readPosition;
    this.#writePosition = other.#writePosition;

    other.#storage = storage;
    other.#readPosition = readPosition;
    other.#writePosition = writePosition;
  }

  #ownedOrThrow(operation: string, offset: number, size: number): OwnedStorage {
    const storage = this.#storage;
    if (storage.kind === "borrowed") {
      throw new InvalidModeError(operation, offset, size, storage.capacity());
    }
    return storage;
  }

  #checkReadable(size: number): void {
    if (!Number.isInteger(size) || size < 0) {
      throw new RangeError(
        `Size must be a non-negative integer. Got size=${size}`,
      );
    }
    const readable = this.readableLength();
    if (size > readable) {
      throw new OutOfRangeError(
        `Read exceeds readable data. readPosition=${this.#readPosition}, size=${size}, readable=${readable}`,
        this.#readPosition,
        size,
        this.#storage.capacity(),
      );
    }
  }

  #reserveTail(storage: OwnedStorage, size: number): void {
    const required = this.#writePosition + size;
    if (required <= storage.capacity()) {
      return;
    }
    const capacity = Math.max(
      required,
      this.#writePosition + this.#options.growSize,
    );
    this.#options.logger.debug("buffer is full, reallocating", {
      capacity: storage.capacity(),
      required,
      newCapacity: capacity,
    });
    storage.grow(capacity, this.#writePosition);
  }

  #compactIfNeeded(): void {
    const { compactOnConsume, compactThreshold, logger } = this.#options;
    const storage = this.#storage;
    if (
      !compactOnConsume || storage.kind !== "owned" ||
      this.#readPosition <= compactThreshold
    ) {
      return;
    }
    const consumed = this.#readPosition;
    logger.debug("compacting consumed bytes", {
      consumed,
      unread: this.readableLength(),
    });
    storage.compact(consumed, this.#writePosition);
    this.#writePosition -= consumed;
    this.#readPosition = 0;
  }
}
