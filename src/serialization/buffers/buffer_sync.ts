/**
 * Synchronous interfaces for the two sides of a byte cursor buffer.
 */

/**
 * Interface describing a writable byte sink that can also grow backward
 * into reserved header space.
 */
export interface ISyncByteSink {
  /**
   * Appends bytes at the write cursor, growing storage as needed.
   * Throws an InvalidModeError when the sink is read-only.
   */
  append(data: Uint8Array): void;

  /**
   * Appends a slice of bytes without requiring callers to create a subarray
   * view.
   */
  appendBytesFrom(data: Uint8Array, offset: number, length: number): void;

  /**
   * Writes bytes immediately before the unread data, so they are consumed
   * first.
   */
  prepend(data: Uint8Array): void;

  /**
   * Checks if the sink accepts appending the given number of bytes.
   */
  canAppend(size: number): boolean;
}

/**
 * Interface describing a byte source read front to back.
 */
export interface ISyncByteSource {
  /**
   * Copies `size` bytes from the read cursor into `dest` and advances the
   * cursor. Throws an OutOfRangeError when fewer bytes are readable.
   */
  consume(dest: Uint8Array, size: number, destOffset?: number): void;

  /**
   * Consumes `size` bytes into a fresh array.
   */
  consumeBytes(size: number): Uint8Array;

  /** Number of bytes left to consume. */
  readableLength(): number;

  /**
   * Checks if `size` more bytes can be consumed.
   */
  canConsume(size: number): boolean;
}

/**
 * Convenience type for buffers exposing both sides.
 */
export type ISyncByteSinkAndSource = ISyncByteSink & ISyncByteSource;
