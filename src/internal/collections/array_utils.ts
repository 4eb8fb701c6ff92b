/** Views an ArrayBuffer as bytes; a Uint8Array is returned as is. */
export function toUint8Array(data: ArrayBuffer | Uint8Array): Uint8Array {
  return data instanceof Uint8Array ? data : new Uint8Array(data);
}

/**
 * Checks that `[offset, offset + length)` is an integer range inside an array
 * of `dataSize` elements.
 * @throws RangeError when the range is malformed or out of bounds.
 */
export function assertSliceRange(
  offset: number,
  length: number,
  dataSize: number,
): void {
  if (
    !Number.isInteger(offset) || !Number.isInteger(length) ||
    offset < 0 || length < 0 || offset + length > dataSize
  ) {
    throw new RangeError(
      `Invalid range offset=${offset} length=${length} for dataSize=${dataSize}`,
    );
  }
}
