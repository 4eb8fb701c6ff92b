/**
 * Error types raised by {@link ByteCursorBuffer} when a caller breaks its
 * contract. Every error carries the offsets that were in effect so a failure
 * can be traced back to the exact cursor state.
 */

/** Discriminator shared by all stream buffer errors. */
export type StreamBufferErrorKind =
  | "InvalidMode"
  | "OutOfRange"
  | "AllocationFailure";

/**
 * Base class for stream buffer contract violations.
 */
export abstract class StreamBufferError extends Error {
  /** Which contract was violated. */
  public abstract readonly kind: StreamBufferErrorKind;
  /** The cursor offset the operation was working from. */
  public readonly offset: number;
  /** The number of bytes the operation asked for. */
  public readonly size: number;
  /** The storage length at the time of the failure. */
  public readonly bufferLength: number;

  /**
   * Creates a new StreamBufferError.
   * @param message The error message.
   * @param offset The cursor offset in effect.
   * @param size The size requested.
   * @param bufferLength The storage length.
   * @param options Standard error options, used to attach a cause.
   */
  constructor(
    message: string,
    offset: number,
    size: number,
    bufferLength: number,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.offset = offset;
    this.size = size;
    this.bufferLength = bufferLength;
  }
}

/** Thrown when a borrowed (read-only) buffer is asked to mutate. */
export class InvalidModeError extends StreamBufferError {
  public readonly kind = "InvalidMode" as const;
  /** Name of the rejected operation. */
  public readonly operation: string;

  constructor(
    operation: string,
    offset: number,
    size: number,
    bufferLength: number,
  ) {
    super(
      `Cannot ${operation} into a borrowed buffer. offset=${offset}, size=${size}, bufferLength=${bufferLength}`,
      offset,
      size,
      bufferLength,
    );
    this.name = "InvalidModeError";
    this.operation = operation;
  }
}

/** Thrown when an operation reaches past the data it is allowed to touch. */
export class OutOfRangeError extends StreamBufferError {
  public readonly kind = "OutOfRange" as const;

  constructor(
    message: string,
    offset: number,
    size: number,
    bufferLength: number,
  ) {
    super(message, offset, size, bufferLength);
    this.name = "OutOfRangeError";
  }
}

/** Thrown when the runtime refuses to allocate storage of the requested size. */
export class AllocationFailureError extends StreamBufferError {
  public readonly kind = "AllocationFailure" as const;

  constructor(
    requested: number,
    offset: number,
    bufferLength: number,
    cause: unknown,
  ) {
    super(
      `Failed to allocate ${requested} bytes. offset=${offset}, bufferLength=${bufferLength}`,
      offset,
      requested,
      bufferLength,
      { cause },
    );
    this.name = "AllocationFailureError";
  }
}
