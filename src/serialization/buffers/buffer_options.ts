import { type BufferLogger, consoleLogger } from "../../internal/logging/logger.ts";

/** Bytes reserved in front of the data for later prepends. */
export const DEFAULT_HEADER_RESERVE = 64;
/** Minimum number of bytes added whenever the storage grows. */
export const DEFAULT_GROW_SIZE = 1024;

/**
 * Options for constructing a {@link ByteCursorBuffer}.
 */
export interface ByteCursorBufferOptions {
  /**
   * Slack kept before the first written byte so headers can be prepended
   * without relocating the payload. Defaults to 64.
   */
  headerReserve?: number;
  /**
   * Minimum growth increment when an append runs out of capacity.
   * Defaults to 1024.
   */
  growSize?: number;
  /**
   * Reclaim consumed space eagerly once the read position passes
   * `compactThreshold`. Defaults to false.
   */
  compactOnConsume?: boolean;
  /**
   * Read position past which compaction kicks in. Defaults to `growSize`.
   */
  compactThreshold?: number;
  /**
   * Receives reallocation and compaction diagnostics. Defaults to the console.
   */
  logger?: BufferLogger;
}

/** Options with every default applied. */
export interface ResolvedBufferOptions {
  readonly headerReserve: number;
  readonly growSize: number;
  readonly compactOnConsume: boolean;
  readonly compactThreshold: number;
  readonly logger: BufferLogger;
}

function normalizeInteger(
  name: string,
  value: number | undefined,
  fallback: number,
  minimum: 0 | 1,
): number {
  if (value === undefined) {
    return fallback;
  }
  if (!Number.isInteger(value) || value < minimum) {
    const requirement = minimum === 0 ? "non-negative" : "positive";
    throw new RangeError(`${name} must be a ${requirement} integer.`);
  }
  return value;
}

/**
 * Applies defaults and validates the numeric options.
 * @throws RangeError when a size option is not an integer in range.
 */
export function resolveBufferOptions(
  options: ByteCursorBufferOptions = {},
): ResolvedBufferOptions {
  const headerReserve = normalizeInteger(
    "headerReserve",
    options.headerReserve,
    DEFAULT_HEADER_RESERVE,
    0,
  );
  const growSize = normalizeInteger(
    "growSize",
    options.growSize,
    DEFAULT_GROW_SIZE,
    1,
  );
  const compactThreshold = normalizeInteger(
    "compactThreshold",
    options.compactThreshold,
    growSize,
    0,
  );
  return {
    headerReserve,
    growSize,
    compactOnConsume: options.compactOnConsume ?? false,
    compactThreshold,
    logger: options.logger ?? consoleLogger,
  };
}
