// Buffer
export { ByteCursorBuffer } from "./serialization/buffers/byte_cursor_buffer.ts";
export type {
  ISyncByteSink,
  ISyncByteSinkAndSource,
  ISyncByteSource,
} from "./serialization/buffers/buffer_sync.ts";
export type { BufferMode } from "./serialization/buffers/buffer_storage.ts";

// Configuration
export {
  DEFAULT_GROW_SIZE,
  DEFAULT_HEADER_RESERVE,
} from "./serialization/buffers/buffer_options.ts";
export type {
  ByteCursorBufferOptions,
  ResolvedBufferOptions,
} from "./serialization/buffers/buffer_options.ts";

// Errors
export {
  AllocationFailureError,
  InvalidModeError,
  OutOfRangeError,
  StreamBufferError,
} from "./serialization/buffers/buffer_error.ts";
export type { StreamBufferErrorKind } from "./serialization/buffers/buffer_error.ts";

// Logging
export {
  consoleLogger,
  formatLogLine,
  silentLogger,
} from "./internal/logging/logger.ts";
export type { BufferLogger, LogContext } from "./internal/logging/logger.ts";
