/** Structured fields attached to a log line. */
export type LogContext = Readonly<Record<string, number | string | boolean>>;

/**
 * Sink for the diagnostics a buffer emits on its slow paths
 * (reallocation, compaction, storage release).
 */
export interface BufferLogger {
  debug(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
}

const LOG_COMPONENT = "ByteCursorBuffer";

/**
 * Formats a message and its context as a single line, e.g.
 * `[ByteCursorBuffer] buffer is full capacity=128 required=164`.
 */
export function formatLogLine(message: string, context?: LogContext): string {
  const fields = context === undefined
    ? []
    : Object.entries(context).map(([key, value]) => `${key}=${value}`);
  return [`[${LOG_COMPONENT}]`, message, ...fields].join(" ");
}

/** Default logger, writes to the console. */
export const consoleLogger: BufferLogger = {
  debug(message, context) {
    console.debug(formatLogLine(message, context));
  },
  warn(message, context) {
    console.warn(formatLogLine(message, context));
  },
};

/** Logger that drops everything. */
export const silentLogger: BufferLogger = {
  debug() {},
  warn() {},
};
