/**
 * Structured debug log.
 *
 * User-facing progress goes through the build UI; this log is for
 * diagnosing the builder itself. Entries are JSON lines on stderr, filtered
 * by VBOX_BUILD_LOG (debug | info | warn | error, default warn).
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  level: LogLevel;
  message: string;
  context: Record<string, unknown>;
  timestamp: string;
}

export type LogHandler = (entry: LogEntry) => void;

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  child(context: Record<string, unknown>): Logger;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const stderrHandler: LogHandler = (entry) => {
  process.stderr.write(
    `${JSON.stringify({ level: entry.level, ts: entry.timestamp, msg: entry.message, ...entry.context })}\n`,
  );
};

let currentHandler: LogHandler = stderrHandler;
let currentMinLevel: LogLevel = parseLogLevel(process.env.VBOX_BUILD_LOG) ?? "warn";

export function parseLogLevel(value: string | undefined): LogLevel | null {
  const normalized = value?.trim().toLowerCase();
  if (normalized === "debug" || normalized === "info" || normalized === "warn" || normalized === "error") {
    return normalized;
  }

  // VBOX_BUILD_LOG=1 turns on everything.
  if (normalized === "1" || normalized === "true") {
    return "debug";
  }

  return null;
}

/** Replace the handler, e.g. to capture entries in tests. Returns the previous one. */
export function setLogHandler(handler: LogHandler): LogHandler {
  const previous = currentHandler;
  currentHandler = handler;
  return previous;
}

export function setLogLevel(level: LogLevel): void {
  currentMinLevel = level;
}

function write(level: LogLevel, message: string, context: Record<string, unknown>): void {
  if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[currentMinLevel]) {
    return;
  }

  currentHandler({ level, message, context, timestamp: new Date().toISOString() });
}

export function createLogger(baseContext: Record<string, unknown> = {}): Logger {
  return {
    debug: (message, context) => write("debug", message, { ...baseContext, ...context }),
    info: (message, context) => write("info", message, { ...baseContext, ...context }),
    warn: (message, context) => write("warn", message, { ...baseContext, ...context }),
    error: (message, context) => write("error", message, { ...baseContext, ...context }),
    child: (context) => createLogger({ ...baseContext, ...context }),
  };
}
