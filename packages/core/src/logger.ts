/**
 * Structured Logging
 * Level-filtered entries with run/thread context and pluggable handlers
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogFormat = "pretty" | "json";

export interface LogContext {
  runId?: string;
  threadId?: string;
  phase?: string;
  capability?: string;
  [key: string]: unknown;
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: LogContext;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let currentLevel: LogLevel = "info";

export type LogHandler = (entry: LogEntry) => void;
const handlers: LogHandler[] = [];

const COLORS: Record<LogLevel, string> = {
  debug: "\x1b[90m",
  info: "\x1b[36m",
  warn: "\x1b[33m",
  error: "\x1b[31m",
};
const RESET = "\x1b[0m";

/**
 * Colored, human-readable console output
 */
const prettyHandler: LogHandler = (entry) => {
  const prefix = `${COLORS[entry.level]}[${entry.timestamp}] [${entry.level.toUpperCase()}]${RESET}`;
  const scope = entry.context?.threadId
    ? ` (${entry.context.threadId})`
    : "";
  const contextStr = entry.context ? ` ${JSON.stringify(entry.context)}` : "";

  if (entry.error) {
    console.error(`${prefix}${scope} ${entry.message}${contextStr}`);
    console.error(`  Error: ${entry.error.message}`);
    if (entry.error.stack) {
      console.error(`  Stack: ${entry.error.stack.split("\n").slice(1, 4).join("\n")}`);
    }
  } else {
    console.log(`${prefix}${scope} ${entry.message}${contextStr}`);
  }
};

/**
 * One JSON object per line, for log shippers
 */
const jsonHandler: LogHandler = (entry) => {
  const line = JSON.stringify(entry);
  if (entry.level === "error") {
    console.error(line);
  } else {
    console.log(line);
  }
};

let consoleHandler: LogHandler = prettyHandler;
handlers.push(consoleHandler);

function createEntry(
  level: LogLevel,
  message: string,
  context?: LogContext,
  error?: Error
): LogEntry {
  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level,
    message,
  };

  if (context && Object.keys(context).length > 0) {
    entry.context = context;
  }

  if (error) {
    entry.error = {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }

  return entry;
}

function emit(entry: LogEntry): void {
  if (LEVEL_PRIORITY[entry.level] < LEVEL_PRIORITY[currentLevel]) {
    return;
  }

  for (const handler of handlers) {
    try {
      handler(entry);
    } catch (e) {
      console.error("Logger handler error:", e);
    }
  }
}

export const logger = {
  setLevel(level: LogLevel): void {
    currentLevel = level;
  },

  getLevel(): LogLevel {
    return currentLevel;
  },

  /**
   * Switch the console handler between pretty and JSON lines
   */
  setFormat(format: LogFormat): void {
    const next = format === "json" ? jsonHandler : prettyHandler;
    const index = handlers.indexOf(consoleHandler);
    if (index >= 0) {
      handlers[index] = next;
    }
    consoleHandler = next;
  },

  addHandler(handler: LogHandler): void {
    handlers.push(handler);
  },

  removeHandler(handler: LogHandler): void {
    const index = handlers.indexOf(handler);
    if (index >= 0) {
      handlers.splice(index, 1);
    }
  },

  /**
   * Remove all handlers except the console one
   */
  resetHandlers(): void {
    handlers.length = 0;
    handlers.push(consoleHandler);
  },

  /**
   * Drop every handler, console included (tests)
   */
  silence(): void {
    handlers.length = 0;
  },

  debug(message: string, context?: LogContext): void {
    emit(createEntry("debug", message, context));
  },

  info(message: string, context?: LogContext): void {
    emit(createEntry("info", message, context));
  },

  warn(message: string, context?: LogContext): void {
    emit(createEntry("warn", message, context));
  },

  error(message: string, error?: unknown, context?: LogContext): void {
    const err = error instanceof Error ? error : undefined;
    emit(createEntry("error", message, context, err));
  },

  /**
   * Log a metric (durations, counts)
   */
  metric(name: string, value: number, context?: LogContext): void {
    emit(
      createEntry("info", `METRIC: ${name}=${value}`, {
        ...context,
        metric: name,
        value,
      })
    );
  },
};
