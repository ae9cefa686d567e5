/**
 * Structured logger.
 *
 * Writes one JSON object per line:
 * {"timestamp":"2024-01-01T00:00:00.000Z","level":"warn","message":"...","objectType":"folder"}
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

/** Fields attached to every entry of a logger */
export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext, error?: unknown): void;
  /** A logger that adds `context` to every entry */
  child(context: LogContext): Logger;
}

export interface LoggerOptions {
  level?: LogLevel;
  context?: LogContext;
  /** Receives each serialized line; defaults to the console method for the level */
  sink?: (level: Exclude<LogLevel, "silent">, line: string) => void;
}

const SEVERITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function consoleSink(level: Exclude<LogLevel, "silent">, line: string): void {
  switch (level) {
    case "error":
      console.error(line);
      break;
    case "warn":
      console.warn(line);
      break;
    case "debug":
      console.debug(line);
      break;
    default:
      console.log(line);
  }
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const threshold = SEVERITY[options.level ?? "info"];
  const base = options.context ?? {};
  const sink = options.sink ?? consoleSink;

  const log = (
    level: Exclude<LogLevel, "silent">,
    message: string,
    extra?: LogContext,
    error?: unknown,
  ): void => {
    if (SEVERITY[level] < threshold) return;
    const entry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...base,
      ...extra,
      ...(error === undefined ? {} : { error: serializeError(error) }),
    };
    sink(level, JSON.stringify(entry));
  };

  return {
    debug: (message, context) => log("debug", message, context),
    info: (message, context) => log("info", message, context),
    warn: (message, context) => log("warn", message, context),
    error: (message, context, error) => log("error", message, context, error),
    child: (context) =>
      createLogger({ ...options, context: { ...base, ...context } }),
  };
}

function serializeError(error: unknown): { name: string; message: string; stack?: string } {
  if (error instanceof Error) {
    return { name: error.name, message: error.message, stack: error.stack };
  }
  return { name: "NonError", message: String(error) };
}

export const silentLogger: Logger = createLogger({ level: "silent" });
