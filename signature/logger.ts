export type LogLevel = "debug" | "info" | "warn" | "error";

const levelPriority: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export type Logger = {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
};

export type LoggerOptions = {
  level?: LogLevel;
  silent?: boolean;
};

/**
 * Console logger tagged with a context, e.g. `[warn] (fonts) ...`.
 * The level is read on every call, so `DEBUG=1` set after import still applies.
 */
export function createLogger(context: string, options: LoggerOptions = {}): Logger {
  const enabled = (level: LogLevel) => {
    if (options.silent || process.env.SIGNATURE_LOG_SILENT === "1") return false;
    const threshold = options.level ?? (process.env.DEBUG ? "debug" : "info");
    return levelPriority[level] >= levelPriority[threshold];
  };

  const write = (level: LogLevel, message: string, data?: Record<string, unknown>) => {
    if (!enabled(level)) return;
    let line = `[${level}] (${context}) ${message}`;
    if (data) line += ` ${JSON.stringify(data)}`;

    if (level === "error") console.error(line);
    else if (level === "warn") console.warn(line);
    else console.log(line);
  };

  return {
    debug: (message, data) => write("debug", message, data),
    info: (message, data) => write("info", message, data),
    warn: (message, data) => write("warn", message, data),
    error: (message, data) => write("error", message, data),
  };
}
