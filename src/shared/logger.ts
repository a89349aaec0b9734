export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

/**
 * Resolve the minimum level from LOG_LEVEL, falling back to info
 */
export function resolveLogLevel(value: string | undefined): LogLevel {
  const normalized = value?.trim().toLowerCase();
  return normalized && isLogLevel(normalized) ? normalized : "info";
}

/**
 * Create a console logger that prefixes lines with `[scope:LEVEL]`
 * @param scope - Component name shown in the prefix
 * @param minLevel - Messages below this level are dropped
 */
export function createLogger(scope: string, minLevel: LogLevel = resolveLogLevel(process.env.LOG_LEVEL)): Logger {
  const write = (level: LogLevel, message: string, context?: Record<string, unknown>): void => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[minLevel]) {
      return;
    }

    const logFn = level === "error" ? console.error :
                  level === "warn" ? console.warn :
                  level === "debug" ? console.debug : console.log;

    const line = `[${scope}:${level.toUpperCase()}] ${message}`;
    if (context && Object.keys(context).length > 0) {
      logFn(line, context);
    } else {
      logFn(line);
    }
  };

  return {
    debug: (message, context) => write("debug", message, context),
    info: (message, context) => write("info", message, context),
    warn: (message, context) => write("warn", message, context),
    error: (message, context) => write("error", message, context),
  };
}
