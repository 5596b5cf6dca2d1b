/**
 * Component logger
 *
 * Writes `[Component] message` lines through the console, with structured
 * extras appended as JSON. Each logger carries its own threshold, taken from
 * the loaded config by whoever creates it.
 */

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface Logger {
  debug: (message: string, extra?: Record<string, unknown>) => void;
  info: (message: string, extra?: Record<string, unknown>) => void;
  warn: (message: string, extra?: Record<string, unknown>) => void;
  error: (message: string, extra?: Record<string, unknown>) => void;
}

function shouldLog(level: LogLevel, threshold: LogLevel): boolean {
  return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(threshold);
}

function serializeExtra(extra: Record<string, unknown>): string {
  return JSON.stringify(extra, (_key, value: unknown) => {
    if (value instanceof Error) {
      return { name: value.name, message: value.message };
    }
    return value;
  });
}

export function createLogger(component: string, threshold: LogLevel = "info"): Logger {
  function emit(level: LogLevel, message: string, extra?: Record<string, unknown>): void {
    if (!shouldLog(level, threshold)) return;

    const line =
      extra && Object.keys(extra).length > 0
        ? `[${component}] ${message} ${serializeExtra(extra)}`
        : `[${component}] ${message}`;

    switch (level) {
      case "debug":
        console.debug(line);
        break;
      case "info":
        console.log(line);
        break;
      case "warn":
        console.warn(line);
        break;
      case "error":
        console.error(line);
        break;
    }
  }

  return {
    debug: (message, extra) => emit("debug", message, extra),
    info: (message, extra) => emit("info", message, extra),
    warn: (message, extra) => emit("warn", message, extra),
    error: (message, extra) => emit("error", message, extra),
  };
}

/** Logger that drops everything; handy default for library-style classes. */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
