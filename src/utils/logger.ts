export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

function format(prefix: string, message: string, data?: Record<string, unknown>): string {
  return data ? `${prefix} ${message} ${JSON.stringify(data)}` : `${prefix} ${message}`;
}

/**
 * Console-backed logger. Never pass passwords, keys or stored values in `data`.
 *
 * @param sink - receives every formatted line instead of the console method for its level
 */
export function createConsoleLogger(
  level: LogLevel = "warn",
  prefix = "[memvault]",
  sink?: (line: string) => void
): Logger {
  const enabled = (l: LogLevel) => LEVEL_ORDER[l] >= LEVEL_ORDER[level];
  const emit = (l: Exclude<LogLevel, "silent">, fallback: (line: string) => void, message: string, data?: Record<string, unknown>) => {
    if (!enabled(l)) return;
    const line = format(prefix, `${l}: ${message}`, data);
    (sink ?? fallback)(line);
  };
  return {
    debug: (message, data) => emit("debug", console.debug, message, data),
    info: (message, data) => emit("info", console.info, message, data),
    warn: (message, data) => emit("warn", console.warn, message, data),
    error: (message, data) => emit("error", console.error, message, data)
  };
}

export const silentLogger: Logger = createConsoleLogger("silent");
