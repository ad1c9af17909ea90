export const LOG_LEVELS = ["error", "warn", "info", "debug", "trace"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/** Sink for client diagnostics. `scope` names the emitting module, e.g. `content`. */
export interface Logger {
  log(level: LogLevel, scope: string, message: string): void;
}

export interface ScopedLogger {
  error(message: string): void;
  warn(message: string): void;
  info(message: string): void;
  debug(message: string): void;
  trace(message: string): void;
}

export function parseLogLevel(value: string | undefined, fallback: LogLevel = "warn"): LogLevel {
  const normalized = value?.trim().toLowerCase();
  return LOG_LEVELS.find(level => level === normalized) ?? fallback;
}

/** Writes `[bintray:<scope>] message` lines to the console. The threshold defaults to `BINTRAY_LOG`. */
export function createConsoleLogger(level: LogLevel = parseLogLevel(process.env.BINTRAY_LOG)): Logger {
  const threshold = LOG_LEVELS.indexOf(level);
  return {
    log(entryLevel, scope, message) {
      if (LOG_LEVELS.indexOf(entryLevel) > threshold) return;
      const line = `[bintray:${scope}] ${message}`;
      switch (entryLevel) {
        case "error":
          console.error(line);
          break;
        case "warn":
          console.warn(line);
          break;
        case "info":
          console.info(line);
          break;
        default:
          console.debug(line);
      }
    },
  };
}

export function scopedLogger(logger: Logger, scope: string): ScopedLogger {
  return {
    error: message => logger.log("error", scope, message),
    warn: message => logger.log("warn", scope, message),
    info: message => logger.log("info", scope, message),
    debug: message => logger.log("debug", scope, message),
    trace: message => logger.log("trace", scope, message),
  };
}
