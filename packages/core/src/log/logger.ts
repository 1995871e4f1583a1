export const LOG_LEVELS = ["trace", "debug", "info", "warn", "error"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

/** A level, or `silent` to drop everything. */
export const LOG_THRESHOLDS = [...LOG_LEVELS, "silent"] as const;
export type LogThreshold = (typeof LOG_THRESHOLDS)[number];

const SEVERITY: Record<LogThreshold, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
  silent: 5,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export interface Logger {
  readonly scope: string;
  log(level: LogLevel, message: string, ...details: unknown[]): void;
  trace(message: string, ...details: unknown[]): void;
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
  /** Logger for a sub-component, e.g. `HostLoop:hello`. */
  child(scope: string): Logger;
}

export interface ConsoleLoggerOptions {
  scope: string;
  /** Lowest level written. Defaults to `info`. */
  level?: LogThreshold;
}

/**
 * Logger writing `[scope] message` lines to the console.
 */
export function createConsoleLogger(opts: ConsoleLoggerOptions): Logger {
  const threshold = SEVERITY[opts.level ?? "info"];

  const log = (level: LogLevel, message: string, ...details: unknown[]) => {
    if (SEVERITY[level] < threshold) return;
    const line = `[${opts.scope}] ${message}`;
    switch (level) {
      case "trace":
      case "debug":
        console.debug(line, ...details);
        break;
      case "info":
        console.info(line, ...details);
        break;
      case "warn":
        console.warn(line, ...details);
        break;
      case "error":
        console.error(line, ...details);
        break;
    }
  };

  return {
    scope: opts.scope,
    log,
    trace: (message, ...details) => log("trace", message, ...details),
    debug: (message, ...details) => log("debug", message, ...details),
    info: (message, ...details) => log("info", message, ...details),
    warn: (message, ...details) => log("warn", message, ...details),
    error: (message, ...details) => log("error", message, ...details),
    child: (scope) =>
      createConsoleLogger({ ...opts, scope: `${opts.scope}:${scope}` }),
  };
}
