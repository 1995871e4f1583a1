import {
  defineCapability,
  isLogLevel,
  type Logger,
  type LogLevel,
  system,
} from "@modhost/core";

/** Writes to the host's console output. */
export interface Log {
  log(level: LogLevel, message: string): void;
}

export const Log = defineCapability("engine.log").of<Log>(["log"]);

/**
 * Serves `Log` by forwarding to the host logger under a `mods` scope.
 */
export function hostLoggerSystem(logger: Logger) {
  return system("host-logger")
    .create(() => logger.child("mods"))
    .provides(Log, (out) => ({
      log(level: unknown, message: unknown) {
        if (!isLogLevel(level)) {
          throw new RangeError(`Unknown log level "${String(level)}".`);
        }
        out.log(level, String(message));
      },
    }))
    .build();
}
