import pino, { type Logger } from "pino";

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export type { Logger };

/** Root logger writing JSON lines to stderr. */
export function createLogger(level: LogLevel, name: string): Logger {
  return pino(
    {
      name,
      level,
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.destination(2),
  );
}

export function createSilentLogger(): Logger {
  return pino({ level: "silent" });
}
