/**
 * pino logger factory. Components take a child logger tagged with
 * `component`, so every line says which part of the server wrote it.
 */

import { pino, type Logger, type LevelWithSilent } from "pino";

export type { Logger };
export type LogFormat = "json" | "pretty";

export interface LoggerOptions {
  level?: LevelWithSilent;
  /** "pretty" routes through the pino-pretty transport (development). */
  format?: LogFormat;
  name?: string;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const base = {
    name: options.name ?? "pairtalk",
    level: options.level ?? "info",
  };
  if (options.format === "pretty") {
    return pino({
      ...base,
      transport: {
        target: "pino-pretty",
        options: { colorize: true, translateTime: "SYS:standard" },
      },
    });
  }
  return pino(base);
}

export function createSilentLogger(): Logger {
  return pino({ level: "silent" });
}
