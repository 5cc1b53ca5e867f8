/**
 * Tagged console logger: every line is prefixed with `[Scope]`.
 */
import type { LogLevel } from "../constants";

export type LogSink = Pick<Console, "debug" | "info" | "warn" | "error">;

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
  child(scope: string): Logger;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export function createLogger(
  scope: string,
  sink: LogSink = console,
  level: LogLevel = "info",
): Logger {
  const threshold = LEVEL_ORDER[level];
  const prefix = `[${scope}]`;
  const emit =
    (method: Exclude<LogLevel, "silent">) =>
    (message: string, ...details: unknown[]) => {
      if (LEVEL_ORDER[method] < threshold) return;
      sink[method](`${prefix} ${message}`, ...details);
    };

  return {
    debug: emit("debug"),
    info: emit("info"),
    warn: emit("warn"),
    error: emit("error"),
    child: (childScope) => createLogger(`${scope}:${childScope}`, sink, level),
  };
}
