import { nowUtcIsoSeconds } from "./time";

export type LogLevel = "info" | "warn" | "error";

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string, error?: unknown): void;
}

function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

export function formatLogLine(level: LogLevel, component: string, message: string): string {
  return `[${nowUtcIsoSeconds()}] ${level.toUpperCase()} ${component}: ${message}`;
}

export function createConsoleLogger(component: string): Logger {
  return {
    info(message) {
      console.log(formatLogLine("info", component, message));
    },
    warn(message) {
      console.warn(formatLogLine("warn", component, message));
    },
    error(message, error) {
      const suffix = error === undefined ? "" : ` (${describeError(error)})`;
      console.error(formatLogLine("error", component, `${message}${suffix}`));
    }
  };
}
