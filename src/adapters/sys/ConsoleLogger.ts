import type { LoggerPort } from "../../ports/sys/LoggerPort";

type Level = "debug" | "info" | "warn" | "error";

export interface ConsoleLoggerOptions {
  /** Emit `debug` lines; they are dropped otherwise. */
  debug?: boolean;
}

function log(level: Level, message: string, meta?: Record<string, unknown>) {
  const payload = meta && Object.keys(meta).length ? `${message} ${JSON.stringify(meta)}` : message;
  switch (level) {
    case "debug":
      return console.debug(payload);
    case "info":
      return console.info(payload);
    case "warn":
      return console.warn(payload);
    case "error":
      return console.error(payload);
  }
}

export class ConsoleLogger implements LoggerPort {
  private readonly debugEnabled: boolean;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.debugEnabled = options.debug ?? false;
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    if (!this.debugEnabled) return;
    log("debug", message, meta);
  }
  info(message: string, meta?: Record<string, unknown>): void {
    log("info", message, meta);
  }
  warn(message: string, meta?: Record<string, unknown>): void {
    log("warn", message, meta);
  }
  error(message: string, meta?: Record<string, unknown>): void {
    log("error", message, meta);
  }
}
