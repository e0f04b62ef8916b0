import { createWriteStream, existsSync, mkdirSync } from "fs";
import path from "path";

export interface LoggingHandle {
  readonly logPath?: string;
  shutdown(): Promise<void>;
}

type ConsoleLevel = "log" | "debug" | "info" | "warn" | "error";

/**
 * Mirrors console output into `logFile` (appending) until `shutdown` is called.
 * Without a log file this is a no-op.
 */
export function initializeLogging(logFile?: string): LoggingHandle {
  if (!logFile) {
    return {
      shutdown: async () => undefined,
    };
  }

  const resolvedLog = path.resolve(logFile);
  const logDir = path.dirname(resolvedLog);
  if (!existsSync(logDir)) {
    mkdirSync(logDir, { recursive: true });
  }

  const stream = createWriteStream(resolvedLog, { flags: "a" });
  const startedAt = new Date().toISOString();
  stream.write(`[${startedAt}] --- worklog ${process.argv.slice(2).join(" ")} ---\n`);

  const original: Record<ConsoleLevel, (...args: unknown[]) => void> = {
    log: console.log.bind(console),
    debug: console.debug.bind(console),
    info: console.info.bind(console),
    warn: console.warn.bind(console),
    error: console.error.bind(console),
  };

  stream.on("error", (err) => {
    original.warn(`Log file ${resolvedLog} is not writable: ${err.message}`);
  });

  const mirror =
    (level: ConsoleLevel) =>
    (...args: unknown[]) => {
      original[level](...args);
      const timestamp = new Date().toISOString();
      const message = args.map(stringify).join(" ");
      stream.write(`[${timestamp}] ${level.toUpperCase()} ${message}\n`);
    };

  console.log = mirror("log");
  console.debug = mirror("debug");
  console.info = mirror("info");
  console.warn = mirror("warn");
  console.error = mirror("error");

  const shutdown = () =>
    new Promise<void>((resolve) => {
      console.log = original.log;
      console.debug = original.debug;
      console.info = original.info;
      console.warn = original.warn;
      console.error = original.error;
      const endedAt = new Date().toISOString();
      stream.end(`[${endedAt}] --- session ended ---\n`, () => resolve());
    });

  return {
    logPath: resolvedLog,
    shutdown,
  };
}

function stringify(arg: unknown): string {
  if (typeof arg === "string") return arg;
  if (arg instanceof Error) return arg.stack ?? arg.message;
  try {
    return JSON.stringify(arg) ?? String(arg);
  } catch {
    return String(arg);
  }
}
