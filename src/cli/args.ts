import { UsageError } from "../domain/errors";

export type Command =
  | { name: "start" }
  | { name: "stop" }
  | { name: "reset" }
  | { name: "status"; all: boolean }
  | { name: "push"; message: string; hours?: number }
  | { name: "token"; email: string }
  | { name: "help" };

export interface GlobalFlags {
  configPath?: string;
  logFile?: string;
  stateFile?: string;
  debug?: boolean;
}

/** Command options whose next token is a value, even when it looks like a flag. */
const COMMAND_VALUE_OPTIONS = new Set(["-m", "--message", "-t", "--time", "-e", "--email"]);

/**
 * Separates the global flags (any position) from the command and its options.
 * Repeated flags: last one wins.
 */
export function splitGlobalFlags(argv: readonly string[]): { globals: GlobalFlags; args: string[] } {
  const globals: GlobalFlags = {};
  const args: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case "--config":
        if (argv[i + 1]) globals.configPath = argv[++i];
        break;
      case "--log-file":
        if (argv[i + 1]) globals.logFile = argv[++i];
        break;
      case "--state-file":
        if (argv[i + 1]) globals.stateFile = argv[++i];
        break;
      case "--debug":
        globals.debug = true;
        break;
      case "--no-debug":
        globals.debug = false;
        break;
      default:
        args.push(arg);
        if (COMMAND_VALUE_OPTIONS.has(arg) && i + 1 < argv.length) {
          args.push(argv[++i]);
        }
        break;
    }
  }

  return { globals, args };
}

export function parseArgs(argv: readonly string[]): Command {
  const { args } = splitGlobalFlags(argv);
  const name: string | undefined = args[0];
  const rest = args.slice(1);

  switch (name) {
    case undefined:
    case "help":
    case "-h":
    case "--help":
      return { name: "help" };
    case "start":
    case "stop":
    case "reset":
      expectNoArgs(name, rest);
      return { name };
    case "status":
      return parseStatus(rest);
    case "push":
      return parsePush(rest);
    case "token":
      return parseToken(rest);
    default:
      throw new UsageError(`Unknown command "${name}". Run 'worklog help' for usage.`);
  }
}

const DECIMAL_HOURS = /^\d+(\.\d+)?$/;

export function parseHours(raw: string): number {
  const value = DECIMAL_HOURS.test(raw.trim()) ? Number(raw.trim()) : Number.NaN;
  if (!Number.isFinite(value) || value < 0) {
    throw new UsageError(`Invalid hours "${raw}": expected a non-negative number such as 4.5.`);
  }
  return value;
}

function parseStatus(rest: string[]): Command {
  let all = false;
  for (const arg of rest) {
    if (arg === "-a" || arg === "--all") {
      all = true;
      continue;
    }
    throw new UsageError(`Unexpected argument "${arg}" for status.`);
  }
  return { name: "status", all };
}

function parsePush(rest: string[]): Command {
  let message = "";
  let hours: number | undefined;
  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];
    switch (arg) {
      case "-m":
      case "--message":
        message = takeValue(rest, ++i, arg);
        break;
      case "-t":
      case "--time":
        hours = parseHours(takeValue(rest, ++i, arg));
        break;
      default:
        throw new UsageError(`Unexpected argument "${arg}" for push.`);
    }
  }
  return hours === undefined ? { name: "push", message } : { name: "push", message, hours };
}

function parseToken(rest: string[]): Command {
  let email = "";
  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];
    if (arg === "-e" || arg === "--email") {
      email = takeValue(rest, ++i, arg);
      continue;
    }
    throw new UsageError(`Unexpected argument "${arg}" for token.`);
  }
  return { name: "token", email };
}

function takeValue(args: string[], index: number, flag: string): string {
  const value = args[index];
  if (value === undefined) {
    throw new UsageError(`Option ${flag} expects a value.`);
  }
  return value;
}

function expectNoArgs(name: string, rest: string[]) {
  if (rest.length) {
    throw new UsageError(`Command ${name} takes no arguments, got "${rest.join(" ")}".`);
  }
}

export const USAGE = `Usage: worklog <command> [options]

Start, stop and push your daily work logs.

Commands:
  start                     Start a new work timer, or do nothing if one is running.
  stop                      Stop the current work timer.
  status [-a|--all]         Show the last timer, or every timer and the total.
  push -m <text> [-t <h>]   Send the last timer (or <h> hours) to the attendance API.
  reset                     Reset the timer completely.

Global options:
  --state-file <path>       Timer state file (default: worklog.state.json)
  --config <path>           JSON config file (default: worklog.config.json)
  --log-file <path>         Mirror output into a log file
  --debug / --no-debug      Toggle debug output`;
