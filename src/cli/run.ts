import type { Application } from "../composition/container";
import { WorklogError } from "../domain/errors";
import { parseArgs, USAGE, type Command } from "./args";
import { formatStatus } from "./format";

export type Output = (line: string) => void;

const stdout: Output = (line) => console.log(line);

/** Parses and runs one command, resolving to the process exit code. */
export async function runCli(
  argv: readonly string[],
  app: Application,
  out: Output = stdout
): Promise<number> {
  try {
    await execute(parseArgs(argv), app, out);
    return 0;
  } catch (err) {
    return report(err, app);
  }
}

async function execute(command: Command, app: Application, out: Output): Promise<void> {
  switch (command.name) {
    case "start": {
      const result = await app.engine.start();
      out(result.outcome === "started" ? "New timer started." : "Timer is already running.");
      return;
    }
    case "stop": {
      const result = await app.engine.stop();
      out(result.outcome === "stopped" ? "Timer stopped." : "No timer is currently running.");
      return;
    }
    case "status": {
      const report = await app.engine.status(command.all);
      for (const line of formatStatus(report, command.all)) out(line);
      return;
    }
    case "push": {
      const result = await app.pushService.push(command.message, command.hours);
      out("Response from the attendance API:");
      out(result.body);
      return;
    }
    case "reset":
      await app.engine.reset();
      out("Timer has been reset.");
      return;
    case "token": {
      const token = await app.tokenService.fetchToken(command.email);
      out(token);
      return;
    }
    case "help":
      for (const line of USAGE.split("\n")) out(line);
      return;
  }
}

function report(err: unknown, app: Application): number {
  if (err instanceof WorklogError) {
    app.logger.error(err.message);
    return err.exitCode;
  }
  const message = err instanceof Error ? err.message : String(err);
  app.logger.error(`Unexpected error: ${message}`);
  if (err instanceof Error && err.stack) {
    app.logger.debug(err.stack);
  }
  return 1;
}
