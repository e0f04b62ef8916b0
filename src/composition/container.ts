import type { Settings } from '../config';
import { ConsoleLogger } from '../adapters/sys/ConsoleLogger';
import { FileStorage } from '../adapters/sys/FileStorage';
import { NodeTime } from '../adapters/sys/NodeTime';
import { HttpAttendanceClient } from '../adapters/worklog/HttpAttendanceClient';
import { HttpTokenClient } from '../adapters/worklog/HttpTokenClient';
import { PushService } from '../app/PushService';
import { TokenService } from '../app/TokenService';
import { TimerEngine } from '../domain/timers/TimerEngine';
import { TimerStore } from '../domain/timers/TimerStore';
import type { LoggerPort } from '../ports/sys/LoggerPort';
import type { StoragePort } from '../ports/sys/StoragePort';
import type { TimePort } from '../ports/sys/TimePort';
import type { AttendancePort } from '../ports/worklog/AttendancePort';
import type { TokenPort } from '../ports/worklog/TokenPort';

export interface Application {
  engine: TimerEngine;
  pushService: PushService;
  tokenService: TokenService;
  logger: LoggerPort;
}

/** Replacements for the default adapters, mostly for tests. */
export interface ApplicationOverrides {
  storage?: StoragePort;
  time?: TimePort;
  logger?: LoggerPort;
  attendance?: AttendancePort;
  tokens?: TokenPort;
}

export function buildApplication(
  settings: Settings,
  overrides: ApplicationOverrides = {},
): Application {
  const logger = overrides.logger ?? new ConsoleLogger({ debug: settings.debug });
  const time = overrides.time ?? new NodeTime();
  const storage = overrides.storage ?? new FileStorage();

  const store = new TimerStore(storage, settings.stateFile);
  const engine = new TimerEngine(store, time, logger);

  const attendance =
    overrides.attendance ??
    new HttpAttendanceClient({
      apiUrl: settings.apiUrl,
      apiToken: settings.apiToken,
      attendancesPath: settings.attendancesPath,
    });
  const pushService = new PushService(store, attendance, time, logger);

  const tokens =
    overrides.tokens ??
    new HttpTokenClient({
      apiUrl: settings.apiUrl,
      functionKey: settings.tokenFunctionKey,
      tokenPath: settings.tokenPath,
    });
  const tokenService = new TokenService(tokens, logger);

  logger.debug('Using timer state file', { path: settings.stateFile });

  return { engine, pushService, tokenService, logger };
}
