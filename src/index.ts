#!/usr/bin/env node
import path from "path";
import { buildApplication } from "./composition/container";
import { loadConfig, resolveSettings } from "./config";
import { runCli } from "./cli/run";
import { initializeLogging } from "./runtime/logging";
import {
  CONFIG_PATH,
  DEBUG_MODE,
  LOG_FILE,
  STATE_FILE,
  WORKLOG_API_TOKEN,
  WORKLOG_API_URL,
  WORKLOG_TOKEN_FUNCTION_KEY,
} from "./env";

async function main(): Promise<number> {
  const loggingHandle = initializeLogging(LOG_FILE);

  try {
    const { config: appConfig, path: configPath } = loadConfig(CONFIG_PATH);
    if (!configPath && CONFIG_PATH) {
      console.warn(`Config file ${CONFIG_PATH} not found; proceeding with defaults.`);
    }

    const settings = resolveSettings(
      {
        apiUrl: WORKLOG_API_URL,
        apiToken: WORKLOG_API_TOKEN,
        tokenFunctionKey: WORKLOG_TOKEN_FUNCTION_KEY,
        stateFile: STATE_FILE,
        debug: DEBUG_MODE,
      },
      appConfig,
      process.cwd(),
      configPath ? path.dirname(configPath) : process.cwd()
    );

    const app = buildApplication(settings);
    if (configPath) {
      app.logger.debug(`Loaded config from ${configPath}`);
    }
    return await runCli(process.argv.slice(2), app);
  } finally {
    await loggingHandle.shutdown();
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    console.error(err);
    process.exitCode = 1;
  });
