import fs from "fs";
import path from "path";
import { z } from "zod";

const AppConfigSchema = z.object({
  api: z
    .object({
      url: z.string().url().optional(),
      attendancesPath: z.string().min(1).optional(),
      tokenPath: z.string().min(1).optional(),
    })
    .optional(),
  stateFile: z.string().min(1).optional(),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;

const DEFAULT_CONFIG_FILENAMES = ["worklog.config.json", ".worklogrc.json"];

export const DEFAULT_STATE_FILE = "worklog.state.json";
export const DEFAULT_ATTENDANCES_PATH = "/api/plog/attendances";
export const DEFAULT_TOKEN_PATH = "/api/plog/token";

export interface LoadedConfig {
  config: AppConfig;
  path?: string;
}

export function loadConfig(configPath?: string, cwd: string = process.cwd()): LoadedConfig {
  const searchPaths = configPath
    ? [path.resolve(cwd, configPath)]
    : DEFAULT_CONFIG_FILENAMES.map((name) => path.resolve(cwd, name));

  for (const candidate of searchPaths) {
    try {
      if (!fs.existsSync(candidate)) continue;
      const raw = fs.readFileSync(candidate, "utf8");
      const parsed = AppConfigSchema.safeParse(JSON.parse(raw));
      if (!parsed.success) {
        const issue = parsed.error.issues[0];
        console.warn(`Ignoring config ${candidate}: ${issue.path.join(".") || "root"} ${issue.message}`);
        continue;
      }
      return { config: parsed.data, path: candidate };
    } catch (err) {
      console.warn(`Failed to load config from ${candidate}:`, err);
    }
  }

  return { config: {} };
}

export interface EnvSettings {
  apiUrl?: string;
  apiToken?: string;
  tokenFunctionKey?: string;
  stateFile?: string;
  debug?: boolean;
}

export interface Settings {
  apiUrl?: string;
  apiToken?: string;
  tokenFunctionKey?: string;
  attendancesPath: string;
  tokenPath: string;
  /** Absolute path of the timer state file. */
  stateFile: string;
  debug: boolean;
}

/**
 * Flags and env vars win over the config file, which wins over defaults.
 * A state file from the environment resolves against `cwd`; one from the
 * config file resolves against `configDir`, the directory holding that file.
 */
export function resolveSettings(
  env: EnvSettings,
  appConfig: AppConfig,
  cwd: string = process.cwd(),
  configDir: string = cwd
): Settings {
  return {
    apiUrl: env.apiUrl ?? appConfig.api?.url,
    apiToken: env.apiToken,
    tokenFunctionKey: env.tokenFunctionKey,
    attendancesPath: appConfig.api?.attendancesPath ?? DEFAULT_ATTENDANCES_PATH,
    tokenPath: appConfig.api?.tokenPath ?? DEFAULT_TOKEN_PATH,
    stateFile: env.stateFile
      ? path.resolve(cwd, env.stateFile)
      : path.resolve(appConfig.stateFile ? configDir : cwd, appConfig.stateFile ?? DEFAULT_STATE_FILE),
    debug: env.debug ?? false,
  };
}
