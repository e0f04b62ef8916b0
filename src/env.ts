import { config } from 'dotenv';
import { splitGlobalFlags } from './cli/args';

config();

export const WORKLOG_API_URL = process.env.WORKLOG_API_URL || undefined;
export const WORKLOG_API_TOKEN = process.env.WORKLOG_API_TOKEN || undefined;
export const WORKLOG_TOKEN_FUNCTION_KEY = process.env.WORKLOG_TOKEN_FUNCTION_KEY || undefined;

const { globals } = splitGlobalFlags(process.argv.slice(2));

export const DEBUG_MODE = globals.debug ?? process.env.DEBUG_MODE === 'true';
export const CONFIG_PATH = globals.configPath;
export const LOG_FILE = globals.logFile;
export const STATE_FILE = globals.stateFile || process.env.WORKLOG_STATE_FILE || undefined;
