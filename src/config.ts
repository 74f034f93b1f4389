import { DEFAULT_LOG_LEVEL, LogLevel, parseLogLevel } from "./utils/logger";

export interface MonitorConfig {
  ouiFile: string;
  refreshIntervalMs: number;
  historyDepth: number;
  logLevel: LogLevel;
  color: boolean;
}

export const DEFAULT_CONFIG: MonitorConfig = {
  ouiFile: "manuf",
  refreshIntervalMs: 5000,
  historyDepth: 10,
  logLevel: DEFAULT_LOG_LEVEL,
  color: true,
};

function positiveInt(value: string | undefined, fallback: number): number {
  if (value === undefined || !/^\s*\d+\s*$/.test(value)) {
    return fallback;
  }
  const parsed = parseInt(value, 10);
  return parsed > 0 ? parsed : fallback;
}

/**
 * Build the monitor configuration from environment variables.
 * Missing or malformed values fall back to the defaults.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): MonitorConfig {
  return {
    ouiFile: env.OUI_FILE?.trim() || DEFAULT_CONFIG.ouiFile,
    refreshIntervalMs: positiveInt(env.REFRESH_INTERVAL_MS, DEFAULT_CONFIG.refreshIntervalMs),
    historyDepth: positiveInt(env.HISTORY_DEPTH, DEFAULT_CONFIG.historyDepth),
    logLevel: parseLogLevel(env.LOG_LEVEL),
    color: !env.NO_COLOR,
  };
}
