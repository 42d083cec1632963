import type { LogLevel, ReplayLogger } from "./types";

const noop = (): void => undefined;

export const NOOP_LOGGER: ReplayLogger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
};

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function createConsoleLogger(prefix = "Replay", level: LogLevel = "debug"): ReplayLogger {
  const enabled = (candidate: LogLevel): boolean => LEVEL_ORDER[candidate] >= LEVEL_ORDER[level];
  return {
    debug: (message, meta) => {
      if (enabled("debug")) console.debug(`[${prefix}] ${message}`, meta ?? "");
    },
    info: (message, meta) => {
      if (enabled("info")) console.info(`[${prefix}] ${message}`, meta ?? "");
    },
    warn: (message, meta) => {
      if (enabled("warn")) console.warn(`[${prefix}] ${message}`, meta ?? "");
    },
    error: (message, meta) => {
      if (enabled("error")) console.error(`[${prefix}] ${message}`, meta ?? "");
    },
  };
}
