import { env } from "../config/env";

type Level = "debug" | "info" | "warn" | "error";

const RANK: Record<Level | "silent", number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

function enabled(level: Level): boolean {
  return RANK[level] >= RANK[env.LOG_LEVEL];
}

/**
 * Console logger with a bracketed component tag, e.g. `[fetch] ...`.
 * Filtered by LOG_LEVEL; tests run with `silent`.
 */
export function createLogger(component: string) {
  const tag = `[${component}]`;
  return {
    debug: (...args: unknown[]) => {
      if (enabled("debug")) console.debug(tag, ...args);
    },
    info: (...args: unknown[]) => {
      if (enabled("info")) console.log(tag, ...args);
    },
    warn: (...args: unknown[]) => {
      if (enabled("warn")) console.warn(tag, ...args);
    },
    error: (...args: unknown[]) => {
      if (enabled("error")) console.error(tag, ...args);
    }
  };
}

