import { LOG_LEVELS, type LogLevel } from "../config/bridge.config";
import type { BridgeLogger } from "./types";

/**
 * Console logger used when no `logger` is passed to `KafkaBridge`.
 * Every line is prefixed with `[KafkaBridge:<clientId>]`. Errors are always
 * printed; lower levels follow `level`.
 */
export function createConsoleLogger(
  clientId: string,
  level: LogLevel = "info",
): BridgeLogger {
  const prefix = `[KafkaBridge:${clientId}]`;
  const threshold = LOG_LEVELS.indexOf(level);
  const enabled = (l: LogLevel) => LOG_LEVELS.indexOf(l) >= threshold;

  return {
    log: (msg) => {
      if (enabled("info")) console.log(`${prefix} ${msg}`);
    },
    warn: (msg, ...args) => {
      if (enabled("warn")) console.warn(`${prefix} ${msg}`, ...args);
    },
    error: (msg, ...args) => console.error(`${prefix} ${msg}`, ...args),
    debug: enabled("debug")
      ? (msg, ...args) => console.debug(`${prefix} ${msg}`, ...args)
      : undefined,
  };
}
