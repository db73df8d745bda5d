/**
 * Leveled logger with coloured prefixes
 *
 * debug/info go to the sink's log, warn/error to its error stream.
 */

import chalk from "chalk";
import type { Logger, LogSink } from "#/core";
import { LOG_LEVELS, type LogLevel } from "#/schemas";

export const consoleSink: LogSink = {
  log: (message) => console.log(message),
  error: (message) => console.error(message),
};

export function shouldLog(level: LogLevel, threshold: LogLevel): boolean {
  return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(threshold);
}

export function createLogger(threshold: LogLevel = "info", sink: LogSink = consoleSink): Logger {
  return {
    debug(message) {
      if (shouldLog("debug", threshold)) {
        sink.log(chalk.gray(`[DEBUG] ${message}`));
      }
    },
    info(message) {
      if (shouldLog("info", threshold)) {
        sink.log(`[INFO] ${message}`);
      }
    },
    warn(message) {
      if (shouldLog("warn", threshold)) {
        sink.error(chalk.yellow(`[WARN] ${message}`));
      }
    },
    error(message) {
      if (shouldLog("error", threshold)) {
        sink.error(chalk.red(`[ERROR] ${message}`));
      }
    },
  };
}
