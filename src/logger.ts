/**
 * Configurable Logger
 *
 * Provides a centralized logging mechanism that can be configured or disabled.
 * By default, logging is disabled so the library never writes to stdout on
 * its own. Every record is tagged with the module that emitted it.
 */

import { PACKAGE_NAME } from "./constants.js";

export type LogLevel = "debug" | "info" | "warn" | "error" | "none";

/**
 * Modules that emit log records.
 */
export type LogModule = "config" | "client" | "pricing";

export interface LoggerConfig {
  /**
   * Minimum log level to output. Set to "none" to disable all logging.
   * @default "none"
   */
  level: LogLevel;

  /**
   * Custom logger implementation. If provided, all logs will be sent to this function.
   * This allows integration with existing logging frameworks (winston, pino, etc.)
   */
  custom?: (level: LogLevel, message: string, ...args: unknown[]) => void;
}

/**
 * Logger bound to one module tag.
 */
export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  none: 4,
};

// Global configuration - defaults to disabled
let config: LoggerConfig = {
  level: "none",
};

/**
 * Configure the pplx-query logger.
 *
 * @example
 * ```typescript
 * import { configureLogger } from 'pplx-query';
 *
 * // Enable warning and error logs
 * configureLogger({ level: 'warn' });
 *
 * // Use custom logger
 * configureLogger({
 *   level: 'debug',
 *   custom: (level, message, ...args) => {
 *     myLogger[level](message, ...args);
 *   }
 * });
 * ```
 */
export function configureLogger(newConfig: Partial<LoggerConfig>): void {
  config = { ...config, ...newConfig };
}

/**
 * Get the current logger configuration.
 */
export function getLoggerConfig(): LoggerConfig {
  return { ...config };
}

/**
 * Reset logger to default configuration (disabled).
 */
export function resetLogger(): void {
  config = { level: "none" };
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[config.level];
}

function log(
  level: LogLevel,
  module: LogModule,
  message: string,
  ...args: unknown[]
): void {
  if (!shouldLog(level)) {
    return;
  }

  const formattedMessage = `[${PACKAGE_NAME}:${module}] ${message}`;

  if (config.custom) {
    config.custom(level, formattedMessage, ...args);
    return;
  }

  switch (level) {
    case "debug":
      console.debug(formattedMessage, ...args);
      break;
    case "info":
      console.info(formattedMessage, ...args);
      break;
    case "warn":
      console.warn(formattedMessage, ...args);
      break;
    case "error":
      console.error(formattedMessage, ...args);
      break;
  }
}

/**
 * Create a logger whose records carry the given module tag.
 * Output still follows the global configuration at call time.
 */
export function createLogger(module: LogModule): Logger {
  return {
    debug: (message, ...args) => log("debug", module, message, ...args),
    info: (message, ...args) => log("info", module, message, ...args),
    warn: (message, ...args) => log("warn", module, message, ...args),
    error: (message, ...args) => log("error", module, message, ...args),
  };
}
