/**
 * Structured logger using pino
 *
 * import { createLogger } from "@bridge-driver/core"
 */

import { pino } from "pino"

export type LogLevel = "debug" | "info" | "warn" | "error"

const LOG_LEVELS: readonly string[] = ["debug", "info", "warn", "error", "silent"]

function levelFromEnv(): string {
  const level = process.env["LOG_LEVEL"]
  return level !== undefined && LOG_LEVELS.includes(level) ? level : "info"
}

const baseLogger = pino({
  level: levelFromEnv(),
  formatters: {
    level: (label) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
})

export interface Logger {
  debug: (message: string, data?: Record<string, unknown>) => void
  info: (message: string, data?: Record<string, unknown>) => void
  warn: (message: string, data?: Record<string, unknown>) => void
  error: (message: string, data?: Record<string, unknown>) => void
}

export interface LoggerConfig {
  level?: LogLevel
  silent?: boolean
}

/**
 * Create a logger instance for a specific component
 */
export function createLogger(service: string, config?: LoggerConfig): Logger {
  const logger = baseLogger.child({ service })

  if (config?.level) {
    logger.level = config.level
  }

  if (config?.silent) {
    logger.level = "silent"
  }

  return {
    debug: (message, data) => (data ? logger.debug(data, message) : logger.debug(message)),
    info: (message, data) => (data ? logger.info(data, message) : logger.info(message)),
    warn: (message, data) => (data ? logger.warn(data, message) : logger.warn(message)),
    error: (message, data) => (data ? logger.error(data, message) : logger.error(message)),
  }
}
