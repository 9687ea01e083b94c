/* eslint-disable no-console */
import pc from 'picocolors'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
}

const isLogLevel = (value: string): value is LogLevel => value in LEVEL_ORDER

export interface Logger {
  readonly name: string
  debug: (message: string, ...details: unknown[]) => void
  info: (message: string, ...details: unknown[]) => void
  warn: (message: string, ...details: unknown[]) => void
  error: (message: string, ...details: unknown[]) => void
}

/**
 * Reads the threshold from LOG_LEVEL, defaulting to info.
 */
export const resolveLogLevel = (value: string | undefined = process.env.LOG_LEVEL): LogLevel => {
  const normalized = value?.trim().toLowerCase() ?? ''
  return isLogLevel(normalized) ? normalized : 'info'
}

/**
 * Creates a console logger that prefixes every line with `[name]`.
 */
export const createLogger = (name: string, level: LogLevel = resolveLogLevel()): Logger => {
  const threshold = LEVEL_ORDER[level]
  const enabled = (messageLevel: LogLevel): boolean => LEVEL_ORDER[messageLevel] >= threshold

  return {
    name,
    debug: (message, ...details) => {
      if (enabled('debug')) console.debug(pc.gray(`[${name}]`), message, ...details)
    },
    info: (message, ...details) => {
      if (enabled('info')) console.log(pc.cyan(`[${name}]`), message, ...details)
    },
    warn: (message, ...details) => {
      if (enabled('warn')) console.warn(pc.yellow(`[${name}]`), message, ...details)
    },
    error: (message, ...details) => {
      if (enabled('error')) console.error(pc.red(`[${name}]`), message, ...details)
    },
  }
}
