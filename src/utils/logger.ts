import chalk from "chalk"

export enum LogLevel {
  ERROR = 0,
  WARN = 1,
  INFO = 2,
  DEBUG = 3,
}

export type LoggerOptions = {
  readonly level?: LogLevel
  readonly prefix?: string
}

export type Logger = {
  readonly level: LogLevel
  readonly prefix: string
  error(message: string, error?: Error): void
  warn(message: string): void
  info(message: string): void
  debug(message: string): void
  success(message: string): void
  createChild(prefix: string): Logger
}

const resolveDefaultLogLevel = (): LogLevel => {
  if (process.env.CPPFORGE_DEBUG === "true") {
    return LogLevel.DEBUG
  }
  if (process.env.CPPFORGE_VERBOSE === "true") {
    return LogLevel.INFO
  }
  return LogLevel.WARN
}

/**
 * Creates a logger writing to the console.
 * Success messages are printed at every level.
 */
export const createLogger = (options: LoggerOptions = {}): Logger => {
  const level = options.level ?? resolveDefaultLogLevel()
  const prefix = options.prefix ?? ""

  const formatMessage = (message: string): string => {
    return prefix ? `${prefix} ${message}` : message
  }

  return {
    level,
    prefix,
    error(message: string, error?: Error): void {
      if (level >= LogLevel.ERROR) {
        console.error(chalk.red(formatMessage(`Error: ${message}`)))
        if (error && process.env.CPPFORGE_DEBUG === "true") {
          console.error(chalk.gray(error.stack))
        }
      }
    },
    warn(message: string): void {
      if (level >= LogLevel.WARN) {
        console.warn(chalk.yellow(formatMessage(message)))
      }
    },
    info(message: string): void {
      if (level >= LogLevel.INFO) {
        console.log(formatMessage(message))
      }
    },
    debug(message: string): void {
      if (level >= LogLevel.DEBUG) {
        console.log(chalk.gray(formatMessage(`[DEBUG] ${message}`)))
      }
    },
    success(message: string): void {
      console.log(chalk.green(formatMessage(message)))
    },
    createChild(childPrefix: string): Logger {
      const nextPrefix = prefix ? `${prefix} ${childPrefix}` : childPrefix
      return createLogger({ level, prefix: nextPrefix })
    },
  }
}
