import pino from 'pino'
import { type LogLevel, loadBaseEnv } from '../env'

type MessageLevel = 'info' | 'debug' | 'warn' | 'error'

/**
 * LoggerProvider is a class that provides logging functionality.
 * It is a wrapper around the pino logger.
 * @description Call `init()` at the top of an entry point before relying on pino output;
 * until then messages fall back to the console, filtered by the same level.
 * The shared `logger` takes LOG_LEVEL from the environment and any .env file.
 */
export class LoggerProvider {
  private configuredLevel: LogLevel
  private pino: pino.Logger
  private hasBeenInitialized = false

  constructor(level: LogLevel = 'info') {
    this.configuredLevel = level
    this.pino = pino(
      { level },
      pino.multistream([
        { level: 'error', stream: process.stderr },
        { level: 'fatal', stream: process.stderr },
        { level: 'debug', stream: process.stdout },
      ]),
    )
  }

  get hasBeenInitializedValue() {
    return this.hasBeenInitialized
  }

  get level(): LogLevel {
    return this.configuredLevel
  }

  init() {
    this.pino.info('LoggerProvider initialized')
    this.hasBeenInitialized = true
  }

  info(message: string, ...args: unknown[]) {
    this._safeLog('info', message, args)
  }

  debug(message: string, ...args: unknown[]) {
    this._safeLog('debug', message, args)
  }

  warn(message: string, ...args: unknown[]) {
    this._safeLog('warn', message, args)
  }

  error(message: string, error?: unknown, ..._args: unknown[]) {
    this._safeLog('error', message, [error, ..._args])
  }

  setLevel(level: LogLevel) {
    this.configuredLevel = level
    this.pino.level = level
  }

  isLevelEnabled(level: MessageLevel): boolean {
    return pino.levels.values[level] >= pino.levels.values[this.configuredLevel]
  }

  private _safeLog(level: MessageLevel, message: string, args: unknown[]) {
    if (!this.hasBeenInitialized) {
      if (!this.isLevelEnabled(level)) return

      // Log to console as fallback when logger is not initialized
      const timestamp = new Date().toISOString()
      const logMessage = `[${timestamp}] [${level.toUpperCase()}] ${message}`

      if (level === 'error') {
        console.error(logMessage, ...args)
      } else if (level === 'warn') {
        console.warn(logMessage, ...args)
      } else if (level === 'debug') {
        console.debug(logMessage, ...args)
      } else {
        console.log(logMessage, ...args)
      }
      return
    }

    if (level === 'error') {
      this.pino.error({ err: args[0], args: args.slice(1) }, message)
    } else {
      this.pino[level]({ args }, message)
    }
  }
}

export const logger = new LoggerProvider(loadBaseEnv().LOG_LEVEL)
