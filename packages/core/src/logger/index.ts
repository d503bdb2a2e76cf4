import pino from 'pino'

type LogLevel = 'info' | 'debug' | 'warn' | 'error'

const DEFAULT_LEVEL = 'info'

/**
 * LOG_LEVEL when it names a pino level, the default otherwise
 */
function resolveLevel(): string {
  const level = process.env['LOG_LEVEL']
  return level && level in pino.levels.values ? level : DEFAULT_LEVEL
}

/**
 * LoggerProvider is a class that provides logging functionality.
 * It is a wrapper around the pino logger.
 * It is a singleton class.
 * @description Call `init()` once at the top of an entry point (or in a test's `beforeAll`) before relying on structured output.
 */
export class LoggerProvider {
  private pino = pino(
    {
      level: resolveLevel(),
    },
    pino.multistream([
      { level: 'error', stream: process.stderr },
      { level: 'fatal', stream: process.stderr },
      { level: 'debug', stream: process.stdout },
    ]),
  )
  private hasBeenInitialized = false

  get hasBeenInitializedValue() {
    return this.hasBeenInitialized
  }

  get level(): string {
    return resolveLevel()
  }

  init() {
    this.pino.level = this.level
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

  /**
   * Whether a message at `level` passes the configured threshold
   */
  isLevelEnabled(level: LogLevel): boolean {
    return pino.levels.values[level] >= pino.levels.values[this.level]
  }

  /**
   * Logs through pino once initialized, through the console before that
   */
  private _safeLog(level: LogLevel, message: string, args: unknown[]) {
    if (!this.hasBeenInitialized) {
      if (!this.isLevelEnabled(level)) {
        return
      }
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

export const logger = new LoggerProvider()
