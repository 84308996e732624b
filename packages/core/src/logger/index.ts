import pino from 'pino'

/**
 * LoggerProvider is a class that provides logging functionality.
 * It is a wrapper around the pino logger.
 * It is a singleton class.
 * @description !IMPORTANT! Before using the logger, it must be initialized with `init()` at the top of the entry point file.
 */
export class LoggerProvider {
  private pino = pino(
    {
      level: process.env['PINO_LEVEL'] || 'info',
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

  get level() {
    return process.env['PINO_LEVEL'] || 'info'
  }

  init() {
    this.pino.debug('LoggerProvider initialized')
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
   * Falls back to the console until `init()` has been called
   */
  private _safeLog(
    level: 'info' | 'debug' | 'warn' | 'error',
    message: string,
    args: unknown[],
  ) {
    if (!this.hasBeenInitialized) {
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
    } else if (args.length > 0) {
      this.pino[level]({ args }, message)
    } else {
      this.pino[level](message)
    }
  }
}

export const logger = new LoggerProvider()
