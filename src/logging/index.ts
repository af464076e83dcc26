/**
 * logging — Scoped, leveled console logger for the service and the CLI.
 *
 * Lines look like `[http] POST /panchang 200` followed by an optional
 * context object, which Node's console formats.
 */

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const

export type LogLevel = (typeof LOG_LEVELS)[number]

export type LogContext = Record<string, unknown>

export interface Logger {
  debug(message: string, context?: LogContext): void
  info(message: string, context?: LogContext): void
  warn(message: string, context?: LogContext): void
  error(message: string, context?: LogContext): void
}

const RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: Number.POSITIVE_INFINITY,
}

/**
 * @param scope - Tag printed in brackets at the start of every line
 * @param level - Lowest level written; 'silent' writes nothing
 */
export function createLogger(scope: string, level: LogLevel = 'info'): Logger {
  const emit = (
    messageLevel: Exclude<LogLevel, 'silent'>,
    message: string,
    context?: LogContext,
  ): void => {
    if (RANK[messageLevel] < RANK[level]) return

    const line = `[${scope}] ${message}`
    const write =
      messageLevel === 'error' ? console.error
      : messageLevel === 'warn' ? console.warn
      : messageLevel === 'debug' ? console.debug
      : console.log

    if (context) write(line, context)
    else write(line)
  }

  return {
    debug: (message, context) => emit('debug', message, context),
    info: (message, context) => emit('info', message, context),
    warn: (message, context) => emit('warn', message, context),
    error: (message, context) => emit('error', message, context),
  }
}
