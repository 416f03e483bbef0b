/**
 * Minimal logging facade.
 *
 * Defaults to the console. Applications that want structured logs can hand in
 * any object with the same four methods through {@link configureLogging}.
 */

/**
 * Severity levels, lowest first.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'

/**
 * Sink accepted by {@link configureLogging}. The console satisfies it.
 */
export interface Logger {
  debug(...args: unknown[]): void
  info(...args: unknown[]): void
  warn(...args: unknown[]): void
  error(...args: unknown[]): void
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
}

let sink: Logger = console
let threshold: number = LEVEL_ORDER.info

/**
 * Replaces the log sink and/or the minimum level.
 *
 * @example
 * ```typescript
 * configureLogging({ level: 'debug' })
 * configureLogging({ logger: myPinoInstance, level: 'warn' })
 * ```
 */
export function configureLogging(options: { logger?: Logger; level?: LogLevel }): void {
  if (options.logger !== undefined) {
    sink = options.logger
  }
  if (options.level !== undefined) {
    threshold = LEVEL_ORDER[options.level]
  }
}

function emit(level: Exclude<LogLevel, 'silent'>, args: unknown[]): void {
  if (LEVEL_ORDER[level] < threshold) {
    return
  }
  sink[level](...args)
}

/**
 * Process-wide logger used throughout the library.
 */
export const logger: Logger = {
  debug: (...args) => emit('debug', args),
  info: (...args) => emit('info', args),
  warn: (...args) => emit('warn', args),
  error: (...args) => emit('error', args),
}
