import pino, { type DestinationStream } from 'pino'
import type { Logger, LogLevel } from './logger.js'

type EmitLevel = Exclude<LogLevel, 'silent'>

/**
 * Builds a {@link Logger} that writes JSON lines through pino.
 *
 * The first argument of each call becomes `msg`. An `Error` among the remaining
 * arguments is serialized under `err`, anything else under `details`.
 * Writes to stderr by default so stdout stays free for answers.
 *
 * @example
 * ```typescript
 * configureLogging({ logger: createPinoLogger('debug') })
 * ```
 */
export function createPinoLogger(level: LogLevel, destination: DestinationStream = pino.destination(2)): Logger {
  const base = pino(
    {
      level,
      base: { service: 'nl-query' },
      messageKey: 'msg',
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    destination
  )

  const forward =
    (method: EmitLevel) =>
    (...args: unknown[]): void => {
      const [first, ...rest] = args
      const message = typeof first === 'string' ? first : String(first)
      const err = rest.find((arg): arg is Error => arg instanceof Error)
      const details = rest.filter((arg) => !(arg instanceof Error))

      if (err === undefined && details.length === 0) {
        base[method](message)
        return
      }
      base[method]({ ...(err && { err }), ...(details.length > 0 && { details }) }, message)
    }

  return {
    debug: forward('debug'),
    info: forward('info'),
    warn: forward('warn'),
    error: forward('error'),
  }
}
