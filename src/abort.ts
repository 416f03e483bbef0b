/**
 * Settles like `promise`, or rejects with the signal's reason as soon as `signal` aborts.
 *
 * The raced promise is not cancelled by this; pass `onAbort` to release
 * whatever it holds (a cursor, a request).
 *
 * @example
 * ```typescript
 * const documents = await raceAbort(cursor.toArray(), signal, () => closeQuietly(cursor))
 * ```
 */
export function raceAbort<T>(promise: Promise<T>, signal?: AbortSignal, onAbort?: () => void): Promise<T> {
  if (!signal) {
    return promise
  }
  if (signal.aborted) {
    onAbort?.()
    return Promise.reject(signal.reason)
  }

  return new Promise<T>((resolve, reject) => {
    const abort = (): void => {
      onAbort?.()
      reject(signal.reason)
    }
    signal.addEventListener('abort', abort, { once: true })

    promise.then(
      (value) => {
        signal.removeEventListener('abort', abort)
        resolve(value)
      },
      (error: unknown) => {
        signal.removeEventListener('abort', abort)
        reject(error)
      }
    )
  })
}
