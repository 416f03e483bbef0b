/**
 * Error types raised by the query agent.
 *
 * Tool failures are not represented here: they are returned to the model as
 * ordinary tool result text. The classes below are the failures that end a
 * request, plus configuration and wiring mistakes.
 */

import type { ModelMessage } from './types/messages.js'

/**
 * Raised when the input sent to the model exceeds its context window.
 */
export class ContextWindowOverflowError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ContextWindowOverflowError'
  }
}

/**
 * Raised when the model stops because it hit its output token limit.
 * The partial message is attached for inspection.
 */
export class MaxTokensError extends Error {
  /**
   * The incomplete model message that was being generated.
   */
  public readonly partialMessage: ModelMessage

  constructor(message: string, partialMessage: ModelMessage) {
    super(message)
    this.name = 'MaxTokensError'
    this.partialMessage = partialMessage
  }
}

/**
 * Raised when environment configuration is missing or malformed.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigurationError'
  }
}

/**
 * Raised when tools are registered inconsistently, e.g. two tools sharing a name.
 */
export class ToolRegistryError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ToolRegistryError'
  }
}

/**
 * Raised by a document store when the database cannot be reached at all.
 *
 * Unlike query errors, which tools report back to the model as text, this
 * error ends the request.
 */
export class StoreConnectionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'StoreConnectionError'
  }
}

/**
 * Whether an error must end the request instead of being reported to the model.
 */
export function isFatalError(error: unknown): boolean {
  if (error instanceof StoreConnectionError) {
    return true
  }
  return typeof error === 'object' && error !== null && 'name' in error && error.name === 'AbortError'
}

/**
 * Normalizes an unknown thrown value into an Error instance.
 *
 * @param error - The thrown value
 * @returns An Error carrying the original value's message
 */
export function normalizeError(error: unknown): Error {
  if (error instanceof Error) {
    return error
  }
  if (typeof error === 'string') {
    return new Error(error)
  }
  return new Error(String(error))
}
