import type { ToolRequest, ToolResult } from '../types/messages.js'
import type { ToolSpec } from './types.js'

/**
 * Context handed to a tool for one execution.
 */
export interface ToolContext {
  /**
   * The request being executed, including its unvalidated arguments.
   */
  toolRequest: ToolRequest

  /**
   * Aborted when the surrounding request is cancelled.
   */
  signal?: AbortSignal
}

/**
 * A named operation the model may request.
 *
 * Implementations report every recoverable failure as result text; only fatal
 * errors (see `isFatalError`) may be thrown.
 */
export interface Tool {
  /**
   * The unique name of the tool.
   */
  name: string

  /**
   * Human-readable description of what the tool does.
   */
  description: string

  /**
   * Specification sent to the model.
   */
  toolSpec: ToolSpec

  /**
   * Validates the request's arguments and runs the tool.
   *
   * @param context - The request and cancellation signal
   * @returns The result to append to the transcript
   */
  execute(context: ToolContext): Promise<ToolResult>
}
