import type { JSONValue } from './json.js'

/**
 * Transcript entry types.
 *
 * This module follows a pattern where <name>Data interfaces define the structure
 * for objects, while corresponding classes extend those interfaces with additional
 * functionality and type discrimination.
 */

/**
 * Role of a message when it is sent to a model provider.
 */
export type Role = 'user' | 'assistant'

/**
 * Reason why the model stopped generating.
 */
export type StopReason =
  | 'endTurn'
  | 'toolUse'
  | 'maxTokens'
  | 'stopSequence'
  | 'contentFiltered'
  | 'guardrailIntervened'
  | string

/**
 * Outcome of a single tool execution.
 */
export type ToolResultStatus = 'success' | 'error'

/**
 * Data for a user message.
 */
export interface UserMessageData {
  /**
   * Discriminator for user messages.
   */
  type: 'userMessage'

  /**
   * The question as the user typed it.
   */
  text: string
}

/**
 * The natural-language question that opens a transcript.
 */
export class UserMessage implements UserMessageData {
  /**
   * Discriminator for user messages.
   */
  readonly type = 'userMessage' as const

  /**
   * The question as the user typed it.
   */
  readonly text: string

  constructor(text: string) {
    this.text = text
  }
}

/**
 * Data for a tool request issued by the model.
 */
export interface ToolRequestData {
  /**
   * Provider-assigned identifier, echoed back by the matching tool result.
   */
  id: string

  /**
   * Name of the requested tool.
   */
  toolName: string

  /**
   * Arguments keyed by parameter name. Not yet validated.
   */
  arguments: { [key: string]: JSONValue }
}

/**
 * A single tool invocation requested by the model.
 */
export class ToolRequest implements ToolRequestData {
  readonly id: string
  readonly toolName: string
  readonly arguments: { [key: string]: JSONValue }

  constructor(data: ToolRequestData) {
    this.id = data.id
    this.toolName = data.toolName
    this.arguments = data.arguments
  }
}

/**
 * Data for a model message.
 */
export interface ModelMessageData {
  /**
   * Discriminator for model messages.
   */
  type: 'modelMessage'

  /**
   * Text the model produced. May be empty when the model only requests tools.
   */
  text: string

  /**
   * Tool requests, in the order the model listed them.
   */
  toolRequests: ToolRequestData[]

  /**
   * Why the model stopped generating this message.
   */
  stopReason: StopReason
}

/**
 * One response from the model. A model message without tool requests is terminal.
 */
export class ModelMessage implements ModelMessageData {
  /**
   * Discriminator for model messages.
   */
  readonly type = 'modelMessage' as const

  readonly text: string
  readonly toolRequests: ToolRequest[]
  readonly stopReason: StopReason

  constructor(data: Omit<ModelMessageData, 'type'>) {
    this.text = data.text
    this.toolRequests = data.toolRequests.map((request) =>
      request instanceof ToolRequest ? request : new ToolRequest(request)
    )
    this.stopReason = data.stopReason
  }

  /**
   * Whether this message ends the agent loop.
   */
  get isTerminal(): boolean {
    return this.toolRequests.length === 0
  }
}

/**
 * Data for a tool result.
 */
export interface ToolResultData {
  /**
   * Discriminator for tool results.
   */
  type: 'toolResult'

  /**
   * Identifier of the tool request this result answers.
   */
  requestId: string

  /**
   * Name of the tool that produced the result.
   */
  toolName: string

  /**
   * Result text shown to the model, whether the call succeeded or not.
   */
  text: string

  /**
   * Whether the tool reported success or a recoverable error.
   */
  status: ToolResultStatus
}

/**
 * Textual outcome of one tool request.
 */
export class ToolResult implements ToolResultData {
  /**
   * Discriminator for tool results.
   */
  readonly type = 'toolResult' as const

  readonly requestId: string
  readonly toolName: string
  readonly text: string
  readonly status: ToolResultStatus

  constructor(data: Omit<ToolResultData, 'type' | 'status'> & { status?: ToolResultStatus }) {
    this.requestId = data.requestId
    this.toolName = data.toolName
    this.text = data.text
    this.status = data.status ?? 'success'
  }
}

/**
 * Any entry of a transcript. Discriminated on `type`.
 */
export type TranscriptEntry = UserMessage | ModelMessage | ToolResult

/**
 * Ordered, append-only record of one request.
 */
export type Transcript = TranscriptEntry[]

/**
 * System instructions sent alongside the transcript.
 */
export type SystemPrompt = string
