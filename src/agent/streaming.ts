import type { ModelStreamEvent } from '../models/streaming.js'
import type { ModelMessage, ToolRequest, ToolResult, TranscriptEntry } from '../types/messages.js'
import type { AgentResult } from '../types/agent.js'

/**
 * Emitted before the model is called for a round.
 */
export interface BeforeModelEvent {
  type: 'beforeModelEvent'

  /**
   * One-based round number.
   */
  round: number

  /**
   * The system prompt built for this call.
   */
  systemPrompt: string

  /**
   * Entries sent to the model, after conversation management.
   */
  transcript: TranscriptEntry[]
}

/**
 * Emitted once the model has returned its message.
 */
export interface AfterModelEvent {
  type: 'afterModelEvent'
  round: number
  message: ModelMessage
}

/**
 * Emitted before the requested tools run.
 */
export interface BeforeToolsEvent {
  type: 'beforeToolsEvent'
  round: number
  requests: ToolRequest[]
}

/**
 * Emitted for each tool result, in request order, once all tools of the round have finished.
 */
export interface ToolResultEvent {
  type: 'toolResultEvent'
  result: ToolResult
}

/**
 * Emitted after all tool results of a round are in the transcript.
 */
export interface AfterToolsEvent {
  type: 'afterToolsEvent'
  round: number
  results: ToolResult[]
}

/**
 * Emitted when an invocation starts.
 */
export interface BeforeInvocationEvent {
  type: 'beforeInvocationEvent'
  question: string
}

/**
 * Emitted when an invocation ends, successfully or not.
 */
export interface AfterInvocationEvent {
  type: 'afterInvocationEvent'
  result?: AgentResult
}

/**
 * Every event yielded by `QueryAgent.stream`.
 */
export type AgentStreamEvent =
  | ModelStreamEvent
  | BeforeModelEvent
  | AfterModelEvent
  | BeforeToolsEvent
  | ToolResultEvent
  | AfterToolsEvent
  | BeforeInvocationEvent
  | AfterInvocationEvent
