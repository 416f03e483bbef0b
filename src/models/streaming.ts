import type { Role, StopReason } from '../types/messages.js'

/**
 * Streaming events emitted by model providers.
 *
 * Providers translate their wire format into this discriminated union;
 * {@link Model.streamAggregated} folds the events into one ModelMessage.
 */
export type ModelStreamEvent =
  | ModelMessageStartEvent
  | ModelContentBlockStartEvent
  | ModelContentBlockDeltaEvent
  | ModelContentBlockStopEvent
  | ModelMessageStopEvent
  | ModelMetadataEvent

/**
 * Emitted when a new message starts in the stream.
 */
export interface ModelMessageStartEvent {
  type: 'modelMessageStartEvent'

  /**
   * The role of the message being started.
   */
  role: Role
}

/**
 * Emitted when a new content block starts. `start` is only present for tool use blocks.
 */
export interface ModelContentBlockStartEvent {
  type: 'modelContentBlockStartEvent'
  start?: ToolUseStart
}

/**
 * Emitted when there is new content in the current content block.
 */
export interface ModelContentBlockDeltaEvent {
  type: 'modelContentBlockDeltaEvent'
  delta: ContentBlockDelta
}

/**
 * Emitted when a content block completes.
 */
export interface ModelContentBlockStopEvent {
  type: 'modelContentBlockStopEvent'
}

/**
 * Emitted when the message completes.
 */
export interface ModelMessageStopEvent {
  type: 'modelMessageStopEvent'

  /**
   * Reason why generation stopped.
   */
  stopReason: StopReason
}

/**
 * Usage statistics and performance metrics for the stream.
 */
export interface ModelMetadataEvent {
  type: 'modelMetadataEvent'
  usage?: Usage
  metrics?: Metrics
}

/**
 * Information about a tool use that is starting.
 */
export interface ToolUseStart {
  type: 'toolUseStart'

  /**
   * The name of the tool being used.
   */
  name: string

  /**
   * Unique identifier for this tool use.
   */
  toolUseId: string
}

/**
 * An incremental chunk of content within a content block.
 */
export type ContentBlockDelta = TextDelta | ToolUseInputDelta

/**
 * Incremental text content from the model.
 */
export interface TextDelta {
  type: 'textDelta'
  text: string
}

/**
 * Incremental tool input. Concatenated deltas form a JSON document.
 */
export interface ToolUseInputDelta {
  type: 'toolUseInputDelta'

  /**
   * Partial JSON string representing the tool input.
   */
  input: string
}

/**
 * Token usage statistics for a model invocation.
 */
export interface Usage {
  inputTokens: number
  outputTokens: number
  totalTokens: number
}

/**
 * Performance metrics for a model invocation.
 */
export interface Metrics {
  /**
   * Latency in milliseconds.
   */
  latencyMs: number
}
