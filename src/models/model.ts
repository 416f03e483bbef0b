import { MaxTokensError } from '../errors.js'
import { logger } from '../logging/logger.js'
import { isJSONObject, type JSONValue } from '../types/json.js'
import { ModelMessage, ToolRequest, type StopReason, type SystemPrompt, type TranscriptEntry } from '../types/messages.js'
import type { ToolSpec } from '../tools/types.js'
import type { ModelStreamEvent } from './streaming.js'

/**
 * Base configuration shared by every model provider.
 */
export interface BaseModelConfig {
  /**
   * Provider-specific model identifier.
   */
  modelId?: string
}

/**
 * Per-call options for {@link Model.stream}.
 */
export interface StreamOptions {
  /**
   * System instructions for this call.
   */
  systemPrompt?: SystemPrompt

  /**
   * Tools the model may request.
   */
  toolSpecs?: ToolSpec[]

  /**
   * Aborts the in-flight provider call.
   */
  signal?: AbortSignal
}

/**
 * A tool-selecting model oracle.
 *
 * Providers implement {@link Model.stream}; the agent consumes
 * {@link Model.streamAggregated}, which turns the event stream into exactly
 * one {@link ModelMessage}.
 */
export abstract class Model {
  /**
   * Streams one model response for the given transcript.
   *
   * @param transcript - Entries to send, oldest first
   * @param options - System prompt, tools and cancellation
   */
  abstract stream(transcript: TranscriptEntry[], options?: StreamOptions): AsyncIterable<ModelStreamEvent>

  /**
   * Streams one response, re-yielding provider events, and returns the aggregated message.
   *
   * Text blocks are joined with newlines. Each tool use block becomes one
   * {@link ToolRequest}, in stream order.
   *
   * @throws MaxTokensError when the model stops on its output token limit
   */
  async *streamAggregated(
    transcript: TranscriptEntry[],
    options?: StreamOptions
  ): AsyncGenerator<ModelStreamEvent, ModelMessage, undefined> {
    const textBlocks: string[] = []
    const toolRequests: ToolRequest[] = []
    let stopReason: StopReason = 'endTurn'

    let currentText: string | undefined
    let currentToolUse: { toolUseId: string; name: string; input: string } | undefined

    for await (const event of this.stream(transcript, options)) {
      yield event

      switch (event.type) {
        case 'modelContentBlockStartEvent':
          if (event.start?.type === 'toolUseStart') {
            currentToolUse = { toolUseId: event.start.toolUseId, name: event.start.name, input: '' }
          } else {
            currentText = ''
          }
          break

        case 'modelContentBlockDeltaEvent':
          if (event.delta.type === 'toolUseInputDelta') {
            if (currentToolUse) {
              currentToolUse.input += event.delta.input
            }
          } else {
            currentText = (currentText ?? '') + event.delta.text
          }
          break

        case 'modelContentBlockStopEvent':
          if (currentToolUse) {
            toolRequests.push(
              new ToolRequest({
                id: currentToolUse.toolUseId,
                toolName: currentToolUse.name,
                arguments: parseToolInput(currentToolUse.name, currentToolUse.input),
              })
            )
            currentToolUse = undefined
          } else if (currentText !== undefined) {
            textBlocks.push(currentText)
            currentText = undefined
          }
          break

        case 'modelMessageStopEvent':
          stopReason = event.stopReason
          break

        default:
          break
      }
    }

    const message = new ModelMessage({ text: textBlocks.join('\n'), toolRequests, stopReason })

    if (stopReason === 'maxTokens') {
      throw new MaxTokensError(
        'Model reached maximum token limit. This is an unrecoverable state that requires intervention.',
        message
      )
    }

    return message
  }
}

function parseToolInput(toolName: string, input: string): { [key: string]: JSONValue } {
  if (input.trim() === '') {
    return {}
  }
  try {
    const parsed: unknown = JSON.parse(input)
    if (isJSONObject(parsed)) {
      return parsed
    }
  } catch (error) {
    logger.warn(`tool_name=<${toolName}> | model produced tool input that is not valid JSON`, error)
    return {}
  }
  logger.warn(`tool_name=<${toolName}> | model produced tool input that is not a JSON object`)
  return {}
}
