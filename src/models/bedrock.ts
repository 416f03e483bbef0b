/**
 * AWS Bedrock model provider implementation.
 *
 * This module provides integration with AWS Bedrock's Converse API,
 * supporting streaming responses and tool use.
 *
 * @see https://docs.aws.amazon.com/bedrock/latest/APIReference/API_runtime_ConverseStream.html
 */

import {
  BedrockRuntimeClient,
  ConverseCommand,
  ConverseStreamCommand,
  type BedrockRuntimeClientConfig,
  type ContentBlock as BedrockContentBlock,
  type ConverseCommandOutput,
  type ConverseStreamCommandInput,
  type ConverseStreamOutput,
  type InferenceConfiguration,
  type Message as BedrockMessage,
  type Tool as BedrockTool,
  type ToolConfiguration,
  type ToolResultContentBlock,
} from '@aws-sdk/client-bedrock-runtime'
import { Model, type BaseModelConfig, type StreamOptions } from './model.js'
import type { ModelStreamEvent, Usage } from './streaming.js'
import type { Role, ToolResult, TranscriptEntry } from '../types/messages.js'
import type { JSONValue } from '../types/json.js'
import { ContextWindowOverflowError, normalizeError } from '../errors.js'
import { logger } from '../logging/logger.js'
import { ensureDefined } from '../types/validation.js'

/**
 * Default Bedrock model ID.
 */
const DEFAULT_BEDROCK_MODEL_ID = 'global.anthropic.claude-sonnet-4-5-20250929-v1:0'

/**
 * Models that accept the status field in tool results.
 * @see https://docs.aws.amazon.com/bedrock/latest/APIReference/API_runtime_ToolResultBlock.html
 */
const MODELS_INCLUDE_STATUS = ['anthropic.claude']

/**
 * Error messages that indicate context window overflow.
 */
const BEDROCK_CONTEXT_WINDOW_OVERFLOW_MESSAGES = [
  'Input is too long for requested model',
  'input length and `max_tokens` exceed context limit',
  'too many total text bytes',
]

/**
 * Mapping of Bedrock stop reasons to agent stop reasons.
 */
const STOP_REASON_MAP = {
  end_turn: 'endTurn',
  tool_use: 'toolUse',
  max_tokens: 'maxTokens',
  stop_sequence: 'stopSequence',
  content_filtered: 'contentFiltered',
  guardrail_intervened: 'guardrailIntervened',
} as const

function isMappedStopReason(value: string): value is keyof typeof STOP_REASON_MAP {
  return Object.hasOwn(STOP_REASON_MAP, value)
}

/**
 * Narrows a Bedrock conversation role to the roles a reply can carry.
 */
function toRole(role: string | undefined): Role {
  if (role === 'user' || role === 'assistant') {
    return role
  }
  throw new Error(`Unexpected message role from Bedrock: ${String(role)}`)
}

function snakeToCamel(str: string): string {
  return str.replace(/_([a-z])/g, (_, letter: string) => letter.toUpperCase())
}

/**
 * Configuration interface for the Bedrock model provider.
 *
 * @example
 * ```typescript
 * const config: BedrockModelConfig = {
 *   modelId: 'global.anthropic.claude-sonnet-4-5-20250929-v1:0',
 *   maxTokens: 2048,
 *   temperature: 0,
 * }
 * ```
 */
export interface BedrockModelConfig extends BaseModelConfig {
  /**
   * Maximum number of tokens to generate in the response.
   */
  maxTokens?: number

  /**
   * Controls randomness in generation (0 to 1).
   */
  temperature?: number

  /**
   * Controls diversity via nucleus sampling (0 to 1).
   */
  topP?: number

  /**
   * Sequences that stop generation when encountered.
   */
  stopSequences?: string[]

  /**
   * Additional model-specific fields to include in the request.
   */
  additionalRequestFields?: JSONValue

  /**
   * Whether to use the ConverseStream API instead of Converse. Defaults to true.
   */
  stream?: boolean

  /**
   * Whether to send the status field with tool results.
   * `'auto'` (default) enables it for model IDs known to accept it.
   */
  includeToolResultStatus?: 'auto' | boolean
}

/**
 * Options for creating a BedrockModel instance.
 */
export interface BedrockModelOptions extends BedrockModelConfig {
  /**
   * AWS region to use for the Bedrock service.
   */
  region?: string

  /**
   * Configuration for the Bedrock Runtime client.
   */
  clientConfig?: BedrockRuntimeClientConfig
}

/**
 * Model oracle backed by the Bedrock Converse API.
 *
 * @example
 * ```typescript
 * const model = new BedrockModel({ region: 'us-east-1', temperature: 0 })
 * const message = await collect(model.streamAggregated(transcript, { systemPrompt, toolSpecs }))
 * ```
 */
export class BedrockModel extends Model {
  private readonly _config: BedrockModelConfig
  private _client: BedrockRuntimeClient

  constructor(options?: BedrockModelOptions) {
    super()

    const { region, clientConfig, ...modelConfig } = options ?? {}

    this._config = {
      modelId: DEFAULT_BEDROCK_MODEL_ID,
      ...modelConfig,
    }

    const customUserAgent = clientConfig?.customUserAgent
      ? `${String(clientConfig.customUserAgent)} nl-query-agent`
      : 'nl-query-agent'

    this._client = new BedrockRuntimeClient({
      ...(clientConfig ?? {}),
      // region takes precedence over clientConfig
      ...(region ? { region: region } : {}),
      customUserAgent,
    })
  }

  /**
   * Streams one response from Bedrock.
   *
   * @throws ContextWindowOverflowError when the input exceeds the model's context window
   */
  async *stream(transcript: TranscriptEntry[], options?: StreamOptions): AsyncIterable<ModelStreamEvent> {
    const request = this._formatRequest(transcript, options)
    const sendOptions = options?.signal ? { abortSignal: options.signal } : {}

    try {
      if (this._config.stream !== false) {
        const response = await this._client.send(new ConverseStreamCommand(request), sendOptions)

        if (response.stream) {
          for await (const chunk of response.stream) {
            for (const event of this._mapStreamedBedrockEventToSDKEvent(chunk)) {
              yield event
            }
          }
        }
      } else {
        const response = await this._client.send(new ConverseCommand(request), sendOptions)
        for (const event of this._mapBedrockEventToSDKEvent(response)) {
          yield event
        }
      }
    } catch (error) {
      const err = normalizeError(error)

      if (BEDROCK_CONTEXT_WINDOW_OVERFLOW_MESSAGES.some((msg) => err.message.includes(msg))) {
        throw new ContextWindowOverflowError(err.message)
      }

      throw err
    }
  }

  private _formatRequest(transcript: TranscriptEntry[], options?: StreamOptions): ConverseStreamCommandInput {
    const request: ConverseStreamCommandInput = {
      modelId: this._config.modelId,
      messages: this._formatTranscript(transcript),
    }

    if (options?.systemPrompt) {
      request.system = [{ text: options.systemPrompt }]
    }

    if (options?.toolSpecs && options.toolSpecs.length > 0) {
      const tools: BedrockTool[] = options.toolSpecs.map((spec) => ({
        toolSpec: {
          name: spec.name,
          description: spec.description,
          inputSchema: { json: spec.inputSchema },
        },
      }))

      const toolConfig: ToolConfiguration = { tools }
      request.toolConfig = toolConfig
    }

    const inferenceConfig: InferenceConfiguration = {}
    if (this._config.maxTokens !== undefined) inferenceConfig.maxTokens = this._config.maxTokens
    if (this._config.temperature !== undefined) inferenceConfig.temperature = this._config.temperature
    if (this._config.topP !== undefined) inferenceConfig.topP = this._config.topP
    if (this._config.stopSequences !== undefined) inferenceConfig.stopSequences = this._config.stopSequences

    if (Object.keys(inferenceConfig).length > 0) {
      request.inferenceConfig = inferenceConfig
    }

    if (this._config.additionalRequestFields !== undefined) {
      request.additionalModelRequestFields = this._config.additionalRequestFields
    }

    return request
  }

  /**
   * Converts transcript entries to Bedrock messages.
   * Consecutive tool results are grouped into a single user message, as the Converse API requires.
   */
  private _formatTranscript(transcript: TranscriptEntry[]): BedrockMessage[] {
    const messages: BedrockMessage[] = []
    let pendingResults: ToolResult[] = []

    const flushResults = (): void => {
      if (pendingResults.length === 0) return
      messages.push({
        role: 'user',
        content: pendingResults.map((result) => this._formatToolResult(result)),
      })
      pendingResults = []
    }

    for (const entry of transcript) {
      switch (entry.type) {
        case 'toolResult':
          pendingResults.push(entry)
          break

        case 'userMessage':
          flushResults()
          messages.push({ role: 'user', content: [{ text: entry.text }] })
          break

        case 'modelMessage': {
          flushResults()
          const content: BedrockContentBlock[] = []
          if (entry.text !== '' || entry.toolRequests.length === 0) {
            content.push({ text: entry.text })
          }
          for (const request of entry.toolRequests) {
            content.push({
              toolUse: { toolUseId: request.id, name: request.toolName, input: request.arguments },
            })
          }
          messages.push({ role: 'assistant', content })
          break
        }
      }
    }
    flushResults()

    return messages
  }

  private _formatToolResult(result: ToolResult): BedrockContentBlock {
    const content: ToolResultContentBlock[] = [{ text: result.text }]
    return {
      toolResult: {
        toolUseId: result.requestId,
        content,
        ...(this._shouldIncludeToolResultStatus() && { status: result.status }),
      },
    }
  }

  private _shouldIncludeToolResultStatus(): boolean {
    const includeStatus = this._config.includeToolResultStatus ?? 'auto'

    if (includeStatus === true) return true
    if (includeStatus === false) return false

    return MODELS_INCLUDE_STATUS.some((pattern) => this._config.modelId?.includes(pattern))
  }

  private _mapBedrockEventToSDKEvent(response: ConverseCommandOutput): ModelStreamEvent[] {
    const events: ModelStreamEvent[] = []

    const output = ensureDefined(response.output, 'response.output')
    const message = ensureDefined(output.message, 'output.message')
    events.push({ type: 'modelMessageStartEvent', role: toRole(message.role) })

    for (const block of ensureDefined(message.content, 'message.content')) {
      if (block.text !== undefined) {
        events.push({ type: 'modelContentBlockStartEvent' })
        events.push({ type: 'modelContentBlockDeltaEvent', delta: { type: 'textDelta', text: block.text } })
        events.push({ type: 'modelContentBlockStopEvent' })
      } else if (block.toolUse !== undefined) {
        events.push({
          type: 'modelContentBlockStartEvent',
          start: {
            type: 'toolUseStart',
            name: ensureDefined(block.toolUse.name, 'toolUse.name'),
            toolUseId: ensureDefined(block.toolUse.toolUseId, 'toolUse.toolUseId'),
          },
        })
        events.push({
          type: 'modelContentBlockDeltaEvent',
          delta: { type: 'toolUseInputDelta', input: JSON.stringify(block.toolUse.input ?? {}) },
        })
        events.push({ type: 'modelContentBlockStopEvent' })
      } else {
        logger.warn(`Skipping unsupported content block: ${Object.keys(block).join(', ')}`)
      }
    }

    const stopReasonRaw = ensureDefined(response.stopReason, 'response.stopReason')
    const hasToolUse = message.content?.some((block) => block.toolUse !== undefined) ?? false
    events.push({ type: 'modelMessageStopEvent', stopReason: this._transformStopReason(stopReasonRaw, hasToolUse) })

    if (response.usage) {
      events.push({
        type: 'modelMetadataEvent',
        usage: {
          inputTokens: ensureDefined(response.usage.inputTokens, 'usage.inputTokens'),
          outputTokens: ensureDefined(response.usage.outputTokens, 'usage.outputTokens'),
          totalTokens: ensureDefined(response.usage.totalTokens, 'usage.totalTokens'),
        },
        ...(response.metrics && { metrics: { latencyMs: ensureDefined(response.metrics.latencyMs, 'metrics.latencyMs') } }),
      })
    }

    return events
  }

  private _mapStreamedBedrockEventToSDKEvent(chunk: ConverseStreamOutput): ModelStreamEvent[] {
    const events: ModelStreamEvent[] = []

    if (chunk.messageStart) {
      events.push({ type: 'modelMessageStartEvent', role: toRole(chunk.messageStart.role) })
    } else if (chunk.contentBlockStart) {
      const toolUse = chunk.contentBlockStart.start?.toolUse
      events.push(
        toolUse
          ? {
              type: 'modelContentBlockStartEvent',
              start: {
                type: 'toolUseStart',
                name: ensureDefined(toolUse.name, 'toolUse.name'),
                toolUseId: ensureDefined(toolUse.toolUseId, 'toolUse.toolUseId'),
              },
            }
          : { type: 'modelContentBlockStartEvent' }
      )
    } else if (chunk.contentBlockDelta) {
      const delta = ensureDefined(chunk.contentBlockDelta.delta, 'contentBlockDelta.delta')
      if (delta.text !== undefined) {
        events.push({ type: 'modelContentBlockDeltaEvent', delta: { type: 'textDelta', text: delta.text } })
      } else if (delta.toolUse?.input) {
        events.push({ type: 'modelContentBlockDeltaEvent', delta: { type: 'toolUseInputDelta', input: delta.toolUse.input } })
      }
    } else if (chunk.contentBlockStop) {
      events.push({ type: 'modelContentBlockStopEvent' })
    } else if (chunk.messageStop) {
      const stopReasonRaw = ensureDefined(chunk.messageStop.stopReason, 'messageStop.stopReason')
      events.push({ type: 'modelMessageStopEvent', stopReason: this._transformStopReason(stopReasonRaw, false) })
    } else if (chunk.metadata) {
      const usage = chunk.metadata.usage
      const event: ModelStreamEvent = { type: 'modelMetadataEvent' }
      if (usage) {
        const usageInfo: Usage = {
          inputTokens: ensureDefined(usage.inputTokens, 'usage.inputTokens'),
          outputTokens: ensureDefined(usage.outputTokens, 'usage.outputTokens'),
          totalTokens: ensureDefined(usage.totalTokens, 'usage.totalTokens'),
        }
        event.usage = usageInfo
      }
      if (chunk.metadata.metrics) {
        event.metrics = { latencyMs: ensureDefined(chunk.metadata.metrics.latencyMs, 'metrics.latencyMs') }
      }
      events.push(event)
    } else if (chunk.internalServerException) {
      throw chunk.internalServerException
    } else if (chunk.modelStreamErrorException) {
      throw chunk.modelStreamErrorException
    } else if (chunk.serviceUnavailableException) {
      throw chunk.serviceUnavailableException
    } else if (chunk.validationException) {
      throw chunk.validationException
    } else if (chunk.throttlingException) {
      throw chunk.throttlingException
    } else {
      logger.warn(`Unsupported Bedrock event type: ${Object.keys(chunk).join(', ')}`)
    }

    return events
  }

  /**
   * Maps a Bedrock stop reason to the agent's format.
   * `end_turn` is reported as `toolUse` when the response carries tool use blocks.
   */
  private _transformStopReason(stopReasonRaw: string, hasToolUse: boolean): string {
    let mappedStopReason: string

    if (isMappedStopReason(stopReasonRaw)) {
      mappedStopReason = STOP_REASON_MAP[stopReasonRaw]
    } else {
      logger.warn(`Unknown stop reason: "${stopReasonRaw}". Converting to camelCase: "${snakeToCamel(stopReasonRaw)}"`)
      mappedStopReason = snakeToCamel(stopReasonRaw)
    }

    if (mappedStopReason === 'endTurn' && hasToolUse) {
      logger.warn(`Adjusting stop reason from 'end_turn' to 'tool_use' due to tool use in content blocks.`)
      mappedStopReason = 'toolUse'
    }

    return mappedStopReason
  }
}
