import type { AgentResult, AgentOutcome } from '../types/agent.js'
import { ModelMessage, UserMessage, type ToolResult, type Transcript } from '../types/messages.js'
import type { Model, StreamOptions } from '../models/model.js'
import { BedrockModel } from '../models/bedrock.js'
import { ToolRegistry } from '../registry/tool-registry.js'
import type { Tool } from '../tools/tool.js'
import type { ContextAugmenter } from '../retrieval/retriever.js'
import type { ConversationManager } from '../conversation-manager/conversation-manager.js'
import { NullConversationManager } from '../conversation-manager/null-conversation-manager.js'
import { logger } from '../logging/logger.js'
import { raceAbort } from '../abort.js'
import { BASE_SYSTEM_PROMPT, composeSystemPrompt } from './prompts.js'
import { extractAnswer } from './transcript.js'
import type { AgentStreamEvent } from './streaming.js'

/**
 * Recursive type definition for nested tool arrays.
 * Allows tools to be organized in nested arrays of any depth.
 */
export type ToolList = (Tool | ToolList)[]

/**
 * States of the agent loop.
 */
export type AgentLoopState = 'awaitingModel' | 'awaitingTools' | 'done'

/**
 * Default cap on model calls per request.
 */
export const DEFAULT_MAX_ROUNDS = 10

/**
 * Configuration object for creating a new QueryAgent.
 */
export type QueryAgentConfig = {
  /**
   * The model that selects tools and writes the answer. Defaults to a BedrockModel.
   */
  model?: Model

  /**
   * Tools the model may call. Nested arrays are flattened.
   */
  tools?: ToolList

  /**
   * Supplies retrieved context for the system prompt. Without it the base prompt is used as is.
   */
  retriever?: ContextAugmenter

  /**
   * Base instructions. Defaults to {@link BASE_SYSTEM_PROMPT}.
   */
  systemPrompt?: string

  /**
   * Maximum number of rounds (model call plus tool executions). Defaults to 10.
   */
  maxRounds?: number

  /**
   * Schema snippets retrieved per model call. Defaults to 8.
   */
  retrievalTopK?: number

  /**
   * Whether to add retrieved few-shot examples to the system prompt. Defaults to false.
   */
  includeExamples?: boolean

  /**
   * Examples retrieved per model call when `includeExamples` is set. Defaults to 3.
   */
  exampleTopK?: number

  /**
   * Chooses the transcript entries sent to the model. Defaults to sending everything.
   */
  conversationManager?: ConversationManager
}

/**
 * Per-invocation options.
 */
export interface InvokeOptions {
  /**
   * Cancels the invocation, including in-flight model and tool calls.
   */
  signal?: AbortSignal
}

/**
 * Answers natural-language questions by alternating between the model and the database tools.
 *
 * Each invocation owns a fresh transcript seeded with the question. The loop
 * asks the model, runs any tools it requested (concurrently, results kept in
 * request order) and asks again, until the model answers without requesting
 * tools or the round cap is reached. Before every model call the system prompt
 * is rebuilt from the base instructions and context retrieved for the original
 * question.
 *
 * The agent holds configuration only, so concurrent invocations are independent.
 */
export class QueryAgent {
  private readonly _model: Model
  private readonly _toolRegistry: ToolRegistry
  private readonly _retriever: ContextAugmenter | undefined
  private readonly _systemPrompt: string
  private readonly _maxRounds: number
  private readonly _retrievalTopK: number
  private readonly _includeExamples: boolean
  private readonly _exampleTopK: number
  private readonly _conversationManager: ConversationManager

  /**
   * Creates an instance of the QueryAgent.
   * @param config - The configuration for the agent.
   * @throws RangeError when `maxRounds` is not a positive integer
   */
  constructor(config?: QueryAgentConfig) {
    this._model = config?.model ?? new BedrockModel()
    this._toolRegistry = new ToolRegistry(flattenTools(config?.tools ?? []))
    this._retriever = config?.retriever
    this._systemPrompt = config?.systemPrompt ?? BASE_SYSTEM_PROMPT
    this._maxRounds = config?.maxRounds ?? DEFAULT_MAX_ROUNDS
    this._retrievalTopK = config?.retrievalTopK ?? 8
    this._includeExamples = config?.includeExamples ?? false
    this._exampleTopK = config?.exampleTopK ?? 3
    this._conversationManager = config?.conversationManager ?? new NullConversationManager()

    if (!Number.isInteger(this._maxRounds) || this._maxRounds < 1) {
      throw new RangeError(`maxRounds must be a positive integer, got ${this._maxRounds}`)
    }
  }

  /**
   * The tools this agent can use.
   */
  get tools(): Tool[] {
    return this._toolRegistry.values()
  }

  get maxRounds(): number {
    return this._maxRounds
  }

  /**
   * Runs the agent loop, yielding events and returning the final result.
   *
   * Model failures and fatal tool errors are thrown; tool errors the model can
   * recover from are part of the transcript.
   *
   * @param question - The user's question
   * @param options - Cancellation signal
   * @returns Async generator that yields AgentStreamEvent objects and returns AgentResult
   *
   * @example
   * ```typescript
   * const agent = new QueryAgent({ model, tools: createDatabaseTools(store), retriever })
   *
   * for await (const event of agent.stream('How many orders per customer?')) {
   *   console.log('Event:', event.type)
   * }
   * ```
   */
  public async *stream(
    question: string,
    options?: InvokeOptions
  ): AsyncGenerator<AgentStreamEvent, AgentResult, undefined> {
    const signal = options?.signal
    const transcript: Transcript = [new UserMessage(question)]
    let result: AgentResult | undefined

    yield { type: 'beforeInvocationEvent', question }

    try {
      let state: AgentLoopState = 'awaitingModel'
      let outcome: AgentOutcome = 'answer'
      let rounds = 0
      let pending: ModelMessage | undefined

      while (state !== 'done') {
        signal?.throwIfAborted()

        switch (state) {
          case 'awaitingModel': {
            if (rounds >= this._maxRounds) {
              logger.warn(`rounds=<${rounds}> | model still requesting tools at round cap, stopping`)
              outcome = 'roundLimitExceeded'
              state = 'done'
              break
            }
            rounds++

            const message: ModelMessage = yield* this._invokeModel(question, transcript, rounds, signal)
            transcript.push(message)

            if (message.isTerminal) {
              logger.debug(`round=<${rounds}> | model answered without tool requests`)
              state = 'done'
            } else {
              logger.debug(`round=<${rounds}>, tool_count=<${message.toolRequests.length}> | model requested tools`)
              pending = message
              state = 'awaitingTools'
            }
            break
          }

          case 'awaitingTools': {
            const requests = pending?.toolRequests ?? []
            yield { type: 'beforeToolsEvent', round: rounds, requests }

            // A tool that ignores the signal must not hold the request open.
            const results: ToolResult[] = await raceAbort(
              Promise.all(requests.map((request) => this._toolRegistry.dispatch(request, signal))),
              signal
            )
            transcript.push(...results)

            for (const toolResult of results) {
              yield { type: 'toolResultEvent', result: toolResult }
            }
            yield { type: 'afterToolsEvent', round: rounds, results }

            pending = undefined
            state = 'awaitingModel'
            break
          }
        }
      }

      result = { outcome, answer: extractAnswer(transcript), transcript, rounds }
      return result
    } finally {
      yield result ? { type: 'afterInvocationEvent', result } : { type: 'afterInvocationEvent' }
    }
  }

  /**
   * Runs the agent loop to completion and returns the result.
   *
   * @example
   * ```typescript
   * const result = await agent.invoke('List all collections.')
   * if (result.outcome === 'answer') console.log(result.answer)
   * ```
   */
  public async invoke(question: string, options?: InvokeOptions): Promise<AgentResult> {
    const gen = this.stream(question, options)
    let result = await gen.next()
    while (!result.done) {
      result = await gen.next()
    }
    return result.value
  }

  /**
   * Builds the system prompt for the given question.
   * Exposed so callers can inspect exactly what the model is told.
   */
  public async buildSystemPrompt(question: string, signal?: AbortSignal): Promise<string> {
    if (!this._retriever) {
      return this._systemPrompt
    }

    const blocks = await this._retriever.contextBlocks(
      question,
      { topK: this._retrievalTopK, exampleTopK: this._includeExamples ? this._exampleTopK : undefined },
      signal
    )
    return composeSystemPrompt(this._systemPrompt, blocks)
  }

  private async *_invokeModel(
    question: string,
    transcript: Transcript,
    round: number,
    signal?: AbortSignal
  ): AsyncGenerator<AgentStreamEvent, ModelMessage, undefined> {
    // Anchored to the original question, not to intermediate tool output.
    const systemPrompt = await this.buildSystemPrompt(question, signal)
    const view = this._conversationManager.select(transcript)

    yield { type: 'beforeModelEvent', round, systemPrompt, transcript: view }

    const streamOptions: StreamOptions = { systemPrompt, toolSpecs: this._toolRegistry.toolSpecs() }
    if (signal) {
      streamOptions.signal = signal
    }

    const message = yield* this._model.streamAggregated(view, streamOptions)

    yield { type: 'afterModelEvent', round, message }
    return message
  }
}

/**
 * Recursively flattens nested arrays of tools into a single flat array.
 * @param tools - Tools or nested arrays of tools
 * @returns Flat array of tools
 */
function flattenTools(tools: ToolList): Tool[] {
  const result: Tool[] = []
  for (const item of tools) {
    if (Array.isArray(item)) {
      result.push(...flattenTools(item))
    } else {
      result.push(item)
    }
  }
  return result
}
