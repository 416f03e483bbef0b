import type { InvokeOptions, QueryAgent } from './agent/agent.js'
import { toolTrace, type ToolTraceEntry } from './agent/transcript.js'
import { normalizeError } from './errors.js'
import { logger } from './logging/logger.js'

/**
 * How a question was handled.
 * - `answered`: the agent produced a final answer
 * - `roundLimitExceeded`: the agent stopped at its round cap
 * - `failed`: the question was rejected or the run ended with an error
 */
export type QueryStatus = 'answered' | 'roundLimitExceeded' | 'failed'

/**
 * Response of {@link QueryService.ask}.
 */
export interface QueryResponse {
  status: QueryStatus

  /**
   * Text to show the user.
   */
  text: string

  /**
   * Tool requests and results of the run, when requested and available.
   */
  trace?: ToolTraceEntry[]
}

export interface AskOptions extends InvokeOptions {
  /**
   * Attach the tool trace to the response.
   */
  includeTrace?: boolean
}

export const EMPTY_QUESTION_TEXT = 'Please enter a question.'

/**
 * Entry point for answering a question end to end.
 *
 * Turns every way a run can end into a labelled {@link QueryResponse}, so
 * callers never see a thrown error or a partial transcript.
 */
export class QueryService {
  private readonly _agent: QueryAgent

  constructor(agent: QueryAgent) {
    this._agent = agent
  }

  /**
   * Answers a natural-language question about the database.
   *
   * @example
   * ```typescript
   * const response = await service.ask('How many users signed up in 2024?')
   * console.log(response.text)
   * ```
   */
  async ask(question: string, options?: AskOptions): Promise<QueryResponse> {
    const trimmed = question.trim()
    if (trimmed === '') {
      return { status: 'failed', text: EMPTY_QUESTION_TEXT }
    }

    const invokeOptions: InvokeOptions = {}
    if (options?.signal) {
      invokeOptions.signal = options.signal
    }

    try {
      const result = await this._agent.invoke(trimmed, invokeOptions)
      const response: QueryResponse =
        result.outcome === 'roundLimitExceeded'
          ? {
              status: 'roundLimitExceeded',
              text: `Stopped: exceeded reasoning budget of ${this._agent.maxRounds} rounds.`,
            }
          : { status: 'answered', text: result.answer }

      if (options?.includeTrace) {
        response.trace = toolTrace(result.transcript)
      }
      return response
    } catch (error) {
      const failure = normalizeError(error)
      logger.error(`query failed | ${failure.message}`)
      return { status: 'failed', text: `Query failed: ${failure.message}` }
    }
  }
}
