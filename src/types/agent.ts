import type { Transcript } from './messages.js'

/**
 * How an agent run ended.
 * - `answer`: the model produced a message without tool requests
 * - `roundLimitExceeded`: the model was still requesting tools when the round cap was reached
 */
export type AgentOutcome = 'answer' | 'roundLimitExceeded'

/**
 * Result returned by the agent loop.
 */
export interface AgentResult {
  outcome: AgentOutcome

  /**
   * The extracted answer. For `roundLimitExceeded` this is the fallback text.
   */
  answer: string

  /**
   * Every entry of the run, in order.
   */
  transcript: Transcript

  /**
   * Number of model calls made.
   */
  rounds: number
}
