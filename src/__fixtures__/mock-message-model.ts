/**
 * Scripted model for agent tests.
 *
 * Each call to `stream` consumes the next turn. A turn is the text and tool
 * requests the model should "produce", or an error to throw.
 */

import { Model, type StreamOptions } from '../models/model.js'
import type { ModelStreamEvent } from '../models/streaming.js'
import type { StopReason, ToolRequestData, TranscriptEntry } from '../types/messages.js'

export interface ScriptedTurn {
  text?: string
  toolRequests?: ToolRequestData[]
  stopReason?: StopReason
}

export type Turn = ScriptedTurn | Error

/**
 * What the model was called with.
 */
export interface RecordedCall {
  transcript: TranscriptEntry[]
  options: StreamOptions | undefined
}

export class MockMessageModel extends Model {
  private readonly _turns: Turn[] = []
  private _repeatTurn: Turn | undefined
  readonly calls: RecordedCall[] = []

  /**
   * Queues one turn.
   */
  addTurn(turn: Turn): this {
    this._turns.push(turn)
    return this
  }

  /**
   * Returns `turn` on every call once the queued turns are used up.
   */
  repeatTurn(turn: Turn): this {
    this._repeatTurn = turn
    return this
  }

  get callCount(): number {
    return this.calls.length
  }

  async *stream(transcript: TranscriptEntry[], options?: StreamOptions): AsyncGenerator<ModelStreamEvent> {
    this.calls.push({ transcript: [...transcript], options })

    const turn = this._turns.shift() ?? this._repeatTurn
    if (turn === undefined) {
      throw new Error('MockMessageModel: no more turns configured')
    }
    if (turn instanceof Error) {
      throw turn
    }

    const toolRequests = turn.toolRequests ?? []

    yield { type: 'modelMessageStartEvent', role: 'assistant' }

    if (turn.text !== undefined) {
      yield { type: 'modelContentBlockStartEvent' }
      yield { type: 'modelContentBlockDeltaEvent', delta: { type: 'textDelta', text: turn.text } }
      yield { type: 'modelContentBlockStopEvent' }
    }

    for (const request of toolRequests) {
      yield {
        type: 'modelContentBlockStartEvent',
        start: { type: 'toolUseStart', toolUseId: request.id, name: request.toolName },
      }
      yield {
        type: 'modelContentBlockDeltaEvent',
        delta: { type: 'toolUseInputDelta', input: JSON.stringify(request.arguments) },
      }
      yield { type: 'modelContentBlockStopEvent' }
    }

    yield {
      type: 'modelMessageStopEvent',
      stopReason: turn.stopReason ?? (toolRequests.length > 0 ? 'toolUse' : 'endTurn'),
    }
  }
}
