/**
 * Sliding window view over the transcript.
 *
 * Bounds what is resent to the model each round while keeping the view valid:
 * the question always comes first, and the window never opens on a tool result
 * whose request was cut off. When the cut falls inside a round, the window
 * grows back to that round's model message instead.
 */

import { ToolResult, type TranscriptEntry } from '../types/messages.js'
import type { ConversationManager } from './conversation-manager.js'

/**
 * Configuration for the sliding window conversation manager.
 */
export type SlidingWindowConversationManagerConfig = {
  /**
   * Maximum number of entries to send, including the question. Defaults to 40.
   */
  windowSize?: number

  /**
   * Tool result texts longer than this are cut and marked as truncated.
   * Unlimited when omitted.
   */
  maxToolResultChars?: number
}

const TRUNCATION_MARKER = '\n... (truncated)'

/**
 * Keeps the opening question plus the newest entries that fit the window.
 */
export class SlidingWindowConversationManager implements ConversationManager {
  private readonly _windowSize: number
  private readonly _maxToolResultChars: number | undefined

  /**
   * @param config - Window size and optional tool result cap
   * @throws RangeError when `windowSize` is below 2
   */
  constructor(config?: SlidingWindowConversationManagerConfig) {
    this._windowSize = config?.windowSize ?? 40
    this._maxToolResultChars = config?.maxToolResultChars

    if (this._windowSize < 2) {
      throw new RangeError('windowSize must be at least 2 so the question and one reply fit')
    }
  }

  public select(transcript: readonly TranscriptEntry[]): TranscriptEntry[] {
    return this._window(transcript).map((entry) => this._truncate(entry))
  }

  private _window(transcript: readonly TranscriptEntry[]): TranscriptEntry[] {
    if (transcript.length <= this._windowSize) {
      return [...transcript]
    }

    const [head] = transcript
    if (!head) {
      return []
    }

    let start = transcript.length - (this._windowSize - 1)

    // A tool result needs its request in the preceding model message.
    while (start > 1 && transcript[start]?.type === 'toolResult') {
      start--
    }

    return [head, ...transcript.slice(start)]
  }

  private _truncate(entry: TranscriptEntry): TranscriptEntry {
    const limit = this._maxToolResultChars
    if (entry.type !== 'toolResult' || limit === undefined || entry.text.length <= limit) {
      return entry
    }
    return new ToolResult({
      requestId: entry.requestId,
      toolName: entry.toolName,
      text: entry.text.slice(0, limit) + TRUNCATION_MARKER,
      status: entry.status,
    })
  }
}
