/**
 * Null implementation of conversation management.
 *
 * Sends the whole transcript on every model call, so context grows with each
 * round. Suitable as long as the round cap keeps transcripts short.
 */

import type { TranscriptEntry } from '../types/messages.js'
import type { ConversationManager } from './conversation-manager.js'

/**
 * A conversation manager that sends every entry unchanged.
 */
export class NullConversationManager implements ConversationManager {
  public select(transcript: readonly TranscriptEntry[]): TranscriptEntry[] {
    return [...transcript]
  }
}
