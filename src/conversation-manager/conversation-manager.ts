import type { TranscriptEntry } from '../types/messages.js'

/**
 * Chooses which transcript entries are sent to the model on each step.
 *
 * The transcript itself is never modified: managers return a new array, so the
 * full record stays available for answer extraction and tracing.
 */
export interface ConversationManager {
  select(transcript: readonly TranscriptEntry[]): TranscriptEntry[]
}
