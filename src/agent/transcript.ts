import type { ToolRequest, ToolResult, TranscriptEntry } from '../types/messages.js'

/**
 * Answer returned when the transcript holds no terminal model message.
 */
export const NO_RESPONSE_TEXT = 'No response generated.'

/**
 * Text of the most recent model message that requested no tools.
 *
 * @param transcript - The transcript of one request
 * @returns The answer, or {@link NO_RESPONSE_TEXT} when there is none
 */
export function extractAnswer(transcript: readonly TranscriptEntry[]): string {
  for (let idx = transcript.length - 1; idx >= 0; idx--) {
    const entry = transcript[idx]
    if (entry?.type === 'modelMessage' && entry.isTerminal) {
      return entry.text || NO_RESPONSE_TEXT
    }
  }
  return NO_RESPONSE_TEXT
}

/**
 * A tool request paired with its result, for debugging display.
 */
export interface ToolTraceEntry {
  request: ToolRequest
  result?: ToolResult
}

/**
 * Pairs every tool request in the transcript with the result that answered it.
 * Requests without a result (e.g. after cancellation) have no `result`.
 */
export function toolTrace(transcript: readonly TranscriptEntry[]): ToolTraceEntry[] {
  const results = new Map<string, ToolResult>()
  for (const entry of transcript) {
    if (entry.type === 'toolResult') {
      results.set(entry.requestId, entry)
    }
  }

  const trace: ToolTraceEntry[] = []
  for (const entry of transcript) {
    if (entry.type !== 'modelMessage') continue
    for (const request of entry.toolRequests) {
      const result = results.get(request.id)
      trace.push(result ? { request, result } : { request })
    }
  }
  return trace
}
