import type { ToolTraceEntry } from './agent/transcript.js'
import type { QueryResponse } from './query-service.js'

/**
 * Tool results longer than this are cut in the printed trace.
 */
export const TRACE_RESULT_MAX_CHARS = 2000

/**
 * Renders the tool trace for the terminal.
 */
export function formatTrace(trace: ToolTraceEntry[]): string {
  const lines: string[] = []
  trace.forEach(({ request, result }, idx) => {
    lines.push(`[${idx + 1}] ${request.toolName} ${JSON.stringify(request.arguments)}`)
    if (!result) {
      lines.push('    (no result)')
      return
    }
    const text =
      result.text.length > TRACE_RESULT_MAX_CHARS
        ? `${result.text.slice(0, TRACE_RESULT_MAX_CHARS)}... (truncated)`
        : result.text
    lines.push(`    ${result.status}: ${text}`)
  })
  return lines.join('\n')
}

/**
 * Renders a response, with its trace when present.
 */
export function formatResponse(response: QueryResponse): string {
  if (!response.trace) {
    return response.text
  }
  const trace = response.trace.length > 0 ? formatTrace(response.trace) : '(no tool calls)'
  return `${response.text}\n\n--- Tool trace ---\n${trace}`
}
