import { describe, it, expect } from 'vitest'
import { formatResponse, formatTrace } from '../format-response.js'
import { ToolRequest, ToolResult } from '../types/messages.js'

const request = new ToolRequest({ id: 't1', toolName: 'read_filtered', arguments: { collection_name: 'users' } })

describe('formatTrace', () => {
  it('numbers calls and shows status and text', () => {
    const result = new ToolResult({ requestId: 't1', toolName: 'read_filtered', text: '[]' })

    expect(formatTrace([{ request, result }])).toBe('[1] read_filtered {"collection_name":"users"}\n    success: []')
  })

  it('cuts long results at 2000 characters', () => {
    const result = new ToolResult({ requestId: 't1', toolName: 'read_filtered', text: 'x'.repeat(2001), status: 'error' })

    expect(formatTrace([{ request, result }])).toBe(
      `[1] read_filtered {"collection_name":"users"}\n    error: ${'x'.repeat(2000)}... (truncated)`
    )
  })

  it('marks requests without a result', () => {
    expect(formatTrace([{ request }])).toBe('[1] read_filtered {"collection_name":"users"}\n    (no result)')
  })
})

describe('formatResponse', () => {
  it('prints only the text without a trace', () => {
    expect(formatResponse({ status: 'answered', text: 'ok' })).toBe('ok')
  })

  it('appends the trace section', () => {
    expect(formatResponse({ status: 'answered', text: 'ok', trace: [] })).toBe(
      'ok\n\n--- Tool trace ---\n(no tool calls)'
    )
  })
})
