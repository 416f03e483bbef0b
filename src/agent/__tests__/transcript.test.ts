import { describe, it, expect } from 'vitest'
import { NO_RESPONSE_TEXT, extractAnswer, toolTrace } from '../transcript.js'
import { ModelMessage, ToolResult, UserMessage } from '../../types/messages.js'

const question = new UserMessage('How many users?')
const toolCall = new ModelMessage({
  text: 'Let me check.',
  toolRequests: [
    { id: 'r1', toolName: 'list_collections', arguments: {} },
    { id: 'r2', toolName: 'describe_schema', arguments: { collection_name: 'users' } },
  ],
  stopReason: 'toolUse',
})
const listResult = new ToolResult({ requestId: 'r1', toolName: 'list_collections', text: 'users' })
const answer = new ModelMessage({ text: 'There are 2 users.', toolRequests: [], stopReason: 'endTurn' })

describe('extractAnswer', () => {
  it('returns the text of the last message without tool requests', () => {
    const earlier = new ModelMessage({ text: 'Earlier answer', toolRequests: [], stopReason: 'endTurn' })

    expect(extractAnswer([question, earlier, toolCall, listResult, answer])).toBe('There are 2 users.')
  })

  it('ignores text on messages that request tools', () => {
    expect(extractAnswer([question, toolCall, listResult])).toBe(NO_RESPONSE_TEXT)
  })

  it('falls back for an empty final text', () => {
    const empty = new ModelMessage({ text: '', toolRequests: [], stopReason: 'endTurn' })

    expect(extractAnswer([question, empty])).toBe('No response generated.')
  })

  it('falls back for a transcript with only the question', () => {
    expect(extractAnswer([question])).toBe(NO_RESPONSE_TEXT)
  })
})

describe('toolTrace', () => {
  it('pairs each request with its result and leaves unanswered ones bare', () => {
    const trace = toolTrace([question, toolCall, listResult, answer])

    expect(trace).toHaveLength(2)
    expect(trace[0]?.request.id).toBe('r1')
    expect(trace[0]?.result).toBe(listResult)
    expect(trace[1]?.request.id).toBe('r2')
    expect(trace[1]).not.toHaveProperty('result')
  })
})
