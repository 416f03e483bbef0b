import { describe, it, expect } from 'vitest'
import { SlidingWindowConversationManager } from '../sliding-window-conversation-manager.js'
import { ModelMessage, ToolResult, UserMessage, type TranscriptEntry } from '../../types/messages.js'

function toolCall(id: string): ModelMessage {
  return new ModelMessage({
    text: '',
    toolRequests: [{ id, toolName: 'list_collections', arguments: {} }],
    stopReason: 'toolUse',
  })
}

function result(id: string, text = `result ${id}`): ToolResult {
  return new ToolResult({ requestId: id, toolName: 'list_collections', text })
}

// U, M(r1), R1, M(r2, r3), R2, R3, M(final)
function buildTranscript(): TranscriptEntry[] {
  return [
    new UserMessage('How many users?'),
    toolCall('r1'),
    result('r1', 'abcdefghij'),
    new ModelMessage({
      text: '',
      toolRequests: [
        { id: 'r2', toolName: 'describe_schema', arguments: { collection_name: 'users' } },
        { id: 'r3', toolName: 'describe_schema', arguments: { collection_name: 'orders' } },
      ],
      stopReason: 'toolUse',
    }),
    result('r2'),
    result('r3'),
    new ModelMessage({ text: 'There are 2 users.', toolRequests: [], stopReason: 'endTurn' }),
  ]
}

// U followed by `count - 1` plain answers
function answers(count: number): TranscriptEntry[] {
  const transcript: TranscriptEntry[] = [new UserMessage('Hi')]
  for (let i = 1; i < count; i++) {
    transcript.push(new ModelMessage({ text: `answer ${i}`, toolRequests: [], stopReason: 'endTurn' }))
  }
  return transcript
}

describe('SlidingWindowConversationManager', () => {
  describe('constructor', () => {
    it('sends at most 40 entries by default', () => {
      const transcript = answers(41)

      const selected = new SlidingWindowConversationManager().select(transcript)

      expect(selected).toHaveLength(40)
      expect(selected[0]).toBe(transcript[0])
      expect(selected[1]).toBe(transcript[2])
    })

    it('accepts custom windowSize', () => {
      expect(new SlidingWindowConversationManager({ windowSize: 20 }).select(answers(30))).toHaveLength(20)
    })

    it('rejects a window too small for the question and one reply', () => {
      expect(() => new SlidingWindowConversationManager({ windowSize: 1 })).toThrow(RangeError)
    })
  })

  describe('select', () => {
    it('returns everything when the transcript fits', () => {
      const transcript = buildTranscript()

      expect(new SlidingWindowConversationManager({ windowSize: 10 }).select(transcript)).toEqual(transcript)
    })

    it('keeps the question and the newest entries', () => {
      const transcript = buildTranscript()

      const selected = new SlidingWindowConversationManager({ windowSize: 5 }).select(transcript)

      expect(selected).toEqual([
        transcript[0],
        transcript[3],
        transcript[4],
        transcript[5],
        transcript[6],
      ])
    })

    it('never starts the tail on an orphaned tool result', () => {
      const transcript = buildTranscript()

      const selected = new SlidingWindowConversationManager({ windowSize: 4 }).select(transcript)

      expect(selected).toEqual([transcript[0], transcript[3], transcript[4], transcript[5], transcript[6]])
    })

    it('keeps the newest round whole when it has more results than the window holds', () => {
      const round = new ModelMessage({
        text: '',
        toolRequests: [
          { id: 'a', toolName: 'list_collections', arguments: {} },
          { id: 'b', toolName: 'list_collections', arguments: {} },
          { id: 'c', toolName: 'list_collections', arguments: {} },
        ],
        stopReason: 'toolUse',
      })
      const transcript = [new UserMessage('How many users?'), round, result('a'), result('b'), result('c')]

      const selected = new SlidingWindowConversationManager({ windowSize: 3 }).select(transcript)

      expect(selected.map((entry) => entry.type)).toEqual([
        'userMessage',
        'modelMessage',
        'toolResult',
        'toolResult',
        'toolResult',
      ])
    })

    it('does not modify the transcript', () => {
      const transcript = buildTranscript()

      new SlidingWindowConversationManager({ windowSize: 2, maxToolResultChars: 3 }).select(transcript)

      expect(transcript).toHaveLength(7)
      expect(transcript[2]).toEqual(result('r1', 'abcdefghij'))
    })

    it('truncates long tool results in the view only', () => {
      const transcript = buildTranscript()

      const selected = new SlidingWindowConversationManager({ windowSize: 10, maxToolResultChars: 9 }).select(
        transcript
      )

      expect(selected[2]).toEqual(result('r1', 'abcdefghi\n... (truncated)'))
      expect(selected[4]).toBe(transcript[4])
    })
  })
})
