import { describe, it, expect, vi } from 'vitest'
import { QueryAgent } from '../agent.js'
import { BASE_SYSTEM_PROMPT } from '../prompts.js'
import { NO_RESPONSE_TEXT } from '../transcript.js'
import { MockMessageModel } from '../../__fixtures__/mock-message-model.js'
import { collectGenerator } from '../../__fixtures__/model-test-helpers.js'
import { createMockTool } from '../../__fixtures__/tool-helpers.js'
import { createTestAgent } from '../../__fixtures__/agent-helpers.js'
import { FakeEmbedder, FakeVectorSearch } from '../../__fixtures__/retrieval-helpers.js'
import { EXAMPLES_CONTEXT_HEADER, SCHEMA_CONTEXT_HEADER, SchemaRetriever } from '../../retrieval/retriever.js'
import { SlidingWindowConversationManager } from '../../conversation-manager/sliding-window-conversation-manager.js'
import { MaxTokensError, ToolRegistryError } from '../../errors.js'

const listCollections = { id: 't1', toolName: 'list_collections', arguments: {} }

function createRetriever(embedder = new FakeEmbedder()): SchemaRetriever {
  return new SchemaRetriever({
    embedder,
    search: new FakeVectorSearch({
      schema_metadata: [{ document: { collection_name: 'users', text: 'users: name, status' }, score: 0.9 }],
      query_examples: [
        { document: { natural_language: 'Which users are active?', query: 'read_filtered(users)' }, score: 0.8 },
      ],
    }),
    schemaIndex: { collection: 'schema_metadata', indexName: 'schema_idx' },
    examplesIndex: { collection: 'query_examples', indexName: 'examples_idx' },
  })
}

describe('QueryAgent', () => {
  describe('constructor', () => {
    it('rejects a round cap below one', () => {
      expect(() => new QueryAgent({ model: new MockMessageModel(), maxRounds: 0 })).toThrow(RangeError)
    })

    it('rejects tools with duplicate names', () => {
      const tools = [createMockTool('dup', () => 'a'), [createMockTool('dup', () => 'b')]]

      expect(() => new QueryAgent({ model: new MockMessageModel(), tools })).toThrow(ToolRegistryError)
    })

    it('flattens nested tool lists', () => {
      const agent = new QueryAgent({
        model: new MockMessageModel(),
        tools: [createMockTool('a', () => ''), [createMockTool('b', () => ''), [createMockTool('c', () => '')]]],
      })

      expect(agent.tools.map((t) => t.name)).toEqual(['a', 'b', 'c'])
    })
  })

  describe('invoke', () => {
    it('answers after listing collections', async () => {
      const { agent, model } = createTestAgent()
      model.addTurn({ toolRequests: [listCollections] }).addTurn({ text: 'The database has users and orders.' })

      const result = await agent.invoke('List all collections.')

      expect(result.outcome).toBe('answer')
      expect(result.answer).toBe('The database has users and orders.')
      expect(result.rounds).toBe(2)
      expect(result.transcript.map((entry) => entry.type)).toEqual([
        'userMessage',
        'modelMessage',
        'toolResult',
        'modelMessage',
      ])
      expect(result.transcript[2]).toMatchObject({
        requestId: 't1',
        toolName: 'list_collections',
        text: "Collections in database 'shop': users, orders",
        status: 'success',
      })
    })

    it('lets the model recover from a malformed filter', async () => {
      const { agent, model, store } = createTestAgent()
      model
        .addTurn({
          toolRequests: [
            { id: 'f1', toolName: 'read_filtered', arguments: { collection_name: 'users', filter: '{"status": active}' } },
          ],
        })
        .addTurn({
          toolRequests: [
            {
              id: 'f2',
              toolName: 'read_filtered',
              arguments: { collection_name: 'users', filter: '{"status": "active"}' },
            },
          ],
        })
        .addTurn({ text: 'Ada is the only active user.' })

      const result = await agent.invoke('Which users are active?')

      expect(result.outcome).toBe('answer')
      expect(result.answer).toBe('Ada is the only active user.')

      const firstResult = result.transcript[2]
      expect(firstResult?.type).toBe('toolResult')
      if (firstResult?.type !== 'toolResult') return
      expect(firstResult.status).toBe('error')
      expect(firstResult.text.startsWith('Invalid JSON in filter or projection: ')).toBe(true)

      // the model saw the error before retrying
      expect(model.calls[1]?.transcript[2]).toBe(firstResult)
      expect(store.finds).toHaveLength(1)
      expect(store.finds[0]?.filter).toEqual({ status: 'active' })
    })

    it('answers a per-customer count with an aggregation pipeline', async () => {
      const { agent, model, store } = createTestAgent()
      model
        .addTurn({
          toolRequests: [
            {
              id: 'p1',
              toolName: 'run_pipeline',
              arguments: {
                collection_name: 'orders',
                pipeline: '[{"$group": {"_id": "$userId", "orders": {"$sum": 1}, "spent": {"$sum": "$total"}}}]',
              },
            },
          ],
        })
        .addTurn({ text: 'Customer 64b7f0c2a1b2c3d4e5f60001 placed 2 orders.' })

      const result = await agent.invoke('How many orders per customer?')

      expect(store.pipelines).toEqual([
        {
          collection: 'orders',
          pipeline: [
            { $group: { _id: '$userId', orders: { $sum: 1 }, spent: { $sum: '$total' } } },
            { $limit: 100 },
          ],
        },
      ])
      expect(result.transcript[2]).toMatchObject({
        requestId: 'p1',
        toolName: 'run_pipeline',
        status: 'success',
        text: '[\n  {\n    "_id": "64b7f0c2a1b2c3d4e5f60001",\n    "orders": 2,\n    "spent": 55.5\n  }\n]',
      })
      expect(result.answer).toBe('Customer 64b7f0c2a1b2c3d4e5f60001 placed 2 orders.')
    })

    it('stops at the round cap when the model keeps requesting tools', async () => {
      const { agent, model } = createTestAgent({ maxRounds: 3 })
      model.repeatTurn({ toolRequests: [listCollections] })

      const result = await agent.invoke('Loop forever')

      expect(result.outcome).toBe('roundLimitExceeded')
      expect(result.answer).toBe(NO_RESPONSE_TEXT)
      expect(result.rounds).toBe(3)
      expect(model.callCount).toBe(3)
      expect(result.transcript).toHaveLength(7)
    })

    it('defaults to ten rounds', async () => {
      const { agent, model } = createTestAgent()
      model.repeatTurn({ toolRequests: [listCollections] })

      const result = await agent.invoke('Loop forever')

      expect(result.outcome).toBe('roundLimitExceeded')
      expect(model.callCount).toBe(10)
    })

    it('keeps tool results in request order when tools finish out of order', async () => {
      let releaseFirst: () => void = () => {}
      const firstReleased = new Promise<void>((resolve) => {
        releaseFirst = resolve
      })
      const finished: string[] = []

      const model = new MockMessageModel()
        .addTurn({
          toolRequests: [
            { id: 'a', toolName: 'first', arguments: {} },
            { id: 'b', toolName: 'second', arguments: {} },
          ],
        })
        .addTurn({ text: 'done' })

      const agent = new QueryAgent({
        model,
        tools: [
          createMockTool('first', async () => {
            await firstReleased
            finished.push('first')
            return 'first result'
          }),
          createMockTool('second', () => {
            finished.push('second')
            releaseFirst()
            return 'second result'
          }),
        ],
      })

      const result = await agent.invoke('Run both')

      expect(finished).toEqual(['second', 'first'])
      expect(
        result.transcript.flatMap((entry) => (entry.type === 'toolResult' ? [[entry.requestId, entry.text]] : []))
      ).toEqual([
        ['a', 'first result'],
        ['b', 'second result'],
      ])
    })

    it('sends the tool specs to the model', async () => {
      const { agent, model } = createTestAgent()
      model.addTurn({ text: 'Hello' })

      await agent.invoke('Hi')

      expect(model.calls[0]?.options?.toolSpecs?.map((spec) => spec.name)).toEqual([
        'list_collections',
        'describe_schema',
        'read_filtered',
        'run_pipeline',
      ])
    })

    it('falls back when the final message has no text', async () => {
      const { agent, model } = createTestAgent()
      model.addTurn({})

      const result = await agent.invoke('Hi')

      expect(result.outcome).toBe('answer')
      expect(result.answer).toBe(NO_RESPONSE_TEXT)
    })

    it('propagates model errors', async () => {
      const { agent, model } = createTestAgent()
      model.addTurn(new Error('ThrottlingException: Too many requests'))

      await expect(agent.invoke('Hi')).rejects.toThrow('ThrottlingException: Too many requests')
    })

    it('throws MaxTokensError when the model hits its output limit', async () => {
      const { agent, model } = createTestAgent()
      model.addTurn({ text: 'partial', stopReason: 'maxTokens' })

      await expect(agent.invoke('Hi')).rejects.toBeInstanceOf(MaxTokensError)
    })

    it('keeps concurrent invocations independent', async () => {
      const { agent, model } = createTestAgent()
      model.repeatTurn({ text: 'same answer' })

      const [first, second] = await Promise.all([agent.invoke('first question'), agent.invoke('second question')])

      expect(first.transcript[0]).toEqual({ type: 'userMessage', text: 'first question' })
      expect(second.transcript[0]).toEqual({ type: 'userMessage', text: 'second question' })
      expect(first.transcript).toHaveLength(2)
      expect(second.transcript).toHaveLength(2)
    })
  })

  describe('system prompt', () => {
    it('is the base prompt without a retriever', async () => {
      const { agent, model } = createTestAgent()
      model.addTurn({ text: 'ok' })

      await agent.invoke('Hi')

      expect(model.calls[0]?.options?.systemPrompt).toBe(BASE_SYSTEM_PROMPT)
    })

    it('is exactly the base prompt when retrieval finds nothing', async () => {
      const { agent, model } = createTestAgent({ retriever: createRetriever(new FakeEmbedder([])), includeExamples: true })
      model.addTurn({ text: 'ok' })

      await agent.invoke('Hi')

      expect(model.calls[0]?.options?.systemPrompt).toBe(BASE_SYSTEM_PROMPT)
    })

    it('appends retrieved schema context after a blank line', async () => {
      const { agent, model } = createTestAgent({ retriever: createRetriever() })
      model.addTurn({ text: 'ok' })

      await agent.invoke('Which users are active?')

      expect(model.calls[0]?.options?.systemPrompt).toBe(
        `${BASE_SYSTEM_PROMPT}\n\n${SCHEMA_CONTEXT_HEADER}\n\n- [users] users: name, status`
      )
    })

    it('appends examples after the schema context when enabled', async () => {
      const { agent, model } = createTestAgent({ retriever: createRetriever(), includeExamples: true })
      model.addTurn({ text: 'ok' })

      await agent.invoke('Which users are active?')

      expect(model.calls[0]?.options?.systemPrompt).toBe(
        [
          BASE_SYSTEM_PROMPT,
          `${SCHEMA_CONTEXT_HEADER}\n\n- [users] users: name, status`,
          `${EXAMPLES_CONTEXT_HEADER}\n\nQ: Which users are active?\n  → read_filtered(users)`,
        ].join('\n\n')
      )
    })

    it('is rebuilt from the original question every round', async () => {
      const embedder = new FakeEmbedder()
      const { agent, model } = createTestAgent({ retriever: createRetriever(embedder) })
      model.addTurn({ toolRequests: [listCollections] }).addTurn({ text: 'ok' })

      await agent.invoke('How many users?')

      expect(embedder.inputs).toEqual(['How many users?', 'How many users?'])
      expect(model.calls[1]?.options?.systemPrompt).toBe(model.calls[0]?.options?.systemPrompt)
    })

    it('embeds the question once per round with examples enabled', async () => {
      const embedder = new FakeEmbedder()
      const { agent, model } = createTestAgent({ retriever: createRetriever(embedder), includeExamples: true })
      model.addTurn({ toolRequests: [listCollections] }).addTurn({ text: 'ok' })

      await agent.invoke('Which users are active?')

      expect(embedder.inputs).toEqual(['Which users are active?', 'Which users are active?'])
      expect(model.calls[1]?.options?.systemPrompt).toContain(EXAMPLES_CONTEXT_HEADER)
    })
  })

  describe('conversation manager', () => {
    it('windows what the model sees without trimming the transcript', async () => {
      const { agent, model } = createTestAgent({
        conversationManager: new SlidingWindowConversationManager({ windowSize: 3 }),
      })
      model
        .addTurn({ toolRequests: [listCollections] })
        .addTurn({ toolRequests: [{ id: 't2', toolName: 'list_collections', arguments: {} }] })
        .addTurn({ text: 'ok' })

      const result = await agent.invoke('Hi')

      expect(model.calls[2]?.transcript.map((entry) => entry.type)).toEqual([
        'userMessage',
        'modelMessage',
        'toolResult',
      ])
      expect(result.transcript).toHaveLength(6)
    })
  })

  describe('cancellation', () => {
    it('rejects with the abort reason before calling the model', async () => {
      const { agent, model } = createTestAgent()
      model.addTurn({ text: 'never' })
      const controller = new AbortController()
      controller.abort(new Error('cancelled by user'))

      await expect(agent.invoke('Hi', { signal: controller.signal })).rejects.toThrow('cancelled by user')
      expect(model.callCount).toBe(0)
    })

    it('stops after the tools of the round in which it was aborted', async () => {
      const controller = new AbortController()
      const model = new MockMessageModel()
        .addTurn({ toolRequests: [{ id: 'x', toolName: 'cancel', arguments: {} }] })
        .addTurn({ text: 'never' })
      const agent = new QueryAgent({
        model,
        tools: [
          createMockTool('cancel', () => {
            controller.abort(new Error('cancelled by user'))
            return 'ok'
          }),
        ],
      })

      await expect(agent.invoke('Hi', { signal: controller.signal })).rejects.toThrow('cancelled by user')
      expect(model.callCount).toBe(1)
    })

    it('aborts a tool call still waiting on the database', async () => {
      const { agent, model, store } = createTestAgent()
      store.stall()
      model.addTurn({ toolRequests: [listCollections] }).addTurn({ text: 'never' })
      const controller = new AbortController()

      const pending = agent.invoke('List all collections.', { signal: controller.signal })
      await vi.waitFor(() => expect(store.stalledCalls).toBe(1))
      controller.abort(new Error('cancelled by user'))

      await expect(pending).rejects.toThrow('cancelled by user')
      expect(model.callCount).toBe(1)
    })

    it('does not wait for a tool that ignores the signal', async () => {
      let started = false
      const model = new MockMessageModel()
        .addTurn({ toolRequests: [{ id: 'x', toolName: 'slow', arguments: {} }] })
        .addTurn({ text: 'never' })
      const agent = new QueryAgent({
        model,
        tools: [
          createMockTool('slow', () => {
            started = true
            return new Promise<string>(() => {})
          }),
        ],
      })
      const controller = new AbortController()

      const pending = agent.invoke('Hi', { signal: controller.signal })
      await vi.waitFor(() => expect(started).toBe(true))
      controller.abort(new Error('cancelled by user'))

      await expect(pending).rejects.toThrow('cancelled by user')
      expect(model.callCount).toBe(1)
    })

    it('forwards the signal to the model', async () => {
      const { agent, model } = createTestAgent()
      model.addTurn({ text: 'ok' })
      const controller = new AbortController()

      await agent.invoke('Hi', { signal: controller.signal })

      expect(model.calls[0]?.options?.signal).toBe(controller.signal)
    })
  })

  describe('stream', () => {
    it('yields loop events in order and returns the result', async () => {
      const { agent, model } = createTestAgent()
      model.addTurn({ toolRequests: [listCollections] }).addTurn({ text: 'done' })

      const { items, result } = await collectGenerator(agent.stream('List all collections.'))

      const loopEvents = items
        .map((event) => event.type)
        .filter((type) => !type.startsWith('model'))
      expect(loopEvents).toEqual([
        'beforeInvocationEvent',
        'beforeModelEvent',
        'afterModelEvent',
        'beforeToolsEvent',
        'toolResultEvent',
        'afterToolsEvent',
        'beforeModelEvent',
        'afterModelEvent',
        'afterInvocationEvent',
      ])
      expect(items.at(-1)).toEqual({ type: 'afterInvocationEvent', result })
      expect(result.answer).toBe('done')
    })

    it('re-yields the model stream events', async () => {
      const { agent, model } = createTestAgent()
      model.addTurn({ text: 'Hello' })

      const { items } = await collectGenerator(agent.stream('Hi'))

      expect(items).toContainEqual({
        type: 'modelContentBlockDeltaEvent',
        delta: { type: 'textDelta', text: 'Hello' },
      })
    })
  })
})
