import { describe, it, expect, beforeEach } from 'vitest'
import { createReadFilteredTool } from '../read-filtered.js'
import { InMemoryDocumentStore } from '../../../__fixtures__/in-memory-document-store.js'
import { createSampleCollections } from '../../../__fixtures__/agent-helpers.js'
import { createMockContext } from '../../../__fixtures__/tool-helpers.js'
import { StoreConnectionError } from '../../../errors.js'
import type { JSONValue } from '../../../types/json.js'

describe('read_filtered tool', () => {
  let store: InMemoryDocumentStore

  beforeEach(() => {
    store = new InMemoryDocumentStore({ collections: createSampleCollections() })
  })

  const run = (args: { [key: string]: JSONValue }) =>
    createReadFilteredTool(store).execute(createMockContext('read_filtered', args))

  it('accepts the filter as JSON text', async () => {
    const result = await run({ collection_name: 'users', filter: '{"status": "active"}' })

    expect(result.status).toBe('success')
    expect(JSON.parse(result.text)).toEqual([
      { _id: '64b7f0c2a1b2c3d4e5f60001', name: 'Ada', status: 'active', age: 36 },
    ])
  })

  it('accepts the filter as an object', async () => {
    const result = await run({ collection_name: 'users', filter: { status: 'inactive' } })

    expect(JSON.parse(result.text)).toEqual([
      { _id: '64b7f0c2a1b2c3d4e5f60002', name: 'Linus', status: 'inactive', age: 28 },
    ])
  })

  it('parses Extended JSON identifiers in the filter', async () => {
    const result = await run({ collection_name: 'users', filter: '{"_id": {"$oid": "64b7f0c2a1b2c3d4e5f60002"}}' })

    expect(JSON.parse(result.text)).toEqual([
      { _id: '64b7f0c2a1b2c3d4e5f60002', name: 'Linus', status: 'inactive', age: 28 },
    ])
  })

  it('stringifies nested identifiers', async () => {
    const result = await run({ collection_name: 'orders' })

    expect(JSON.parse(result.text)).toEqual([
      { _id: '64b7f0c2a1b2c3d4e5f61001', userId: '64b7f0c2a1b2c3d4e5f60001', total: 40 },
      { _id: '64b7f0c2a1b2c3d4e5f61002', userId: '64b7f0c2a1b2c3d4e5f60001', total: 15.5 },
    ])
  })

  it('applies projection and limit', async () => {
    const result = await run({ collection_name: 'users', projection: { name: 1, _id: 0 }, limit: 1 })

    expect(store.finds[0]?.options).toEqual({ projection: { name: 1, _id: 0 }, limit: 1 })
    expect(JSON.parse(result.text)).toEqual([{ name: 'Ada' }])
  })

  it('uses an empty filter, no projection and a limit of 50 by default', async () => {
    await run({ collection_name: 'users', projection: {} })

    expect(store.finds[0]).toEqual({ collection: 'users', filter: {}, options: { limit: 50 } })
  })

  it('reports malformed filter text without querying', async () => {
    const result = await run({ collection_name: 'users', filter: '{"status": active}' })

    expect(result.status).toBe('error')
    expect(result.text.startsWith('Invalid JSON in filter or projection: ')).toBe(true)
    expect(store.finds).toHaveLength(0)
  })

  it('rejects a filter that is not an object', async () => {
    const result = await run({ collection_name: 'users', filter: '[1, 2]' })

    expect(result.text).toBe('Invalid JSON in filter or projection: filter must be a JSON object')
  })

  it('reports backend errors as text', async () => {
    store.failWith(new Error("unknown operator: $regexx"))

    const result = await run({ collection_name: 'users', filter: { name: { $regexx: 'A' } } })

    expect(result.status).toBe('error')
    expect(result.text).toBe('Error executing find: unknown operator: $regexx')
  })

  it('propagates connection failures', async () => {
    store.failWith(new StoreConnectionError('Database unreachable: timeout'))

    await expect(run({ collection_name: 'users' })).rejects.toBeInstanceOf(StoreConnectionError)
  })
})
