import { describe, it, expect } from 'vitest'
import { createListCollectionsTool } from '../list-collections.js'
import { createDatabaseTools } from '../index.js'
import { InMemoryDocumentStore } from '../../../__fixtures__/in-memory-document-store.js'
import { createSampleCollections } from '../../../__fixtures__/agent-helpers.js'
import { createMockContext } from '../../../__fixtures__/tool-helpers.js'
import { StoreConnectionError } from '../../../errors.js'

describe('list_collections tool', () => {
  it('lists collection names with the database name', async () => {
    const store = new InMemoryDocumentStore({ databaseName: 'shop', collections: createSampleCollections() })

    const result = await createListCollectionsTool(store).execute(createMockContext('list_collections'))

    expect(result.text).toBe("Collections in database 'shop': users, orders")
    expect(result.status).toBe('success')
  })

  it('reports None for an empty database', async () => {
    const store = new InMemoryDocumentStore({ databaseName: 'empty' })

    const result = await createListCollectionsTool(store).execute(createMockContext('list_collections'))

    expect(result.text).toBe("Collections in database 'empty': None")
  })

  it('reports backend errors as text', async () => {
    const store = new InMemoryDocumentStore().failWith(new Error('not authorized on test_db'))

    const result = await createListCollectionsTool(store).execute(createMockContext('list_collections'))

    expect(result.status).toBe('error')
    expect(result.text).toBe('Error listing collections: not authorized on test_db')
  })

  it('propagates connection failures', async () => {
    const store = new InMemoryDocumentStore().failWith(new StoreConnectionError('Database unreachable: timeout'))

    await expect(createListCollectionsTool(store).execute(createMockContext('list_collections'))).rejects.toThrow(
      'Database unreachable: timeout'
    )
  })

  it('abandons a pending store call when the request is aborted', async () => {
    const store = new InMemoryDocumentStore().stall()
    const controller = new AbortController()

    const pending = createListCollectionsTool(store).execute({
      ...createMockContext('list_collections'),
      signal: controller.signal,
    })
    controller.abort(new Error('cancelled by user'))

    await expect(pending).rejects.toThrow('cancelled by user')
    expect(store.stalledCalls).toBe(1)
  })
})

describe('createDatabaseTools', () => {
  it('returns the four tools in a fixed order', () => {
    const tools = createDatabaseTools(new InMemoryDocumentStore())

    expect(tools.map((t) => t.name)).toEqual(['list_collections', 'describe_schema', 'read_filtered', 'run_pipeline'])
  })
})
