/**
 * Test fixtures and helpers for QueryAgent testing.
 * Builds an agent over the scripted model and the in-memory document store.
 */

import { ObjectId } from 'mongodb'
import { QueryAgent, type QueryAgentConfig } from '../agent/agent.js'
import type { StoredDocument } from '../store/document-store.js'
import { createDatabaseTools } from '../vended-tools/database/index.js'
import { InMemoryDocumentStore } from './in-memory-document-store.js'
import { MockMessageModel } from './mock-message-model.js'

/**
 * Fixed identifiers so expected tool output can be written out in tests.
 */
export const USER_IDS = {
  ada: new ObjectId('64b7f0c2a1b2c3d4e5f60001'),
  linus: new ObjectId('64b7f0c2a1b2c3d4e5f60002'),
} as const

/**
 * A small users/orders database.
 */
export function createSampleCollections(): Record<string, StoredDocument[]> {
  return {
    users: [
      { _id: USER_IDS.ada, name: 'Ada', status: 'active', age: 36 },
      { _id: USER_IDS.linus, name: 'Linus', status: 'inactive', age: 28 },
    ],
    orders: [
      { _id: new ObjectId('64b7f0c2a1b2c3d4e5f61001'), userId: USER_IDS.ada, total: 40 },
      { _id: new ObjectId('64b7f0c2a1b2c3d4e5f61002'), userId: USER_IDS.ada, total: 15.5 },
    ],
  }
}

export interface TestAgentSetup {
  agent: QueryAgent
  model: MockMessageModel
  store: InMemoryDocumentStore
}

/**
 * Creates an agent wired to the database tools over an in-memory store.
 *
 * @param config - Overrides for the agent configuration
 */
export function createTestAgent(config?: Omit<QueryAgentConfig, 'model' | 'tools'>): TestAgentSetup {
  const model = new MockMessageModel()
  const store = new InMemoryDocumentStore({ databaseName: 'shop', collections: createSampleCollections() })
  const agent = new QueryAgent({ ...config, model, tools: createDatabaseTools(store) })
  return { agent, model, store }
}
