/**
 * In-process DocumentStore for tool and agent tests.
 *
 * Supports what the tests need from a query engine: equality and a few
 * comparison operators in filters, inclusion/exclusion projections, and the
 * `$match`, `$group` (with `$sum`) and `$limit` aggregation stages. Other
 * stages pass documents through.
 */

import { ObjectId } from 'mongodb'
import type { DocumentStore, FindOptions, StoreCallOptions, StoredDocument } from '../store/document-store.js'
import { raceAbort } from '../abort.js'
import { isPlainRecord } from '../vended-tools/database/serialize.js'

export interface InMemoryDocumentStoreOptions {
  databaseName?: string
  collections?: Record<string, StoredDocument[]>
}

export class InMemoryDocumentStore implements DocumentStore {
  readonly databaseName: string
  private readonly _collections: Map<string, StoredDocument[]>
  private _failure: unknown
  private _hasFailure = false
  private _stalled = false

  /**
   * Number of calls left pending by {@link stall}.
   */
  stalledCalls = 0

  /**
   * Every pipeline passed to {@link aggregate}, in call order.
   */
  readonly pipelines: { collection: string; pipeline: StoredDocument[] }[] = []

  /**
   * Every find call, in call order.
   */
  readonly finds: { collection: string; filter: StoredDocument; options: FindOptions }[] = []

  constructor(options?: InMemoryDocumentStoreOptions) {
    this.databaseName = options?.databaseName ?? 'test_db'
    this._collections = new Map(Object.entries(options?.collections ?? {}))
  }

  /**
   * Makes every following call reject with `error`.
   */
  failWith(error: unknown): this {
    this._failure = error
    this._hasFailure = true
    return this
  }

  /**
   * Makes every following call stay pending until its signal aborts.
   */
  stall(): this {
    this._stalled = true
    return this
  }

  async listCollections(options?: StoreCallOptions): Promise<string[]> {
    return this._run(options?.signal, () => [...this._collections.keys()])
  }

  async find(collection: string, filter: StoredDocument, options: FindOptions): Promise<StoredDocument[]> {
    this.finds.push({ collection, filter, options })
    return this._run(options.signal, () => {
      const documents = (this._collections.get(collection) ?? []).filter((document) => matches(document, filter))
      return documents.slice(0, options.limit).map((document) => applyProjection(document, options.projection))
    })
  }

  async aggregate(collection: string, pipeline: StoredDocument[], options?: StoreCallOptions): Promise<StoredDocument[]> {
    this.pipelines.push({ collection, pipeline })
    return this._run(options?.signal, () => {
      let documents = [...(this._collections.get(collection) ?? [])]
      for (const stage of pipeline) {
        const match = stage['$match']
        const group = stage['$group']
        const limit = stage['$limit']
        if (isPlainRecord(match)) {
          documents = documents.filter((document) => matches(document, match))
        } else if (isPlainRecord(group)) {
          documents = groupDocuments(documents, group)
        } else if (typeof limit === 'number') {
          documents = documents.slice(0, limit)
        }
      }
      return documents
    })
  }

  private async _run<T>(signal: AbortSignal | undefined, compute: () => T): Promise<T> {
    signal?.throwIfAborted()
    if (this._stalled) {
      this.stalledCalls++
      return raceAbort(new Promise<T>(() => {}), signal)
    }
    if (this._hasFailure) {
      throw this._failure
    }
    return compute()
  }
}

function groupDocuments(documents: StoredDocument[], stage: Record<string, unknown>): StoredDocument[] {
  const groups = new Map<string, { id: unknown; members: StoredDocument[] }>()
  for (const document of documents) {
    const id = resolveExpression(document, stage['_id']) ?? null
    const key = id instanceof ObjectId ? `oid:${id.toHexString()}` : JSON.stringify(id)
    const group = groups.get(key)
    if (group) {
      group.members.push(document)
    } else {
      groups.set(key, { id, members: [document] })
    }
  }

  return [...groups.values()].map(({ id, members }) => {
    const result: StoredDocument = { _id: id }
    for (const [field, accumulator] of Object.entries(stage)) {
      if (field === '_id') continue
      if (!isPlainRecord(accumulator) || !('$sum' in accumulator)) {
        throw new Error(`unsupported accumulator for ${field}`)
      }
      result[field] = members.reduce((total, member) => {
        const value = resolveExpression(member, accumulator['$sum'])
        return total + (typeof value === 'number' ? value : 0)
      }, 0)
    }
    return result
  })
}

function resolveExpression(document: StoredDocument, expression: unknown): unknown {
  return typeof expression === 'string' && expression.startsWith('$') ? document[expression.slice(1)] : expression
}

function matches(document: StoredDocument, filter: StoredDocument): boolean {
  return Object.entries(filter).every(([field, condition]) => matchesCondition(document[field], condition))
}

function matchesCondition(value: unknown, condition: unknown): boolean {
  if (isPlainRecord(condition) && Object.keys(condition).some((key) => key.startsWith('$'))) {
    return Object.entries(condition).every(([operator, operand]) => {
      switch (operator) {
        case '$eq':
          return valuesEqual(value, operand)
        case '$ne':
          return !valuesEqual(value, operand)
        case '$in':
          return Array.isArray(operand) && operand.some((item) => valuesEqual(value, item))
        case '$gt':
          return compare(value, operand) > 0
        case '$gte':
          return compare(value, operand) >= 0
        case '$lt':
          return compare(value, operand) < 0
        case '$lte':
          return compare(value, operand) <= 0
        default:
          throw new Error(`unknown operator ${operator}`)
      }
    })
  }
  return valuesEqual(value, condition)
}

function valuesEqual(left: unknown, right: unknown): boolean {
  if (left instanceof ObjectId && right instanceof ObjectId) {
    return left.equals(right)
  }
  if (left instanceof Date && right instanceof Date) {
    return left.getTime() === right.getTime()
  }
  return left === right
}

function compare(left: unknown, right: unknown): number {
  const a = left instanceof Date ? left.getTime() : left
  const b = right instanceof Date ? right.getTime() : right
  if (typeof a === 'number' && typeof b === 'number') {
    return a - b
  }
  if (typeof a === 'string' && typeof b === 'string') {
    return a < b ? -1 : a > b ? 1 : 0
  }
  return Number.NaN
}

function applyProjection(document: StoredDocument, projection: StoredDocument | undefined): StoredDocument {
  if (!projection) {
    return document
  }
  const entries = Object.entries(projection)
  const included = entries.filter(([field, flag]) => field !== '_id' && isTruthyFlag(flag)).map(([field]) => field)
  const excludeId = entries.some(([field, flag]) => field === '_id' && !isTruthyFlag(flag))

  let result: StoredDocument
  if (included.length > 0) {
    result = {}
    if (!excludeId && '_id' in document) {
      result['_id'] = document['_id']
    }
    for (const field of included) {
      if (field in document) {
        result[field] = document[field]
      }
    }
  } else {
    const excluded = new Set(entries.filter(([, flag]) => !isTruthyFlag(flag)).map(([field]) => field))
    result = Object.fromEntries(Object.entries(document).filter(([field]) => !excluded.has(field)))
  }
  return result
}

function isTruthyFlag(flag: unknown): boolean {
  return flag === 1 || flag === true
}
