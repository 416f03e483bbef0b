import {
  MongoClient,
  type AbstractCursor,
  MongoNetworkError,
  MongoServerSelectionError,
  type Db,
  type MongoClientOptions,
} from 'mongodb'
import { StoreConnectionError } from '../errors.js'
import { raceAbort } from '../abort.js'
import { logger } from '../logging/logger.js'
import type { DocumentStore, FindOptions, StoreCallOptions, StoredDocument } from './document-store.js'

/**
 * Options for {@link connectMongo}.
 */
export interface MongoConnectionOptions {
  uri: string
  databaseName: string

  /**
   * Upper bound on pooled connections shared by all tool calls.
   */
  maxPoolSize?: number

  /**
   * How long to wait for a reachable server before failing. Defaults to 10 seconds.
   */
  serverSelectionTimeoutMS?: number
}

/**
 * An open client plus the database handle the agent works on.
 */
export interface MongoConnection {
  client: MongoClient
  db: Db
}

/**
 * Opens a pooled MongoDB client.
 *
 * @throws StoreConnectionError when no server can be reached
 */
export async function connectMongo(options: MongoConnectionOptions): Promise<MongoConnection> {
  const clientOptions: MongoClientOptions = {
    serverSelectionTimeoutMS: options.serverSelectionTimeoutMS ?? 10_000,
  }
  if (options.maxPoolSize !== undefined) {
    clientOptions.maxPoolSize = options.maxPoolSize
  }

  const client = new MongoClient(options.uri, clientOptions)
  try {
    await client.connect()
  } catch (error) {
    throw toStoreError(error)
  }
  return { client, db: client.db(options.databaseName) }
}

/**
 * {@link DocumentStore} backed by a MongoDB database.
 *
 * Each call checks a connection out of the driver's pool for its duration only;
 * no session or transaction spans tool calls.
 */
export class MongoDocumentStore implements DocumentStore {
  private readonly _db: Db

  constructor(db: Db) {
    this._db = db
  }

  get databaseName(): string {
    return this._db.databaseName
  }

  async listCollections(options?: StoreCallOptions): Promise<string[]> {
    options?.signal?.throwIfAborted()
    const cursor = this._db.listCollections({}, { nameOnly: true })
    try {
      const collections = await raceAbort(cursor.toArray(), options?.signal, () => closeCursor(cursor))
      return collections.map((collection) => collection.name)
    } catch (error) {
      throw toStoreError(error)
    }
  }

  async find(collection: string, filter: StoredDocument, options: FindOptions): Promise<StoredDocument[]> {
    options.signal?.throwIfAborted()
    const cursor = options.projection
      ? this._db.collection(collection).find(filter, { projection: options.projection })
      : this._db.collection(collection).find(filter)
    try {
      return await raceAbort(cursor.limit(options.limit).toArray(), options.signal, () => closeCursor(cursor))
    } catch (error) {
      throw toStoreError(error)
    }
  }

  async aggregate(collection: string, pipeline: StoredDocument[], options?: StoreCallOptions): Promise<StoredDocument[]> {
    options?.signal?.throwIfAborted()
    const cursor = this._db.collection(collection).aggregate(pipeline)
    try {
      return await raceAbort(cursor.toArray(), options?.signal, () => closeCursor(cursor))
    } catch (error) {
      throw toStoreError(error)
    }
  }
}

/**
 * Kills the server-side cursor of an abandoned call.
 */
function closeCursor(cursor: AbstractCursor): void {
  cursor.close().catch((error: unknown) => {
    logger.debug('failed to close cursor of an aborted call', error)
  })
}

/**
 * Wraps unreachable-server failures in {@link StoreConnectionError}; other errors pass through.
 */
export function toStoreError(error: unknown): unknown {
  if (error instanceof MongoServerSelectionError || error instanceof MongoNetworkError) {
    return new StoreConnectionError(`Database unreachable: ${error.message}`, { cause: error })
  }
  return error
}
