/**
 * Read-only view of a document database, as used by the database tools.
 */

/**
 * A document as returned by the store. Values may be driver types such as ObjectId or Date.
 */
export type StoredDocument = Record<string, unknown>

/**
 * Options every store call accepts.
 */
export interface StoreCallOptions {
  /**
   * Abandons the call. The returned promise rejects with the signal's reason.
   */
  signal?: AbortSignal | undefined
}

/**
 * Options for {@link DocumentStore.find}.
 */
export interface FindOptions extends StoreCallOptions {
  /**
   * Field selection, e.g. `{ name: 1, _id: 0 }`.
   */
  projection?: StoredDocument

  /**
   * Maximum number of documents to return.
   */
  limit: number
}

/**
 * Size-bounded read primitives over one database.
 *
 * Implementations throw ordinary errors for query failures (reported to the
 * model as text by the tools) and `StoreConnectionError` when the database
 * cannot be reached at all.
 */
export interface DocumentStore {
  /**
   * Name of the database the store reads from.
   */
  readonly databaseName: string

  /**
   * Names of all collections, in the order the database reports them.
   */
  listCollections(options?: StoreCallOptions): Promise<string[]>

  /**
   * Documents matching `filter`, at most `options.limit` of them.
   */
  find(collection: string, filter: StoredDocument, options: FindOptions): Promise<StoredDocument[]>

  /**
   * Output of an aggregation pipeline. Callers bound the size with a `$limit` stage.
   */
  aggregate(collection: string, pipeline: StoredDocument[], options?: StoreCallOptions): Promise<StoredDocument[]>
}
