/**
 * Fakes for the embedding and vector search collaborators of the retriever.
 */

import type { Embedder } from '../retrieval/embeddings.js'
import type { VectorSearchBackend, VectorSearchHit, VectorSearchQuery } from '../retrieval/vector-search.js'

/**
 * Embedder returning a fixed vector, or failing.
 */
export class FakeEmbedder implements Embedder {
  readonly inputs: string[] = []
  private readonly _result: number[] | Error

  constructor(result: number[] | Error = [0.1, 0.2, 0.3]) {
    this._result = result
  }

  async embed(text: string): Promise<number[]> {
    this.inputs.push(text)
    if (this._result instanceof Error) {
      throw this._result
    }
    return this._result
  }
}

/**
 * Vector search returning canned hits per collection, at most `limit` of them.
 */
export class FakeVectorSearch implements VectorSearchBackend {
  readonly queries: VectorSearchQuery[] = []
  private readonly _hits: Record<string, VectorSearchHit[]>
  private _failure: Error | undefined

  constructor(hits: Record<string, VectorSearchHit[]> = {}) {
    this._hits = hits
  }

  failWith(error: Error): this {
    this._failure = error
    return this
  }

  async search(query: VectorSearchQuery): Promise<VectorSearchHit[]> {
    this.queries.push(query)
    if (this._failure) {
      throw this._failure
    }
    return (this._hits[query.collection] ?? []).slice(0, query.limit)
  }
}
