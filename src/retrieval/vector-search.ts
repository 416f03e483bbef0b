import type { Db } from 'mongodb'
import type { StoredDocument } from '../store/document-store.js'

/**
 * One nearest-neighbour query against a vector index.
 */
export interface VectorSearchQuery {
  /**
   * Collection holding the indexed entries.
   */
  collection: string

  /**
   * Name of the vector index.
   */
  indexName: string

  /**
   * Field holding the stored vectors. Excluded from results.
   */
  path: string

  queryVector: number[]

  /**
   * Maximum number of hits.
   */
  limit: number
}

/**
 * A ranked search hit.
 */
export interface VectorSearchHit {
  /**
   * The indexed entry, without its vector.
   */
  document: StoredDocument

  /**
   * Similarity score, higher is more relevant.
   */
  score: number
}

/**
 * Approximate nearest-neighbour search. Ties are ordered however the backend orders them.
 */
export interface VectorSearchBackend {
  search(query: VectorSearchQuery): Promise<VectorSearchHit[]>
}

const SCORE_FIELD = '_searchScore'

/**
 * Candidates examined before ranking: twenty per requested hit, at least one hundred.
 */
export function candidateCount(limit: number): number {
  return Math.max(limit * 20, 100)
}

/**
 * Aggregation pipeline for an Atlas `$vectorSearch` query that drops the vector
 * field and exposes the similarity score.
 */
export function buildVectorSearchPipeline(query: VectorSearchQuery): StoredDocument[] {
  return [
    {
      $vectorSearch: {
        index: query.indexName,
        path: query.path,
        queryVector: query.queryVector,
        numCandidates: candidateCount(query.limit),
        limit: query.limit,
      },
    },
    { $project: { [query.path]: 0, [SCORE_FIELD]: { $meta: 'vectorSearchScore' } } },
  ]
}

/**
 * {@link VectorSearchBackend} over MongoDB Atlas Vector Search.
 */
export class MongoVectorSearch implements VectorSearchBackend {
  private readonly _db: Db

  constructor(db: Db) {
    this._db = db
  }

  async search(query: VectorSearchQuery): Promise<VectorSearchHit[]> {
    if (query.queryVector.length === 0) {
      return []
    }

    const documents = await this._db.collection(query.collection).aggregate(buildVectorSearchPipeline(query)).toArray()

    return documents.map((document) => {
      const { [SCORE_FIELD]: score, ...rest } = document
      return { document: rest, score: typeof score === 'number' ? score : 0 }
    })
  }
}
