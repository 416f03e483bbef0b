import { normalizeError } from '../errors.js'
import { logger } from '../logging/logger.js'
import type { StoredDocument } from '../store/document-store.js'
import type { Embedder } from './embeddings.js'
import type { VectorSearchBackend, VectorSearchHit } from './vector-search.js'

/**
 * One retrieved snippet of background knowledge.
 */
export interface RetrievedContextItem {
  /**
   * Where the snippet comes from, e.g. a collection name.
   */
  sourceLabel: string

  text: string

  /**
   * Similarity to the question, higher is more relevant.
   */
  score: number
}

/**
 * Location of a vector index.
 */
export interface SearchIndex {
  collection: string
  indexName: string

  /**
   * Field holding the vectors. Defaults to `embedding`.
   */
  path?: string
}

/**
 * Configuration for {@link SchemaRetriever}.
 */
export interface SchemaRetrieverConfig {
  embedder: Embedder
  search: VectorSearchBackend

  /**
   * Index of per-collection schema descriptions.
   */
  schemaIndex: SearchIndex

  /**
   * Index of worked question/query examples. Without it, {@link SchemaRetriever.augmentExamples} returns ''.
   */
  examplesIndex?: SearchIndex
}

/**
 * What to retrieve for one system prompt.
 */
export interface ContextOptions {
  topK: number

  /**
   * Number of worked examples. Leave undefined to skip examples.
   */
  exampleTopK?: number | undefined
}

/**
 * Source of prompt context for the agent.
 * Implementations return only non-empty blocks, in prompt order, and never throw.
 */
export interface ContextAugmenter {
  contextBlocks(queryText: string, options: ContextOptions, signal?: AbortSignal): Promise<string[]>
}

export const SCHEMA_CONTEXT_HEADER =
  'Relevant schema metadata (from vector search; use this to prioritize which collections/fields to use):'

export const EXAMPLES_CONTEXT_HEADER =
  'Similar example questions and how they were answered (use as reference for tool usage and query shape):'

/**
 * Retrieval augmentation for the agent's system prompt.
 *
 * Each block degrades to the empty string on any failure (no vector, search
 * error, no hits), so callers can append the result only when it is non-empty.
 * Hits are ranked approximately; equal scores keep the backend's order.
 */
export class SchemaRetriever implements ContextAugmenter {
  private readonly _config: SchemaRetrieverConfig

  constructor(config: SchemaRetrieverConfig) {
    this._config = config
  }

  /**
   * Schema context and, when requested, examples for a question.
   * The question is embedded once and both indexes are searched with that vector.
   */
  async contextBlocks(queryText: string, options: ContextOptions, signal?: AbortSignal): Promise<string[]> {
    const queryVector = await this._embed(queryText, signal)
    const blocks = await Promise.all([
      this._schemaBlock(queryVector, options.topK),
      options.exampleTopK === undefined ? '' : this._examplesBlock(queryVector, options.exampleTopK),
    ])
    return blocks.filter((block) => block !== '')
  }

  /**
   * Schema context for a question, as a bullet list under a fixed header.
   *
   * @param queryText - The user's question
   * @param topK - Maximum number of snippets
   * @returns The context block, or '' when nothing relevant was found
   */
  async augment(queryText: string, topK = 8, signal?: AbortSignal): Promise<string> {
    return this._schemaBlock(await this._embed(queryText, signal), topK)
  }

  /**
   * Ranked schema snippets for a question. Never throws.
   */
  async retrieveSchema(queryText: string, topK = 8, signal?: AbortSignal): Promise<RetrievedContextItem[]> {
    return this._schemaItems(await this._embed(queryText, signal), topK)
  }

  /**
   * Few-shot examples for a question, rendered as `Q:` / `→` pairs under a fixed header.
   *
   * @returns The examples block, or '' when disabled or nothing was found
   */
  async augmentExamples(queryText: string, topK = 3, signal?: AbortSignal): Promise<string> {
    if (!this._config.examplesIndex) {
      return ''
    }
    return this._examplesBlock(await this._embed(queryText, signal), topK)
  }

  private async _schemaBlock(queryVector: number[], topK: number): Promise<string> {
    const items = await this._schemaItems(queryVector, topK)
    if (items.length === 0) {
      return ''
    }
    const lines = [SCHEMA_CONTEXT_HEADER, '', ...items.map((item) => `- [${item.sourceLabel}] ${item.text}`)]
    return lines.join('\n')
  }

  private async _schemaItems(queryVector: number[], topK: number): Promise<RetrievedContextItem[]> {
    const hits = await this._search(this._config.schemaIndex, queryVector, topK)
    const items: RetrievedContextItem[] = []
    for (const hit of hits) {
      const text = firstString(hit.document, ['text', 'description'])
      if (!text) continue
      items.push({
        sourceLabel: firstString(hit.document, ['collection_name', 'collection']),
        text,
        score: hit.score,
      })
    }
    return rankItems(items, topK)
  }

  private async _examplesBlock(queryVector: number[], topK: number): Promise<string> {
    const examplesIndex = this._config.examplesIndex
    if (!examplesIndex) {
      return ''
    }

    const hits = await this._search(examplesIndex, queryVector, topK)
    const ranked = [...hits].sort((a, b) => b.score - a.score).slice(0, normalizeTopK(topK))

    const lines: string[] = []
    for (const { document } of ranked) {
      const question = firstString(document, ['natural_language', 'question'])
      const query = renderQuery(document)
      if (!question && !query) continue
      lines.push(`Q: ${question}`)
      if (query) {
        lines.push(`  → ${query}`)
      }
      lines.push('')
    }

    if (lines.length === 0) {
      return ''
    }
    return [EXAMPLES_CONTEXT_HEADER, '', ...lines].join('\n').trim()
  }

  /**
   * The question's vector, or [] when there is none. Never throws.
   */
  private async _embed(queryText: string, signal?: AbortSignal): Promise<number[]> {
    if (queryText.trim() === '') {
      return []
    }
    try {
      const queryVector = await this._config.embedder.embed(queryText, signal)
      if (queryVector.length === 0) {
        logger.debug('no query vector, skipping retrieval')
      }
      return queryVector
    } catch (error) {
      logger.warn(`query embedding failed | ${normalizeError(error).message}`)
      return []
    }
  }

  private async _search(index: SearchIndex, queryVector: number[], topK: number): Promise<VectorSearchHit[]> {
    if (queryVector.length === 0) {
      return []
    }

    try {
      return await this._config.search.search({
        collection: index.collection,
        indexName: index.indexName,
        path: index.path ?? 'embedding',
        queryVector,
        limit: normalizeTopK(topK),
      })
    } catch (error) {
      logger.warn(`index=<${index.indexName}> | vector search failed | ${normalizeError(error).message}`)
      return []
    }
  }
}

function normalizeTopK(topK: number): number {
  return Number.isFinite(topK) ? Math.max(1, Math.floor(topK)) : 1
}

function rankItems(items: RetrievedContextItem[], topK: number): RetrievedContextItem[] {
  // Array.prototype.sort is stable, so equal scores keep backend order.
  return [...items].sort((a, b) => b.score - a.score).slice(0, normalizeTopK(topK))
}

function firstString(document: StoredDocument, fields: string[]): string {
  for (const field of fields) {
    const value = document[field]
    if (typeof value === 'string' && value !== '') {
      return value
    }
  }
  return ''
}

function renderQuery(document: StoredDocument): string {
  for (const field of ['query', 'pipeline', 'example_query']) {
    const value = document[field]
    if (typeof value === 'string' && value !== '') {
      return value
    }
    if (typeof value === 'object' && value !== null) {
      return JSON.stringify(value)
    }
  }
  return ''
}
