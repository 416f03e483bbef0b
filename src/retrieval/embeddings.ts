import {
  BedrockRuntimeClient,
  InvokeModelCommand,
  type BedrockRuntimeClientConfig,
} from '@aws-sdk/client-bedrock-runtime'
import { z } from 'zod'
import { normalizeError } from '../errors.js'
import { logger } from '../logging/logger.js'

/**
 * Turns text into a semantic vector.
 *
 * Implementations never throw: a missing vector is reported as an empty array,
 * which callers treat as "no retrieval context".
 */
export interface Embedder {
  embed(text: string, signal?: AbortSignal): Promise<number[]>
}

const DEFAULT_EMBEDDING_MODEL_ID = 'amazon.titan-embed-text-v2:0'

const titanEmbeddingResponseSchema = z.object({
  embedding: z.array(z.number()),
})

/**
 * Options for {@link BedrockEmbedder}.
 */
export interface BedrockEmbedderOptions {
  /**
   * Embedding model, defaults to Titan Text Embeddings V2.
   */
  modelId?: string

  /**
   * Output vector size. Must match the dimensions of the vector indexes.
   */
  dimensions?: number

  region?: string
  clientConfig?: BedrockRuntimeClientConfig
}

/**
 * {@link Embedder} backed by a Bedrock text embedding model.
 */
export class BedrockEmbedder implements Embedder {
  private readonly _client: BedrockRuntimeClient
  private readonly _modelId: string
  private readonly _dimensions: number

  constructor(options?: BedrockEmbedderOptions) {
    this._modelId = options?.modelId ?? DEFAULT_EMBEDDING_MODEL_ID
    this._dimensions = options?.dimensions ?? 1024
    this._client = new BedrockRuntimeClient({
      ...(options?.clientConfig ?? {}),
      ...(options?.region ? { region: options.region } : {}),
    })
  }

  async embed(text: string, signal?: AbortSignal): Promise<number[]> {
    if (text.trim() === '') {
      return []
    }

    try {
      const command = new InvokeModelCommand({
        modelId: this._modelId,
        contentType: 'application/json',
        accept: 'application/json',
        body: JSON.stringify({ inputText: text, dimensions: this._dimensions, normalize: true }),
      })
      const response = await this._client.send(command, signal ? { abortSignal: signal } : {})
      const payload: unknown = JSON.parse(response.body.transformToString())
      const parsed = titanEmbeddingResponseSchema.safeParse(payload)
      if (!parsed.success) {
        logger.warn(`model_id=<${this._modelId}> | embedding response has unexpected shape`)
        return []
      }
      return parsed.data.embedding
    } catch (error) {
      logger.warn(`model_id=<${this._modelId}> | embedding failed | ${normalizeError(error).message}`)
      return []
    }
  }
}
