/**
 * Environment configuration.
 *
 * Every setting comes from an environment variable and is validated with zod
 * on load. Empty variables count as unset. `.env` files are read by the CLI
 * entry only, never by the library.
 */

import { z } from 'zod'
import { ConfigurationError } from './errors.js'
import type { LogLevel } from './logging/logger.js'

const positiveInt = z.coerce.number().int().positive()

const envSchema = z.object({
  MONGODB_URI: z.string().min(1),
  MONGODB_DATABASE: z.string().min(1).default('sample'),
  MONGODB_MAX_POOL_SIZE: positiveInt.default(10),

  // Bedrock; the SDK's default chain resolves region and credentials when unset
  AWS_REGION: z.string().optional(),
  BEDROCK_MODEL_ID: z.string().optional(),
  BEDROCK_EMBEDDING_MODEL_ID: z.string().default('amazon.titan-embed-text-v2:0'),
  EMBEDDING_DIMENSIONS: positiveInt.default(1024),

  // Vector indexes
  SCHEMA_INDEX_COLLECTION: z.string().default('schema_metadata'),
  SCHEMA_INDEX_NAME: z.string().default('schema_metadata_vector_index'),
  EXAMPLES_INDEX_COLLECTION: z.string().default('query_examples'),
  EXAMPLES_INDEX_NAME: z.string().default('query_examples_vector_index'),

  // Agent
  AGENT_MAX_ROUNDS: positiveInt.default(10),
  RETRIEVAL_TOP_K: positiveInt.default(8),
  EXAMPLES_TOP_K: positiveInt.default(3),
  ENABLE_EXAMPLE_RETRIEVAL: z.stringbool().default(false),
  TRANSCRIPT_WINDOW_SIZE: z.coerce.number().int().min(2).optional(),

  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
})

/**
 * Validated application settings.
 */
export interface AppConfig {
  mongo: {
    uri: string
    databaseName: string
    maxPoolSize: number
  }
  bedrock: {
    region?: string
    modelId?: string
    embeddingModelId: string
    embeddingDimensions: number
  }
  retrieval: {
    schemaIndex: { collection: string; indexName: string }
    examplesIndex: { collection: string; indexName: string }
    topK: number
    exampleTopK: number
    includeExamples: boolean
  }
  agent: {
    maxRounds: number
    transcriptWindowSize?: number
  }
  logLevel: LogLevel
}

/**
 * Reads and validates the configuration.
 *
 * @param env - Variables to read, defaults to `process.env`
 * @throws ConfigurationError listing every missing or invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(withoutEmptyValues(env))
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid configuration:\n${z.prettifyError(parsed.error)}`)
  }
  const vars = parsed.data

  const bedrock: AppConfig['bedrock'] = {
    embeddingModelId: vars.BEDROCK_EMBEDDING_MODEL_ID,
    embeddingDimensions: vars.EMBEDDING_DIMENSIONS,
  }
  if (vars.AWS_REGION !== undefined) bedrock.region = vars.AWS_REGION
  if (vars.BEDROCK_MODEL_ID !== undefined) bedrock.modelId = vars.BEDROCK_MODEL_ID

  const agent: AppConfig['agent'] = { maxRounds: vars.AGENT_MAX_ROUNDS }
  if (vars.TRANSCRIPT_WINDOW_SIZE !== undefined) agent.transcriptWindowSize = vars.TRANSCRIPT_WINDOW_SIZE

  return {
    mongo: {
      uri: vars.MONGODB_URI,
      databaseName: vars.MONGODB_DATABASE,
      maxPoolSize: vars.MONGODB_MAX_POOL_SIZE,
    },
    bedrock,
    retrieval: {
      schemaIndex: { collection: vars.SCHEMA_INDEX_COLLECTION, indexName: vars.SCHEMA_INDEX_NAME },
      examplesIndex: { collection: vars.EXAMPLES_INDEX_COLLECTION, indexName: vars.EXAMPLES_INDEX_NAME },
      topK: vars.RETRIEVAL_TOP_K,
      exampleTopK: vars.EXAMPLES_TOP_K,
      includeExamples: vars.ENABLE_EXAMPLE_RETRIEVAL,
    },
    agent,
    logLevel: vars.LOG_LEVEL,
  }
}

function withoutEmptyValues(env: NodeJS.ProcessEnv): Record<string, string> {
  const result: Record<string, string> = {}
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      result[key] = value
    }
  }
  return result
}
