import { QueryAgent } from './agent/agent.js'
import type { AppConfig } from './config.js'
import { SlidingWindowConversationManager } from './conversation-manager/sliding-window-conversation-manager.js'
import { NullConversationManager } from './conversation-manager/null-conversation-manager.js'
import { configureLogging } from './logging/logger.js'
import { BedrockModel } from './models/bedrock.js'
import { QueryService } from './query-service.js'
import { BedrockEmbedder } from './retrieval/embeddings.js'
import { SchemaRetriever } from './retrieval/retriever.js'
import { MongoVectorSearch } from './retrieval/vector-search.js'
import { MongoDocumentStore, connectMongo } from './store/mongo-document-store.js'
import { createDatabaseTools } from './vended-tools/database/index.js'

/**
 * A wired query service plus the resources it holds.
 */
export interface QueryServiceHandle {
  service: QueryService
  agent: QueryAgent

  /**
   * Closes the database connection pool.
   */
  close(): Promise<void>
}

/**
 * Connects to MongoDB and builds the service from configuration.
 *
 * @throws StoreConnectionError when the database cannot be reached
 */
export async function createQueryService(config: AppConfig): Promise<QueryServiceHandle> {
  configureLogging({ level: config.logLevel })

  const { client, db } = await connectMongo(config.mongo)

  const model = new BedrockModel({
    ...(config.bedrock.region ? { region: config.bedrock.region } : {}),
    ...(config.bedrock.modelId ? { modelId: config.bedrock.modelId } : {}),
  })

  const retriever = new SchemaRetriever({
    embedder: new BedrockEmbedder({
      modelId: config.bedrock.embeddingModelId,
      dimensions: config.bedrock.embeddingDimensions,
      ...(config.bedrock.region ? { region: config.bedrock.region } : {}),
    }),
    search: new MongoVectorSearch(db),
    schemaIndex: config.retrieval.schemaIndex,
    examplesIndex: config.retrieval.examplesIndex,
  })

  const windowSize = config.agent.transcriptWindowSize
  const agent = new QueryAgent({
    model,
    tools: createDatabaseTools(new MongoDocumentStore(db)),
    retriever,
    maxRounds: config.agent.maxRounds,
    retrievalTopK: config.retrieval.topK,
    exampleTopK: config.retrieval.exampleTopK,
    includeExamples: config.retrieval.includeExamples,
    conversationManager:
      windowSize !== undefined ? new SlidingWindowConversationManager({ windowSize }) : new NullConversationManager(),
  })

  return {
    service: new QueryService(agent),
    agent,
    close: () => client.close(),
  }
}
