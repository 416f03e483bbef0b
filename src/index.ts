/**
 * Main entry point for the natural-language MongoDB query agent.
 *
 * Exports the agent loop, the database tools, retrieval augmentation and the
 * query service that ties them together.
 */

// Agent
export { QueryAgent, DEFAULT_MAX_ROUNDS } from './agent/agent.js'
export type { QueryAgentConfig, ToolList, InvokeOptions, AgentLoopState } from './agent/agent.js'
export type { AgentResult, AgentOutcome } from './types/agent.js'
export { BASE_SYSTEM_PROMPT, composeSystemPrompt } from './agent/prompts.js'
export { extractAnswer, toolTrace, NO_RESPONSE_TEXT } from './agent/transcript.js'
export type { ToolTraceEntry } from './agent/transcript.js'

// Query service
export { QueryService, EMPTY_QUESTION_TEXT } from './query-service.js'
export type { QueryResponse, QueryStatus, AskOptions } from './query-service.js'
export { createQueryService } from './create-query-service.js'
export type { QueryServiceHandle } from './create-query-service.js'
export { formatResponse, formatTrace } from './format-response.js'

// Configuration and logging
export { loadConfig } from './config.js'
export type { AppConfig } from './config.js'
export { configureLogging, logger } from './logging/logger.js'
export type { Logger, LogLevel } from './logging/logger.js'
export { createPinoLogger } from './logging/pino-logger.js'

// Error types
export {
  ContextWindowOverflowError,
  MaxTokensError,
  ConfigurationError,
  ToolRegistryError,
  StoreConnectionError,
  isFatalError,
  normalizeError,
} from './errors.js'

// JSON types
export type { JSONSchema, JSONValue } from './types/json.js'

// Transcript types
export type {
  Role,
  StopReason,
  ToolResultStatus,
  UserMessageData,
  ToolRequestData,
  ModelMessageData,
  ToolResultData,
  TranscriptEntry,
  Transcript,
  SystemPrompt,
} from './types/messages.js'
export { UserMessage, ToolRequest, ModelMessage, ToolResult } from './types/messages.js'

// Tools
export type { ToolSpec } from './tools/types.js'
export type { Tool, ToolContext } from './tools/tool.js'
export { ZodTool, tool } from './tools/zod-tool.js'
export type { ZodToolConfig, ToolOutput } from './tools/zod-tool.js'
export { ToolRegistry } from './registry/tool-registry.js'
export {
  createDatabaseTools,
  createListCollectionsTool,
  createDescribeSchemaTool,
  createReadFilteredTool,
  createRunPipelineTool,
  withResultLimit,
} from './vended-tools/database/index.js'

// Document store
export type { DocumentStore, FindOptions, StoredDocument } from './store/document-store.js'
export { MongoDocumentStore, connectMongo } from './store/mongo-document-store.js'
export type { MongoConnection, MongoConnectionOptions } from './store/mongo-document-store.js'

// Retrieval
export { SchemaRetriever, SCHEMA_CONTEXT_HEADER, EXAMPLES_CONTEXT_HEADER } from './retrieval/retriever.js'
export type {
  ContextAugmenter,
  ContextOptions,
  RetrievedContextItem,
  SchemaRetrieverConfig,
  SearchIndex,
} from './retrieval/retriever.js'
export { BedrockEmbedder } from './retrieval/embeddings.js'
export type { Embedder, BedrockEmbedderOptions } from './retrieval/embeddings.js'
export { MongoVectorSearch, buildVectorSearchPipeline, candidateCount } from './retrieval/vector-search.js'
export type { VectorSearchBackend, VectorSearchHit, VectorSearchQuery } from './retrieval/vector-search.js'

// Streaming event types
export type {
  Usage,
  Metrics,
  ModelMessageStartEvent,
  ToolUseStart,
  TextDelta,
  ToolUseInputDelta,
  ContentBlockDelta,
  ModelContentBlockStartEvent,
  ModelContentBlockDeltaEvent,
  ModelContentBlockStopEvent,
  ModelMessageStopEvent,
  ModelMetadataEvent,
  ModelStreamEvent,
} from './models/streaming.js'

// Model provider types
export type { BaseModelConfig, StreamOptions, Model } from './models/model.js'

// Bedrock model provider
export { BedrockModel } from './models/bedrock.js'
export type { BedrockModelConfig, BedrockModelOptions } from './models/bedrock.js'

// Agent streaming event types
export type {
  AgentStreamEvent,
  BeforeModelEvent,
  AfterModelEvent,
  BeforeToolsEvent,
  ToolResultEvent,
  AfterToolsEvent,
  BeforeInvocationEvent,
  AfterInvocationEvent,
} from './agent/streaming.js'

// Conversation Manager
export type { ConversationManager } from './conversation-manager/conversation-manager.js'
export { NullConversationManager } from './conversation-manager/null-conversation-manager.js'
export {
  SlidingWindowConversationManager,
  type SlidingWindowConversationManagerConfig,
} from './conversation-manager/sliding-window-conversation-manager.js'
