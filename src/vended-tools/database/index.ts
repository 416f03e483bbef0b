/**
 * Read-only database tools for the query agent.
 */

import type { DocumentStore } from '../../store/document-store.js'
import type { Tool } from '../../tools/tool.js'
import { createDescribeSchemaTool } from './describe-schema.js'
import { createListCollectionsTool } from './list-collections.js'
import { createReadFilteredTool } from './read-filtered.js'
import { createRunPipelineTool } from './run-pipeline.js'

export { createDescribeSchemaTool } from './describe-schema.js'
export { createListCollectionsTool } from './list-collections.js'
export { createReadFilteredTool } from './read-filtered.js'
export { createRunPipelineTool, withResultLimit } from './run-pipeline.js'
export { describeValueType } from './schema-labels.js'
export { formatDocuments, stringifyIdentifiers } from './serialize.js'

/**
 * The four database tools bound to one store, in the order they are advertised to the model.
 */
export function createDatabaseTools(store: DocumentStore): Tool[] {
  return [
    createListCollectionsTool(store),
    createDescribeSchemaTool(store),
    createReadFilteredTool(store),
    createRunPipelineTool(store),
  ]
}
