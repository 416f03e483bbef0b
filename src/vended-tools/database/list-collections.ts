import { z } from 'zod'
import { tool, type ZodTool } from '../../tools/zod-tool.js'
import { isFatalError, normalizeError } from '../../errors.js'
import type { DocumentStore } from '../../store/document-store.js'

const listCollectionsInputSchema = z.object({})

/**
 * Creates the `list_collections` tool.
 *
 * Output: `Collections in database '<db>': a, b, c`, or `None` when the database is empty.
 */
export function createListCollectionsTool(store: DocumentStore): ZodTool<typeof listCollectionsInputSchema> {
  return tool({
    name: 'list_collections',
    description:
      'List all collection names in the database. Call this first to know which collections exist before querying or building aggregations.',
    inputSchema: listCollectionsInputSchema,
    callback: async (_input, context) => {
      try {
        const names = await store.listCollections({ signal: context?.signal })
        return `Collections in database '${store.databaseName}': ${names.join(', ') || 'None'}`
      } catch (error) {
        if (isFatalError(error) || context?.signal?.aborted) throw error
        return { text: `Error listing collections: ${normalizeError(error).message}`, status: 'error' }
      }
    },
  })
}
