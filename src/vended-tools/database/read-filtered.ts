import { z } from 'zod'
import { tool, type ZodTool } from '../../tools/zod-tool.js'
import { isFatalError, normalizeError } from '../../errors.js'
import type { DocumentStore, StoredDocument } from '../../store/document-store.js'
import { formatDocuments, isPlainRecord, parseQueryArgument } from './serialize.js'

const queryObject = z.union([z.string(), z.record(z.string(), z.unknown())])

const readFilteredInputSchema = z.object({
  collection_name: z.string().min(1).describe('Name of the collection.'),
  filter: queryObject
    .default({})
    .describe('Query filter as a JSON object, e.g. {"status": "active"}, or {} for all documents.'),
  projection: queryObject
    .optional()
    .describe('Optional field selection, e.g. {"name": 1, "email": 1, "_id": 0}.'),
  limit: z.number().int().positive().default(50).describe('Maximum number of documents to return (default 50).'),
})

/**
 * Creates the `read_filtered` tool: a find query with optional projection and a limit.
 */
export function createReadFilteredTool(store: DocumentStore): ZodTool<typeof readFilteredInputSchema> {
  return tool({
    name: 'read_filtered',
    description:
      'Execute a find query on a single collection with a filter and an optional projection. Use this to list or filter documents from one collection.',
    inputSchema: readFilteredInputSchema,
    callback: async ({ collection_name, filter, projection, limit }, context) => {
      let parsedFilter: StoredDocument
      let parsedProjection: StoredDocument | undefined
      try {
        parsedFilter = toQueryDocument(parseQueryArgument(filter), 'filter') ?? {}
        parsedProjection = toQueryDocument(parseQueryArgument(projection), 'projection')
      } catch (error) {
        return { text: `Invalid JSON in filter or projection: ${normalizeError(error).message}`, status: 'error' }
      }

      try {
        const documents = await store.find(
          collection_name,
          parsedFilter,
          parsedProjection && Object.keys(parsedProjection).length > 0
            ? { projection: parsedProjection, limit, signal: context?.signal }
            : { limit, signal: context?.signal }
        )
        return formatDocuments(documents)
      } catch (error) {
        if (isFatalError(error) || context?.signal?.aborted) throw error
        return { text: `Error executing find: ${normalizeError(error).message}`, status: 'error' }
      }
    },
  })
}

function toQueryDocument(value: unknown, argumentName: string): StoredDocument | undefined {
  if (value === undefined) {
    return undefined
  }
  if (!isPlainRecord(value)) {
    throw new TypeError(`${argumentName} must be a JSON object`)
  }
  return value
}
