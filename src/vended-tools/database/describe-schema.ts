import { z } from 'zod'
import { tool, type ZodTool } from '../../tools/zod-tool.js'
import { isFatalError, normalizeError } from '../../errors.js'
import type { DocumentStore } from '../../store/document-store.js'
import { describeValueType } from './schema-labels.js'

const describeSchemaInputSchema = z.object({
  collection_name: z.string().min(1).describe("Exact name of the collection (e.g. 'users', 'orders')."),
  sample_size: z
    .number()
    .int()
    .positive()
    .max(20)
    .default(3)
    .describe('Number of documents to sample for schema inference (default 3).'),
})

/**
 * Creates the `describe_schema` tool, which infers field types from sampled documents.
 */
export function createDescribeSchemaTool(store: DocumentStore): ZodTool<typeof describeSchemaInputSchema> {
  return tool({
    name: 'describe_schema',
    description:
      'Get the schema of a collection by sampling documents. Use this to understand field names and types before writing find queries or aggregation pipelines. For joins, get the schema of both collections to see which fields can be used for $lookup.',
    inputSchema: describeSchemaInputSchema,
    callback: async ({ collection_name, sample_size }, context) => {
      try {
        const documents = await store.find(collection_name, {}, { limit: sample_size, signal: context?.signal })
        if (documents.length === 0) {
          return `Collection '${collection_name}' is empty or does not exist.`
        }

        const lines = [`Collection: ${collection_name}`, `Sample size: ${documents.length}`, '']
        documents.forEach((document, index) => {
          lines.push(`--- Document ${index + 1} ---`)
          for (const [field, value] of Object.entries(document)) {
            lines.push(`  ${field}: ${describeValueType(value)}`)
          }
          lines.push('')
        })
        return lines.join('\n')
      } catch (error) {
        if (isFatalError(error) || context?.signal?.aborted) throw error
        return {
          text: `Error getting schema for '${collection_name}': ${normalizeError(error).message}`,
          status: 'error',
        }
      }
    },
  })
}
