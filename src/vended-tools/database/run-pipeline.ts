import { z } from 'zod'
import { tool, type ZodTool } from '../../tools/zod-tool.js'
import { isFatalError, normalizeError } from '../../errors.js'
import type { DocumentStore, StoredDocument } from '../../store/document-store.js'
import { formatDocuments, isPlainRecord, parseQueryArgument } from './serialize.js'

const runPipelineInputSchema = z.object({
  collection_name: z.string().min(1).describe('Name of the primary collection to run the pipeline on.'),
  pipeline: z
    .unknown()
    .describe(
      'JSON array of aggregation stages, e.g. [{"$match": {"status": "active"}}, {"$lookup": {"from": "users", "localField": "userId", "foreignField": "_id", "as": "user"}}].'
    ),
  limit_results: z
    .number()
    .int()
    .positive()
    .default(100)
    .describe('Cap on result size, applied as a $limit stage when the pipeline has none (default 100).'),
})

/**
 * Appends `{ $limit: limit }` unless some stage already limits the result size.
 * The input array is not modified.
 */
export function withResultLimit(pipeline: StoredDocument[], limit: number): StoredDocument[] {
  const hasLimit = pipeline.some((stage) => stage['$limit'] !== undefined && stage['$limit'] !== null)
  return hasLimit ? pipeline : [...pipeline, { $limit: limit }]
}

/**
 * Creates the `run_pipeline` tool: an aggregation pipeline with a guaranteed result cap.
 */
export function createRunPipelineTool(store: DocumentStore): ZodTool<typeof runPipelineInputSchema> {
  return tool({
    name: 'run_pipeline',
    description:
      'Execute an aggregation pipeline on a collection. Use this for grouping, counting, sorting, and JOINs between two collections via $lookup (from, localField, foreignField, as).',
    inputSchema: runPipelineInputSchema,
    callback: async ({ collection_name, pipeline, limit_results }, context) => {
      let parsed: unknown
      try {
        parsed = parseQueryArgument(pipeline)
      } catch (error) {
        return { text: `Invalid JSON pipeline: ${normalizeError(error).message}`, status: 'error' }
      }

      if (!Array.isArray(parsed)) {
        return { text: 'pipeline must be a JSON array of stages.', status: 'error' }
      }

      const stages: StoredDocument[] = []
      for (const [index, stage] of parsed.entries()) {
        if (!isPlainRecord(stage)) {
          return { text: `pipeline stage ${index} must be an object.`, status: 'error' }
        }
        stages.push(stage)
      }

      try {
        const documents = await store.aggregate(collection_name, withResultLimit(stages, limit_results), {
          signal: context?.signal,
        })
        return formatDocuments(documents)
      } catch (error) {
        if (isFatalError(error) || context?.signal?.aborted) throw error
        return { text: `Error executing aggregation: ${normalizeError(error).message}`, status: 'error' }
      }
    },
  })
}
