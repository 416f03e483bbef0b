import { z } from 'zod'
import { ToolResult, type ToolResultStatus } from '../types/messages.js'
import { isJSONObject, toJSONValue, type JSONSchema } from '../types/json.js'
import type { Tool, ToolContext } from './tool.js'
import type { ToolSpec } from './types.js'

/**
 * What a tool callback may return: plain text (success) or text with an explicit status.
 */
export type ToolOutput = string | { text: string; status: ToolResultStatus }

/**
 * Configuration for {@link tool}.
 */
export interface ZodToolConfig<TInput extends z.ZodType> {
  /**
   * The name of the tool.
   */
  name: string

  /**
   * A description of what the tool does, shown to the model.
   */
  description: string

  /**
   * Zod schema for the tool's arguments. Converted to JSON Schema for the model
   * and used to validate every request.
   */
  inputSchema: TInput

  /**
   * Runs the tool with validated input.
   */
  callback: (input: z.output<TInput>, context?: ToolContext) => ToolOutput | Promise<ToolOutput>
}

/**
 * A tool whose input contract is a zod schema.
 */
export class ZodTool<TInput extends z.ZodType> implements Tool {
  readonly name: string
  readonly description: string
  readonly toolSpec: ToolSpec

  private readonly _inputSchema: TInput
  private readonly _callback: ZodToolConfig<TInput>['callback']

  constructor(config: ZodToolConfig<TInput>) {
    this.name = config.name
    this.description = config.description
    this._inputSchema = config.inputSchema
    this._callback = config.callback
    this.toolSpec = {
      name: config.name,
      description: config.description,
      inputSchema: toInputJSONSchema(config.inputSchema),
    }
  }

  /**
   * Calls the tool directly with typed input, bypassing the transcript.
   * Throws a ZodError when the input does not match the schema.
   *
   * @param input - Tool arguments
   * @param context - Optional execution context
   * @returns The result text
   */
  async invoke(input: z.input<TInput>, context?: ToolContext): Promise<string> {
    const parsed = this._inputSchema.parse(input)
    const output = await this._callback(parsed, context)
    return typeof output === 'string' ? output : output.text
  }

  async execute(context: ToolContext): Promise<ToolResult> {
    const { toolRequest } = context
    const parsed = this._inputSchema.safeParse(toolRequest.arguments)

    if (!parsed.success) {
      return new ToolResult({
        requestId: toolRequest.id,
        toolName: this.name,
        text: `Invalid input for tool '${this.name}': ${z.prettifyError(parsed.error)}`,
        status: 'error',
      })
    }

    const output = await this._callback(parsed.data, context)
    return new ToolResult({
      requestId: toolRequest.id,
      toolName: this.name,
      text: typeof output === 'string' ? output : output.text,
      status: typeof output === 'string' ? 'success' : output.status,
    })
  }
}

/**
 * Creates a tool from a zod schema and a callback.
 *
 * @example
 * ```typescript
 * const countTool = tool({
 *   name: 'count_documents',
 *   description: 'Count documents in a collection.',
 *   inputSchema: z.object({ collection_name: z.string() }),
 *   callback: async ({ collection_name }) => `${await store.count(collection_name)}`,
 * })
 * ```
 */
export function tool<TInput extends z.ZodType>(config: ZodToolConfig<TInput>): ZodTool<TInput> {
  return new ZodTool(config)
}

function toInputJSONSchema(schema: z.ZodType): JSONSchema {
  // Input mode keeps defaulted parameters optional for the model.
  const converted = toJSONValue(z.toJSONSchema(schema, { io: 'input' }))
  if (!isJSONObject(converted)) {
    throw new Error('Tool input schema must describe an object')
  }
  const { $schema: _dialect, ...rest } = converted
  return rest
}
