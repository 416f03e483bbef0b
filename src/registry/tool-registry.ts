import { ToolRegistryError, isFatalError, normalizeError } from '../errors.js'
import { logger } from '../logging/logger.js'
import { ToolResult, type ToolRequest } from '../types/messages.js'
import type { Tool } from '../tools/tool.js'
import type { ToolSpec } from '../tools/types.js'

/**
 * Holds the tools an agent may call and dispatches tool requests to them.
 *
 * Dispatch never throws for recoverable problems: an unknown tool name, invalid
 * arguments or an error thrown by the tool all come back as an error
 * {@link ToolResult} so the model can read it and try again. Fatal errors and
 * cancellation propagate.
 */
export class ToolRegistry {
  private readonly _tools = new Map<string, Tool>()

  constructor(tools: Tool[] = []) {
    for (const tool of tools) {
      this.register(tool)
    }
  }

  /**
   * Adds a tool.
   *
   * @throws ToolRegistryError when a tool with the same name is already registered
   */
  register(tool: Tool): void {
    if (this._tools.has(tool.name)) {
      throw new ToolRegistryError(`Tool with name '${tool.name}' already registered`)
    }
    this._tools.set(tool.name, tool)
  }

  /**
   * Looks up a tool by name.
   */
  get(name: string): Tool | undefined {
    return this._tools.get(name)
  }

  /**
   * All registered tools, in registration order.
   */
  values(): Tool[] {
    return [...this._tools.values()]
  }

  /**
   * Specifications of all registered tools, for the model.
   */
  toolSpecs(): ToolSpec[] {
    return this.values().map((tool) => tool.toolSpec)
  }

  /**
   * Executes one tool request.
   *
   * @param request - The request from the model
   * @param signal - Cancellation signal of the surrounding request
   * @returns The tool result; `status` is `error` for recoverable failures
   */
  async dispatch(request: ToolRequest, signal?: AbortSignal): Promise<ToolResult> {
    const tool = this._tools.get(request.toolName)

    if (!tool) {
      logger.debug(`tool_name=<${request.toolName}> | tool not found in registry`)
      return new ToolResult({
        requestId: request.id,
        toolName: request.toolName,
        text: `Tool '${request.toolName}' not found in registry`,
        status: 'error',
      })
    }

    try {
      const result = await tool.execute(signal ? { toolRequest: request, signal } : { toolRequest: request })
      if (result.status === 'error') {
        logger.debug(`tool_name=<${request.toolName}> | tool reported an error | ${result.text}`)
      }
      return result
    } catch (error) {
      if (isFatalError(error) || signal?.aborted) {
        throw error
      }
      const toolError = normalizeError(error)
      logger.debug(`tool_name=<${request.toolName}> | tool threw | ${toolError.message}`)
      return new ToolResult({
        requestId: request.id,
        toolName: request.toolName,
        text: `Error running tool '${request.toolName}': ${toolError.message}`,
        status: 'error',
      })
    }
  }
}
