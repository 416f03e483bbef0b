import type { JSONSchema } from '../types/json.js'

/**
 * Specification of a tool as advertised to the model.
 */
export interface ToolSpec {
  /**
   * Unique tool name. The model refers to the tool by this name.
   */
  name: string

  /**
   * Natural-language description the model uses to decide when to call the tool.
   */
  description: string

  /**
   * JSON Schema for the tool's arguments.
   */
  inputSchema: JSONSchema
}

