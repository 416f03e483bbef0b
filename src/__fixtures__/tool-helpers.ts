/**
 * Test fixtures and helpers for Tool testing.
 * This module provides utilities for testing Tool implementations.
 */

import type { Tool, ToolContext } from '../tools/tool.js'
import { ToolRequest, ToolResult } from '../types/messages.js'
import type { JSONValue } from '../types/json.js'

/**
 * Helper to create a ToolContext for testing.
 *
 * @param toolName - The requested tool
 * @param args - Arguments as the model would send them
 * @param id - Request identifier
 */
export function createMockContext(
  toolName: string,
  args: { [key: string]: JSONValue } = {},
  id = 'test-request'
): ToolContext {
  return { toolRequest: new ToolRequest({ id, toolName, arguments: args }) }
}

/**
 * Helper to create a mock tool for testing.
 *
 * @param name - The name of the mock tool
 * @param run - Produces the result text, or throws
 * @returns Mock Tool object
 */
export function createMockTool(
  name: string,
  run: (context: ToolContext) => string | Promise<string>
): Tool {
  return {
    name,
    description: `Mock tool ${name}`,
    toolSpec: {
      name,
      description: `Mock tool ${name}`,
      inputSchema: { type: 'object', properties: {} },
    },
    async execute(context): Promise<ToolResult> {
      const text = await run(context)
      return new ToolResult({ requestId: context.toolRequest.id, toolName: name, text })
    },
  }
}

/**
 * Helper to create a simple mock tool with minimal configuration for testing.
 * This is a lighter-weight version of createMockTool for scenarios where the tool's
 * execution behavior is not relevant to the test.
 *
 * @param name - Optional name of the mock tool (defaults to a random UUID)
 * @returns Mock Tool object
 */
export function createRandomTool(name?: string): Tool {
  const toolName = name ?? globalThis.crypto.randomUUID()
  return createMockTool(toolName, () => 'ok')
}
