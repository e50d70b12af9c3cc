/**
 * Shared Tool Registration
 *
 * Registers all MCP tools on a given McpServer instance.
 *
 * CRITICAL: NEVER use console.log() - stdout may be reserved for JSON-RPC protocol.
 *
 * @module server/register-tools
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { ToolDefinition } from '../tools/shared.js';

import { accuracyTools } from '../tools/accuracy.js';
import { comparisonTools } from '../tools/comparison.js';
import { configTools } from '../tools/config.js';

/** All tool modules in registration order */
const allToolModules: Record<string, ToolDefinition>[] = [
  accuracyTools,
  comparisonTools,
  configTools,
];

/**
 * Names of every tool, in registration order
 *
 * @throws Error if two modules define the same tool name
 */
export function getToolNames(): string[] {
  const names: string[] = [];
  const seen = new Set<string>();
  for (const toolModule of allToolModules) {
    for (const name of Object.keys(toolModule)) {
      if (seen.has(name)) {
        throw new Error(
          `Duplicate tool name detected: "${name}". Each tool must have a unique name.`
        );
      }
      seen.add(name);
      names.push(name);
    }
  }
  return names;
}

/**
 * Register all tools on the given MCP server instance.
 *
 * @param server - McpServer instance to register tools on
 * @returns Number of tools registered
 * @throws Error if duplicate tool names are detected
 */
export function registerAllTools(server: McpServer): number {
  // Validates uniqueness before anything is registered
  const toolCount = getToolNames().length;

  for (const toolModule of allToolModules) {
    for (const [name, tool] of Object.entries(toolModule)) {
      server.tool(name, tool.description, tool.inputSchema, tool.handler);
    }
  }

  return toolCount;
}
