/**
 * Shared Tool Registration
 *
 * Builds every tool module for a server configuration and registers the
 * tools on an McpServer instance.
 *
 * CRITICAL: NEVER use console.log() - stdout may be reserved for JSON-RPC protocol.
 *
 * @module server/register-tools
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { ToolDefinition, ToolModuleFactory } from '../tools/shared.js';
import type { ServerConfig } from './types.js';

import { createComparisonTools } from '../tools/comparison.js';
import { createAccuracyTools } from '../tools/accuracy.js';
import { createResultTools } from '../tools/results.js';
import { createWorkbookTools } from '../tools/workbook.js';

/** All tool module factories in registration order */
const allToolModuleFactories: ToolModuleFactory[] = [
  createComparisonTools,
  createAccuracyTools,
  createResultTools,
  createWorkbookTools,
];

/**
 * Build every tool for a configuration, keyed by tool name.
 *
 * @throws Error if two modules define the same tool name
 */
export function buildAllTools(config: ServerConfig): Map<string, ToolDefinition> {
  const tools = new Map<string, ToolDefinition>();

  for (const factory of allToolModuleFactories) {
    for (const [name, tool] of Object.entries(factory(config))) {
      if (tools.has(name)) {
        throw new Error(`Duplicate tool name detected: "${name}". Each tool must have a unique name.`);
      }
      tools.set(name, tool);
    }
  }

  return tools;
}

/**
 * Register all tools on the given MCP server instance.
 *
 * @returns Number of tools registered
 */
export function registerAllTools(server: McpServer, config: ServerConfig): number {
  const tools = buildAllTools(config);
  for (const [name, tool] of tools) {
    server.tool(name, tool.description, tool.inputSchema, tool.handler);
  }
  return tools.size;
}
