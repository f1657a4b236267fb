/**
 * MCP Server Type Definitions
 *
 * Defines interfaces for tool results and server configuration.
 *
 * @module server/types
 */

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL RESULT TYPES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Successful tool result
 */
interface ToolResultSuccess<T = unknown> {
  success: true;
  data: T;
}

/**
 * Helper to create success result
 */
export function successResult<T>(data: T): ToolResultSuccess<T> {
  return { success: true, data };
}

// ═══════════════════════════════════════════════════════════════════════════════
// SERVER CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Server configuration, built once at startup and passed to every tool
 * factory. Never mutated.
 */
export interface ServerConfig {
  /** Absolute path of the workbook file (SQLite) */
  readonly workbookPath: string;

  /** Where the workbook path came from, for diagnostics */
  readonly workbookPathSource: 'env' | 'default';
}
