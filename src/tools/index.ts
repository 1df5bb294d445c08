/**
 * Tools Module
 *
 * Exports all tool-related types, utilities, and tool handlers.
 *
 * ## Usage
 *
 * ```typescript
 * import { createResultResponse } from './tools/index.js';
 *
 * // In a tool handler:
 * return createResultResponse(await ctx.orchestrator.listsList());
 * ```
 */

// Types
export type { ToolResponse, ToolContext } from './types.js';

// Response utilities (re-exported from mcp-response)
export {
  createToolResponse,
  createErrorResponse,
  createResultResponse,
  getErrorMessage,
} from './registry.js';

export * from './status/index.js';
export * from './reminders/index.js';
export * from './lists/index.js';
export * from './queue/index.js';
