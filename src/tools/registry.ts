/**
 * Tool Registry
 *
 * Helper functions for tool response creation.
 * Re-exports from mcp-response.ts for convenience.
 */

export {
  createResponse as createToolResponse,
  createErrorResponse,
  createResultResponse,
  getErrorMessage,
} from '../utils/mcp-response.js';
