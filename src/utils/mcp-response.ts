/**
 * MCP Tool Response Utilities
 *
 * Every tool answers with a single JSON text block. Failures carry
 * `isError: true` and the structured error, never a bare string.
 */

import { ErrorCode, McpError } from '@modelcontextprotocol/sdk/types.js';
import { ErrorKind, type OperationError, type OperationResult } from '../types/errors.js';

/**
 * Formats data as JSON with consistent indentation
 */
function formatJson(data: unknown): string {
  return JSON.stringify(data, null, 2);
}

export interface ToolResponse {
  [key: string]: unknown;
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
}

/**
 * Creates a standardized MCP tool response
 *
 * @example
 * return createResponse({ lists: [] });
 */
export function createResponse(data: unknown): ToolResponse {
  return {
    content: [
      {
        type: 'text' as const,
        text: formatJson(data),
      },
    ],
  };
}

/**
 * Body of an error response
 */
export function errorBody(error: OperationError): Record<string, unknown> {
  return {
    error: true,
    kind: error.kind,
    message: error.message,
    ...(error.reference !== undefined && { reference: error.reference }),
    ...(error.candidates !== undefined && { candidates: error.candidates }),
    ...(error.field !== undefined && { field: error.field }),
    ...(error.upstream !== undefined && { upstream: error.upstream }),
    ...(error.exitCode !== undefined && { exitCode: error.exitCode }),
  };
}

/**
 * Creates an error response for MCP tools
 */
export function createErrorResponse(error: OperationError): ToolResponse {
  return { ...createResponse(errorBody(error)), isError: true };
}

/**
 * Turns an operation result into a tool response
 */
export function createResultResponse<T>(result: OperationResult<T>): ToolResponse {
  return result.ok ? createResponse(result.data) : createErrorResponse(result.error);
}

/**
 * Converts an operation error into a protocol error, for resource reads
 *
 * Reference problems are the caller's to fix; upstream failures are internal.
 */
export function toMcpError(error: OperationError): McpError {
  const code =
    error.kind === ErrorKind.UPSTREAM ? ErrorCode.InternalError : ErrorCode.InvalidParams;
  return new McpError(code, error.message, errorBody(error));
}

/**
 * Extracts error message from unknown error type
 *
 * @example
 * catch (error) {
 *   logger.error({ err: getErrorMessage(error) }, 'Startup failed');
 * }
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  return 'Unknown error';
}
