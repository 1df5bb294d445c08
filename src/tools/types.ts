/**
 * Tool Types
 *
 * Common type definitions for MCP tool handlers.
 */

import type { MutationOrchestrator } from '../core/mutation-orchestrator.js';
import type { SessionContext } from '../core/session-context.js';
import type { PendingActionQueue } from '../queue/pending-action-queue.js';

export type { ToolResponse } from '../utils/mcp-response.js';

/**
 * Everything a tool handler needs
 *
 * One context per MCP session; the orchestrator and queue are shared.
 */
export interface ToolContext {
  orchestrator: MutationOrchestrator;
  session: SessionContext;
  queue: PendingActionQueue | null;
}
