/**
 * Status Tool Handlers
 */

import type { ToolContext, ToolResponse } from '../types.js';
import { createResultResponse } from '../registry.js';

/**
 * server_health handler
 *
 * Runs a fresh remindctl status check.
 */
export async function handleServerHealth(ctx: ToolContext): Promise<ToolResponse> {
  return createResultResponse(await ctx.orchestrator.serverHealth());
}
