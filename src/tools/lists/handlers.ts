/**
 * List Tool Handlers
 */

import type {
  ListCreateInput,
  ListDeleteInput,
  ListRenameInput,
} from '../../core/operation-schemas.js';
import type { ToolContext, ToolResponse } from '../types.js';
import { createResultResponse } from '../registry.js';

/**
 * lists_list handler
 */
export async function handleListsList(ctx: ToolContext): Promise<ToolResponse> {
  return createResultResponse(await ctx.orchestrator.listsList());
}

/**
 * list_create handler
 *
 * Name collisions are reported by remindctl and passed through unchanged.
 */
export async function handleListCreate(
  ctx: ToolContext,
  args: ListCreateInput
): Promise<ToolResponse> {
  return createResultResponse(await ctx.orchestrator.submit(ctx.session, 'list_create', args));
}

/**
 * list_rename handler
 */
export async function handleListRename(
  ctx: ToolContext,
  args: ListRenameInput
): Promise<ToolResponse> {
  return createResultResponse(await ctx.orchestrator.submit(ctx.session, 'list_rename', args));
}

/**
 * list_delete handler
 */
export async function handleListDelete(
  ctx: ToolContext,
  args: ListDeleteInput
): Promise<ToolResponse> {
  return createResultResponse(await ctx.orchestrator.submit(ctx.session, 'list_delete', args));
}
