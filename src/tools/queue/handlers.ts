/**
 * Pending Action Tool Handlers
 *
 * Batch processing of caller-supplied actions, plus inspection and replay
 * of this workspace's own queue.
 */

import type { ProcessPendingActionsInput } from '../../core/operation-schemas.js';
import { invalidInput, notFound } from '../../types/errors.js';
import type { ToolContext, ToolResponse } from '../types.js';
import { createErrorResponse, createResultResponse, createToolResponse } from '../registry.js';

const QUEUE_DISABLED = invalidInput('the pending action queue is disabled');

/**
 * process_pending_actions handler
 *
 * Applies each action in order and reports applied, failed or skipped per action.
 */
export async function handleProcessPendingActions(
  ctx: ToolContext,
  args: ProcessPendingActionsInput
): Promise<ToolResponse> {
  const summary = await ctx.orchestrator.processPendingActions(ctx.session, args.actions, {
    stopOnError: args.stopOnError,
  });
  return createToolResponse(summary);
}

/**
 * pending_actions_list handler
 */
export async function handlePendingActionsList(ctx: ToolContext): Promise<ToolResponse> {
  if (!ctx.queue) {
    return createErrorResponse(QUEUE_DISABLED);
  }
  const actions = await ctx.queue.list();
  return createToolResponse({ workspace: ctx.queue.workspace, count: actions.length, actions });
}

/**
 * pending_actions_replay handler
 */
export async function handlePendingActionsReplay(
  ctx: ToolContext,
  args: { stopOnError?: boolean }
): Promise<ToolResponse> {
  return createResultResponse(
    await ctx.orchestrator.replayQueue(ctx.session, { stopOnError: args.stopOnError })
  );
}

/**
 * pending_action_remove handler
 */
export async function handlePendingActionRemove(
  ctx: ToolContext,
  args: { id: string }
): Promise<ToolResponse> {
  if (!ctx.queue) {
    return createErrorResponse(QUEUE_DISABLED);
  }
  const removed = await ctx.queue.remove(args.id);
  if (!removed) {
    return createErrorResponse(notFound(args.id, `pending action '${args.id}' not found`));
  }
  return createToolResponse({ removed: true, id: args.id });
}
