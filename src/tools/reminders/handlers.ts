/**
 * Reminder Tool Handlers
 *
 * Business logic for reminder MCP tools. These handlers are decoupled from
 * server registration so the stdio and HTTP transports share them.
 */

import type {
  ReminderAddInput,
  ReminderCompleteInput,
  ReminderDeleteInput,
  ReminderEditInput,
  RemindersListInput,
} from '../../core/operation-schemas.js';
import type { ToolContext, ToolResponse } from '../types.js';
import { createResultResponse } from '../registry.js';

/**
 * reminders_list handler
 *
 * Defaults to pending reminders only.
 */
export async function handleRemindersList(
  ctx: ToolContext,
  args: RemindersListInput
): Promise<ToolResponse> {
  return createResultResponse(await ctx.orchestrator.remindersList(args));
}

/**
 * reminder_add handler
 */
export async function handleReminderAdd(
  ctx: ToolContext,
  args: ReminderAddInput
): Promise<ToolResponse> {
  return createResultResponse(await ctx.orchestrator.submit(ctx.session, 'reminder_add', args));
}

/**
 * reminder_edit handler
 */
export async function handleReminderEdit(
  ctx: ToolContext,
  args: ReminderEditInput
): Promise<ToolResponse> {
  return createResultResponse(await ctx.orchestrator.submit(ctx.session, 'reminder_edit', args));
}

/**
 * reminder_complete handler
 *
 * Every reference must resolve to exactly one reminder before anything is completed.
 */
export async function handleReminderComplete(
  ctx: ToolContext,
  args: ReminderCompleteInput
): Promise<ToolResponse> {
  return createResultResponse(
    await ctx.orchestrator.submit(ctx.session, 'reminder_complete', args)
  );
}

/**
 * reminder_delete handler
 *
 * Without a reference, deletes the last reminder touched in this session.
 */
export async function handleReminderDelete(
  ctx: ToolContext,
  args: ReminderDeleteInput
): Promise<ToolResponse> {
  return createResultResponse(await ctx.orchestrator.submit(ctx.session, 'reminder_delete', args));
}
