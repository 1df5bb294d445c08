/**
 * MCP server factory
 *
 * Builds one McpServer with every tool and resource registered. Each stdio
 * process or HTTP session gets its own server bound to its own session context;
 * the orchestrator and queue are shared.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { PublicConfig } from './config/loader.js';
import type { MutationOrchestrator } from './core/mutation-orchestrator.js';
import {
  listCreateShape,
  listDeleteShape,
  listRenameShape,
  pendingActionRemoveShape,
  pendingActionsReplayShape,
  processPendingActionsShape,
  reminderAddShape,
  reminderCompleteShape,
  reminderDeleteShape,
  reminderEditShape,
  remindersListShape,
} from './core/operation-schemas.js';
import type { SessionContext } from './core/session-context.js';
import type { PendingActionQueue } from './queue/pending-action-queue.js';
import { registerResources } from './resources/index.js';
import {
  handleListCreate,
  handleListDelete,
  handleListRename,
  handleListsList,
  handlePendingActionRemove,
  handlePendingActionsList,
  handlePendingActionsReplay,
  handleProcessPendingActions,
  handleReminderAdd,
  handleReminderComplete,
  handleReminderDelete,
  handleReminderEdit,
  handleRemindersList,
  handleServerHealth,
  type ToolContext,
} from './tools/index.js';
import { SERVER_NAME, VERSION } from './version.js';

export interface ServerServices {
  orchestrator: MutationOrchestrator;
  queue: PendingActionQueue | null;
  publicConfig: PublicConfig;
}

export function createMcpServer(services: ServerServices, session: SessionContext): McpServer {
  const server = new McpServer({ name: SERVER_NAME, version: VERSION });
  const ctx: ToolContext = {
    orchestrator: services.orchestrator,
    session,
    queue: services.queue,
  };

  // ============================================================
  // Status
  // ============================================================

  server.tool(
    'server_health',
    'Report whether remindctl is reachable and authorized, and how many writes are queued.',
    {},
    async () => handleServerHealth(ctx)
  );

  // ============================================================
  // Reminders
  // ============================================================

  server.tool(
    'reminders_list',
    'List reminders. Defaults to pending reminders across all lists. ' +
      'Use the returned ids for follow-up calls; positions are never accepted.',
    remindersListShape,
    async (args) => handleRemindersList(ctx, args)
  );

  server.tool(
    'reminder_add',
    'Create a reminder. Without a list, a list is chosen from the title when one matches.',
    reminderAddShape,
    async (args) => handleReminderAdd(ctx, args)
  );

  server.tool(
    'reminder_edit',
    'Edit one reminder given by id, unique id prefix (4+ characters) or exact title.',
    reminderEditShape,
    async (args) => handleReminderEdit(ctx, args)
  );

  server.tool(
    'reminder_complete',
    'Mark reminders complete. Fails without changes if any reference is ambiguous or missing.',
    reminderCompleteShape,
    async (args) => handleReminderComplete(ctx, args)
  );

  server.tool(
    'reminder_delete',
    'Delete reminders. Without a reference, deletes the reminder last touched in this session. ' +
      'Repeating a delete reports the reference as already absent.',
    reminderDeleteShape,
    async (args) => handleReminderDelete(ctx, args)
  );

  // ============================================================
  // Lists
  // ============================================================

  server.tool(
    'lists_list',
    'List all reminder lists with their ids.',
    {},
    async () => handleListsList(ctx)
  );

  server.tool(
    'list_create',
    'Create a reminder list and return it with its id.',
    listCreateShape,
    async (args) => handleListCreate(ctx, args)
  );

  server.tool(
    'list_rename',
    'Rename a list given by listId (id or prefix) or listName.',
    listRenameShape,
    async (args) => handleListRename(ctx, args)
  );

  server.tool(
    'list_delete',
    'Delete a list given by listId (id or prefix) or listName.',
    listDeleteShape,
    async (args) => handleListDelete(ctx, args)
  );

  // ============================================================
  // Pending actions
  // ============================================================

  server.tool(
    'process_pending_actions',
    'Apply a batch of write actions in order. Each action reports applied, failed or skipped; ' +
      'one failure does not stop the rest unless stopOnError is set.',
    processPendingActionsShape,
    async (args) => handleProcessPendingActions(ctx, args)
  );

  server.tool(
    'pending_actions_list',
    'Show writes queued for this workspace while remindctl was unavailable.',
    {},
    async () => handlePendingActionsList(ctx)
  );

  server.tool(
    'pending_actions_replay',
    'Replay this workspace\'s queued writes. Applied entries are removed; failed ones stay queued.',
    pendingActionsReplayShape,
    async (args) => handlePendingActionsReplay(ctx, args)
  );

  server.tool(
    'pending_action_remove',
    'Drop one queued write by its pending action id.',
    pendingActionRemoveShape,
    async (args) => handlePendingActionRemove(ctx, args)
  );

  registerResources(server, {
    orchestrator: services.orchestrator,
    publicConfig: services.publicConfig,
  });

  return server;
}
