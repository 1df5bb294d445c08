/**
 * Operation schemas
 *
 * zod input shapes for every tool, plus the result types of the write
 * operations that can be queued and replayed.
 */

import { z } from 'zod';
import type { OperationError } from '../types/errors.js';
import { PRIORITIES, type Reminder, type ReminderList } from '../types/models.js';

const DUE_DESCRIPTION =
  'Due date as ISO 8601 / RFC 3339, for example 2026-03-01 or 2026-03-01T14:30:00Z';

const listIdField = z
  .string()
  .optional()
  .describe('List id or unique id prefix (preferred over listName)');
const listNameField = z.string().optional().describe('Exact list name');

// ============================================================
// Read operations
// ============================================================

export const remindersListShape = {
  filter: z
    .string()
    .optional()
    .describe(
      'pending (default), incomplete, today, tomorrow, week, overdue, upcoming, completed, all, or a date'
    ),
  includeCompleted: z
    .boolean()
    .optional()
    .describe('Keep completed reminders when filter is pending or incomplete'),
  listId: listIdField,
  listName: listNameField,
};
export const RemindersListInputSchema = z.object(remindersListShape);
export type RemindersListInput = z.infer<typeof RemindersListInputSchema>;

// ============================================================
// Write operations
// ============================================================

export const reminderAddShape = {
  title: z.string().describe('Reminder title'),
  listId: listIdField,
  listName: listNameField,
  due: z.string().optional().describe(DUE_DESCRIPTION),
  notes: z.string().optional().describe('Free-form notes'),
  priority: z.enum(PRIORITIES).optional(),
};
export const ReminderAddInputSchema = z.object(reminderAddShape);
export type ReminderAddInput = z.infer<typeof ReminderAddInputSchema>;

export const reminderEditShape = {
  reminderId: z.string().describe('Reminder id, unique id prefix, or exact title'),
  title: z.string().optional(),
  listId: listIdField,
  listName: listNameField,
  due: z.string().optional().describe(DUE_DESCRIPTION),
  clearDue: z.boolean().optional().describe('Remove the due date'),
  notes: z.string().optional(),
  priority: z.enum(PRIORITIES).optional(),
  complete: z.boolean().optional().describe('true marks complete, false marks incomplete'),
};
export const ReminderEditInputSchema = z.object(reminderEditShape);
export type ReminderEditInput = z.infer<typeof ReminderEditInputSchema>;

export const reminderCompleteShape = {
  reminderIds: z.array(z.string()).optional().describe('Reminder ids or unique id prefixes'),
  reminderId: z.string().optional(),
  dryRun: z.boolean().optional().describe('Preview without changing anything'),
};
export const ReminderCompleteInputSchema = z.object(reminderCompleteShape);
export type ReminderCompleteInput = z.infer<typeof ReminderCompleteInputSchema>;

export const reminderDeleteShape = {
  ...reminderCompleteShape,
  allowMissing: z
    .boolean()
    .optional()
    .describe('Report missing references in alreadyAbsentRefs instead of failing'),
};
export const ReminderDeleteInputSchema = z.object(reminderDeleteShape);
export type ReminderDeleteInput = z.infer<typeof ReminderDeleteInputSchema>;

export const listCreateShape = {
  name: z.string().describe('Name of the new list'),
};
export const ListCreateInputSchema = z.object(listCreateShape);
export type ListCreateInput = z.infer<typeof ListCreateInputSchema>;

export const listRenameShape = {
  listId: listIdField,
  listName: listNameField,
  newName: z.string().describe('New list name'),
};
export const ListRenameInputSchema = z.object(listRenameShape);
export type ListRenameInput = z.infer<typeof ListRenameInputSchema>;

export const listDeleteShape = {
  listId: listIdField,
  listName: listNameField,
};
export const ListDeleteInputSchema = z.object(listDeleteShape);
export type ListDeleteInput = z.infer<typeof ListDeleteInputSchema>;

export const WRITE_OPS = [
  'reminder_add',
  'reminder_edit',
  'reminder_complete',
  'reminder_delete',
  'list_create',
  'list_rename',
  'list_delete',
] as const;

export type WriteOp = (typeof WRITE_OPS)[number];

export function isWriteOp(value: string): value is WriteOp {
  return WRITE_OPS.some((op) => op === value);
}

export interface WriteInputs {
  reminder_add: ReminderAddInput;
  reminder_edit: ReminderEditInput;
  reminder_complete: ReminderCompleteInput;
  reminder_delete: ReminderDeleteInput;
  list_create: ListCreateInput;
  list_rename: ListRenameInput;
  list_delete: ListDeleteInput;
}

export const WRITE_INPUT_SCHEMAS: {
  [K in WriteOp]: z.ZodType<WriteInputs[K], z.ZodTypeDef, unknown>;
} = {
  reminder_add: ReminderAddInputSchema,
  reminder_edit: ReminderEditInputSchema,
  reminder_complete: ReminderCompleteInputSchema,
  reminder_delete: ReminderDeleteInputSchema,
  list_create: ListCreateInputSchema,
  list_rename: ListRenameInputSchema,
  list_delete: ListDeleteInputSchema,
};

// ============================================================
// Write results
// ============================================================

export interface CompleteResult {
  completedIds: string[];
  reminders: Reminder[];
  dryRun: boolean;
}

export interface DeleteResult {
  deletedIds: string[];
  deletedReminders: Reminder[];
  alreadyAbsentRefs: string[];
  usedRecentReference: boolean;
  dryRun: boolean;
  message: string;
}

export interface ListDeleteResult {
  deleted: true;
  listId: string;
  listName: string;
}

export interface WriteOutputs {
  reminder_add: Reminder;
  reminder_edit: Reminder;
  reminder_complete: CompleteResult;
  reminder_delete: DeleteResult;
  list_create: ReminderList;
  list_rename: ReminderList;
  list_delete: ListDeleteResult;
}

/**
 * Returned instead of a write result when the action was deferred
 */
export interface QueuedAck {
  queued: true;
  pendingActionId: string;
  op: WriteOp;
  message: string;
}

// ============================================================
// Batch processing
// ============================================================

export const pendingActionInputShape = {
  id: z.string().describe('Caller-assigned action id, echoed in the result'),
  op: z.string().describe(`One of: ${WRITE_OPS.join(', ')}`),
  args: z.unknown().describe('Arguments of the operation, same shape as the tool input'),
};

export const processPendingActionsShape = {
  actions: z.array(z.object(pendingActionInputShape)),
  stopOnError: z
    .boolean()
    .optional()
    .describe('Skip every action after the first failure'),
};
export const ProcessPendingActionsInputSchema = z.object(processPendingActionsShape);
export type ProcessPendingActionsInput = z.infer<typeof ProcessPendingActionsInputSchema>;

export interface BatchAction {
  id: string;
  op: string;
  args?: unknown;
}

export type BatchActionResult =
  | { id: string; op: string; status: 'applied'; ok: true; data: unknown }
  | { id: string; op: string; status: 'failed'; ok: false; error: OperationError }
  | { id: string; op: string; status: 'skipped'; ok: false; reason: string };

export interface BatchSummary {
  /** Actions that were attempted (applied + failed) */
  processed: number;
  applied: number;
  failed: number;
  skipped: number;
  results: BatchActionResult[];
}

export const pendingActionsReplayShape = {
  stopOnError: processPendingActionsShape.stopOnError,
};

export const pendingActionRemoveShape = {
  id: z.string().describe('Pending action id'),
};
