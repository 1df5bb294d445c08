/**
 * remindctl command model
 *
 * Each remindctl invocation is a tagged command. buildArgs() turns one into an
 * argument vector for execFile; nothing here ever touches a shell.
 */

import { z } from 'zod';
import {
  ReminderListSchema,
  ReminderSchema,
  RemindctlStatusSchema,
  type Reminder,
  type ReminderList,
  type ReminderPriority,
  type RemindctlStatus,
} from '../types/models.js';

export type RemindctlCommand =
  | { op: 'status' }
  | { op: 'lists' }
  | { op: 'show'; filter: string; list?: string }
  | {
      op: 'add';
      title: string;
      list?: string;
      due?: string;
      notes?: string;
      priority?: ReminderPriority;
    }
  | {
      op: 'edit';
      id: string;
      title?: string;
      list?: string;
      due?: string;
      clearDue?: boolean;
      notes?: string;
      priority?: ReminderPriority;
      complete?: boolean;
    }
  | { op: 'complete'; ids: string[]; dryRun?: boolean }
  | { op: 'delete'; ids: string[]; dryRun?: boolean }
  | { op: 'list-create'; name: string }
  | { op: 'list-rename'; name: string; newName: string }
  | { op: 'list-delete'; name: string };

export type CommandOp = RemindctlCommand['op'];

/**
 * Payload produced by each command on success
 */
export interface CommandPayloads {
  status: RemindctlStatus;
  lists: ReminderList[];
  show: Reminder[];
  add: Reminder;
  edit: Reminder;
  complete: Reminder[];
  delete: Reminder[];
  'list-create': null;
  'list-rename': null;
  'list-delete': null;
}

type PayloadSchemas = {
  [K in CommandOp]: z.ZodType<CommandPayloads[K], z.ZodTypeDef, unknown>;
};

export const PAYLOAD_SCHEMAS: PayloadSchemas = {
  status: RemindctlStatusSchema,
  lists: z.array(ReminderListSchema),
  show: z.array(ReminderSchema),
  add: ReminderSchema,
  edit: ReminderSchema,
  complete: z.array(ReminderSchema),
  delete: z.array(ReminderSchema),
  'list-create': z.null(),
  'list-rename': z.null(),
  'list-delete': z.null(),
};

const READ_OPS: ReadonlySet<CommandOp> = new Set<CommandOp>(['status', 'lists', 'show']);

// List mutations print nothing useful; their stdout is not parsed.
const NO_OUTPUT_OPS: ReadonlySet<CommandOp> = new Set<CommandOp>([
  'list-create',
  'list-rename',
  'list-delete',
]);

export function isReadCommand(op: CommandOp): boolean {
  return READ_OPS.has(op);
}

export function producesOutput(op: CommandOp): boolean {
  return !NO_OUTPUT_OPS.has(op);
}

/**
 * Flags appended to every invocation
 */
export const SAFE_FLAGS = ['--json', '--no-input', '--no-color'] as const;

// ============================================================
// Text validation
// ============================================================

export type TextRule = 'title' | 'listName' | 'notes' | 'value';

const TEXT_RULES: Record<TextRule, { min: number; max: number; allowLineBreaks: boolean }> = {
  title: { min: 1, max: 300, allowLineBreaks: false },
  listName: { min: 1, max: 120, allowLineBreaks: false },
  notes: { min: 0, max: 4000, allowLineBreaks: true },
  value: { min: 1, max: 300, allowLineBreaks: false },
};

const CONTROL_CHAR = /\p{Cc}/u;
const CONTROL_CHAR_EXCEPT_BREAKS = /(?![\n\t])\p{Cc}/u;

/**
 * Validate a user-supplied string
 * @returns problem description, or null when the value is acceptable
 */
export function validateText(value: string, field: string, rule: TextRule): string | null {
  const limits = TEXT_RULES[rule];
  const length = [...value].length;

  if (length < limits.min) {
    return `${field} cannot be empty`;
  }
  if (length > limits.max) {
    return `${field} exceeds max length ${limits.max}`;
  }
  const pattern = limits.allowLineBreaks ? CONTROL_CHAR_EXCEPT_BREAKS : CONTROL_CHAR;
  if (pattern.test(value)) {
    return `${field} contains control characters`;
  }
  return null;
}

interface TextCheck {
  value: string | undefined;
  field: string;
  rule: TextRule;
  /** Value is passed positionally and must not look like an option */
  positional?: boolean;
}

function firstProblem(checks: TextCheck[]): { field: string; message: string } | null {
  for (const check of checks) {
    if (check.value === undefined) {
      continue;
    }
    const message = validateText(check.value, check.field, check.rule);
    if (message) {
      return { field: check.field, message };
    }
    if (check.positional && check.value.startsWith('-')) {
      return { field: check.field, message: `${check.field} cannot start with '-'` };
    }
  }
  return null;
}

// ============================================================
// Argument vectors
// ============================================================

export type BuildArgsResult =
  | { ok: true; args: string[] }
  | { ok: false; field: string; message: string };

function withFlags(args: string[]): BuildArgsResult {
  return { ok: true, args: [...args, ...SAFE_FLAGS] };
}

function idChecks(ids: string[]): TextCheck[] {
  return ids.map((id) => ({ value: id, field: 'id', rule: 'value', positional: true }));
}

/**
 * Build the argument vector for a command, validating every string argument
 */
export function buildArgs(command: RemindctlCommand): BuildArgsResult {
  switch (command.op) {
    case 'status':
      return withFlags(['status']);

    case 'lists':
      return withFlags(['list']);

    case 'show': {
      const problem = firstProblem([
        { value: command.filter, field: 'filter', rule: 'value', positional: true },
        { value: command.list, field: 'list', rule: 'listName' },
      ]);
      if (problem) {
        return { ok: false, ...problem };
      }
      const args = ['show', command.filter];
      if (command.list !== undefined) {
        args.push('--list', command.list);
      }
      return withFlags(args);
    }

    case 'add': {
      const problem = firstProblem([
        { value: command.title, field: 'title', rule: 'title' },
        { value: command.list, field: 'list', rule: 'listName' },
        { value: command.due, field: 'due', rule: 'value' },
        { value: command.notes, field: 'notes', rule: 'notes' },
      ]);
      if (problem) {
        return { ok: false, ...problem };
      }
      const args = ['add', '--title', command.title];
      if (command.list !== undefined) {
        args.push('--list', command.list);
      }
      if (command.due !== undefined) {
        args.push('--due', command.due);
      }
      if (command.notes !== undefined) {
        args.push('--notes', command.notes);
      }
      if (command.priority !== undefined) {
        args.push('--priority', command.priority);
      }
      return withFlags(args);
    }

    case 'edit': {
      const problem = firstProblem([
        ...idChecks([command.id]),
        { value: command.title, field: 'title', rule: 'title' },
        { value: command.list, field: 'list', rule: 'listName' },
        { value: command.due, field: 'due', rule: 'value' },
        { value: command.notes, field: 'notes', rule: 'notes' },
      ]);
      if (problem) {
        return { ok: false, ...problem };
      }
      const args = ['edit', command.id];
      if (command.title !== undefined) {
        args.push('--title', command.title);
      }
      if (command.list !== undefined) {
        args.push('--list', command.list);
      }
      if (command.due !== undefined) {
        args.push('--due', command.due);
      }
      if (command.clearDue) {
        args.push('--clear-due');
      }
      if (command.notes !== undefined) {
        args.push('--notes', command.notes);
      }
      if (command.priority !== undefined) {
        args.push('--priority', command.priority);
      }
      if (command.complete !== undefined) {
        args.push(command.complete ? '--complete' : '--incomplete');
      }
      return withFlags(args);
    }

    case 'complete':
    case 'delete': {
      if (command.ids.length === 0) {
        return { ok: false, field: 'ids', message: 'at least one id is required' };
      }
      const problem = firstProblem(idChecks(command.ids));
      if (problem) {
        return { ok: false, ...problem };
      }
      const args: string[] = [command.op, ...command.ids];
      if (command.dryRun) {
        args.push('--dry-run');
      } else if (command.op === 'delete') {
        args.push('--force');
      }
      return withFlags(args);
    }

    case 'list-create': {
      const problem = firstProblem([
        { value: command.name, field: 'name', rule: 'listName', positional: true },
      ]);
      if (problem) {
        return { ok: false, ...problem };
      }
      return withFlags(['list', command.name, '--create']);
    }

    case 'list-rename': {
      const problem = firstProblem([
        { value: command.name, field: 'name', rule: 'listName', positional: true },
        { value: command.newName, field: 'newName', rule: 'listName' },
      ]);
      if (problem) {
        return { ok: false, ...problem };
      }
      return withFlags(['list', command.name, '--rename', command.newName]);
    }

    case 'list-delete': {
      const problem = firstProblem([
        { value: command.name, field: 'name', rule: 'listName', positional: true },
      ]);
      if (problem) {
        return { ok: false, ...problem };
      }
      return withFlags(['list', command.name, '--delete', '--force']);
    }
  }
}
