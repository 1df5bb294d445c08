/**
 * Mutation Orchestrator
 *
 * Single path for every read and write: resolves references, then issues
 * the remindctl command only when every reference resolved to exactly one
 * target. Writes are deferred to the pending action queue while the backend
 * is down. Batch replay goes through the same appliers as live tool calls.
 */

import { validateText, type TextRule } from '../integrations/remindctl-commands.js';
import type { RemindctlExecutor } from '../integrations/remindctl-runner.js';
import {
  listEntry,
  resolutionError,
  resolveReference,
  type ReferenceEntry,
  type ReferenceResolver,
} from '../integrations/reference-resolver.js';
import type { ActionQueue } from '../queue/pending-action-queue.js';
import {
  fail,
  fromRunnerFailure,
  invalidInput,
  notFound,
  succeed,
  type OperationError,
  type OperationResult,
} from '../types/errors.js';
import type { Reminder, ReminderList } from '../types/models.js';
import { createLogger } from '../utils/logger.js';
import type { HealthProbe } from './health-monitor.js';
import { inferBestListName } from './list-routing.js';
import {
  WRITE_INPUT_SCHEMAS,
  isWriteOp,
  type BatchAction,
  type BatchActionResult,
  type BatchSummary,
  type CompleteResult,
  type DeleteResult,
  type ListCreateInput,
  type ListDeleteInput,
  type ListDeleteResult,
  type ListRenameInput,
  type QueuedAck,
  type ReminderAddInput,
  type ReminderCompleteInput,
  type ReminderDeleteInput,
  type ReminderEditInput,
  type RemindersListInput,
  type WriteInputs,
  type WriteOp,
  type WriteOutputs,
} from './operation-schemas.js';
import type { SessionContext } from './session-context.js';

const orchestratorLogger = createLogger('orchestrator');

export interface OrchestratorOptions {
  /** Default for reminder_delete when the caller omits allowMissing */
  deleteAllowMissing: boolean;
  /** Route new reminders to a matching list when no list is given */
  autoRouteLists: boolean;
  /** Reported by server_health */
  authRequired: boolean;
}

export interface OrchestratorDeps {
  runner: RemindctlExecutor;
  resolver: ReferenceResolver;
  health: HealthProbe;
  queue: ActionQueue | null;
  options: OrchestratorOptions;
}

export interface ServerHealth {
  ok: true;
  authRequired: boolean;
  remindctlAuthorized: boolean;
  remindctlStatus: string;
  queue: { enabled: boolean; workspace: string | null; pending: number | null };
}

export interface QueueReplaySummary extends BatchSummary {
  remaining: number;
}

type Appliers = {
  [K in WriteOp]: (
    session: SessionContext,
    input: WriteInputs[K]
  ) => Promise<OperationResult<WriteOutputs[K]>>;
};

type TextChecks = {
  [K in WriteOp]: (input: WriteInputs[K]) => OperationError | null;
};

type FieldCheck = [value: string | undefined, field: string, rule: TextRule];

function checkFields(checks: FieldCheck[]): OperationError | null {
  for (const [value, field, rule] of checks) {
    if (value === undefined) {
      continue;
    }
    const message = validateText(value, field, rule);
    if (message) {
      return invalidInput(message, field);
    }
  }
  return null;
}

// Text validation that runs before a write is queued or applied.
const TEXT_CHECKS: TextChecks = {
  reminder_add: (input) =>
    checkFields([
      [input.title, 'title', 'title'],
      [input.listName, 'listName', 'listName'],
      [input.due, 'due', 'value'],
      [input.notes, 'notes', 'notes'],
    ]),
  reminder_edit: (input) =>
    checkFields([
      [input.title, 'title', 'title'],
      [input.listName, 'listName', 'listName'],
      [input.due, 'due', 'value'],
      [input.notes, 'notes', 'notes'],
    ]),
  reminder_complete: () => null,
  reminder_delete: () => null,
  list_create: (input) => checkFields([[input.name, 'name', 'listName']]),
  list_rename: (input) =>
    checkFields([
      [input.listName, 'listName', 'listName'],
      [input.newName, 'newName', 'listName'],
    ]),
  list_delete: (input) => checkFields([[input.listName, 'listName', 'listName']]),
};

const NO_RECENT_REMINDER =
  'reminderIds or reminderId is required when there is no recent reminder in this session';

function isDryRun(input: unknown): boolean {
  return typeof input === 'object' && input !== null && 'dryRun' in input && input.dryRun === true;
}

function collectReferences(input: { reminderIds?: string[]; reminderId?: string }): string[] {
  const references = [...(input.reminderIds ?? [])];
  if (input.reminderId !== undefined) {
    references.push(input.reminderId);
  }
  return references;
}

function unique(values: string[]): string[] {
  return [...new Set(values)];
}

export function summarize(results: BatchActionResult[]): BatchSummary {
  const applied = results.filter((result) => result.status === 'applied').length;
  const failed = results.filter((result) => result.status === 'failed').length;
  const skipped = results.filter((result) => result.status === 'skipped').length;
  return { processed: applied + failed, applied, failed, skipped, results };
}

export class MutationOrchestrator {
  private readonly runner: RemindctlExecutor;
  private readonly resolver: ReferenceResolver;
  private readonly health: HealthProbe;
  private readonly queue: ActionQueue | null;
  private readonly options: OrchestratorOptions;

  private readonly appliers: Appliers = {
    reminder_add: (session, input) => this.reminderAdd(session, input),
    reminder_edit: (session, input) => this.reminderEdit(session, input),
    reminder_complete: (session, input) => this.reminderComplete(session, input),
    reminder_delete: (session, input) => this.reminderDelete(session, input),
    list_create: (_session, input) => this.listCreate(input),
    list_rename: (_session, input) => this.listRename(input),
    list_delete: (_session, input) => this.listDelete(input),
  };

  constructor(deps: OrchestratorDeps) {
    this.runner = deps.runner;
    this.resolver = deps.resolver;
    this.health = deps.health;
    this.queue = deps.queue;
    this.options = deps.options;
  }

  getQueue(): ActionQueue | null {
    return this.queue;
  }

  // ============================================================
  // Reads
  // ============================================================

  async serverHealth(): Promise<OperationResult<ServerHealth>> {
    const report = await this.health.check();
    if (report.failure) {
      return fail(fromRunnerFailure(report.failure));
    }

    const health: ServerHealth = {
      ok: true,
      authRequired: this.options.authRequired,
      remindctlAuthorized: report.authorized,
      remindctlStatus: report.status,
      queue: {
        enabled: this.queue !== null,
        workspace: this.queue ? this.queue.workspace : null,
        pending: this.queue ? await this.queue.size() : null,
      },
    };
    return succeed(health);
  }

  async listsList(): Promise<OperationResult<{ lists: ReminderList[] }>> {
    const result = await this.runner.execute({ op: 'lists' });
    if (!result.ok) {
      return fail(fromRunnerFailure(result.failure));
    }
    return succeed({ lists: result.payload });
  }

  async remindersList(
    input: RemindersListInput
  ): Promise<OperationResult<{ reminders: Reminder[] }>> {
    const listName = await this.resolveListName(input.listId, input.listName);
    if (!listName.ok) {
      return listName;
    }

    const filter = input.filter?.trim() || 'pending';
    const pendingOnly = ['pending', 'incomplete'].includes(filter.toLowerCase());

    const result = await this.runner.execute({
      op: 'show',
      filter: pendingOnly ? 'all' : filter,
      list: listName.data ?? undefined,
    });
    if (!result.ok) {
      return fail(fromRunnerFailure(result.failure));
    }

    const reminders =
      pendingOnly && !input.includeCompleted
        ? result.payload.filter((reminder) => !reminder.isCompleted)
        : result.payload;
    return succeed({ reminders });
  }

  // ============================================================
  // Writes
  // ============================================================

  /**
   * Validate a write, then queue it when the backend is down or apply it now
   */
  async submit<K extends WriteOp>(
    session: SessionContext,
    op: K,
    input: WriteInputs[K]
  ): Promise<OperationResult<WriteOutputs[K] | QueuedAck>> {
    const invalid = this.checkText(op, input);
    if (invalid) {
      return fail(invalid);
    }

    if (this.queue && !isDryRun(input) && !(await this.health.isAvailable())) {
      const args = this.deferredArgs(session, op, input);
      if (!args.ok) {
        return args;
      }
      const action = await this.queue.append(op, args.data);
      orchestratorLogger.info(
        { op, pendingActionId: action.id },
        'Backend unavailable, write queued'
      );
      const ack: QueuedAck = {
        queued: true,
        pendingActionId: action.id,
        op,
        message: 'remindctl is unavailable; the action was queued for replay',
      };
      return succeed(ack);
    }

    return this.apply(session, op, input);
  }

  /**
   * Arguments persisted for a deferred write
   *
   * A delete without a reference is bound to this session's recent reminder
   * now; replay may run in another session or after a restart.
   */
  private deferredArgs(
    session: SessionContext,
    op: WriteOp,
    input: unknown
  ): OperationResult<unknown> {
    if (op !== 'reminder_delete') {
      return succeed(input);
    }
    const parsed = WRITE_INPUT_SCHEMAS.reminder_delete.safeParse(input);
    if (!parsed.success) {
      return fail(invalidInput(parsed.error.issues[0].message, 'reminderIds'));
    }
    if (collectReferences(parsed.data).length > 0) {
      return succeed(parsed.data);
    }

    const recent = session.getLastTouchedReminderId();
    if (recent === null) {
      return fail(invalidInput(NO_RECENT_REMINDER, 'reminderIds'));
    }
    return succeed({ ...parsed.data, reminderIds: [recent] });
  }

  /**
   * Apply a write against the live backend
   */
  async apply<K extends WriteOp>(
    session: SessionContext,
    op: K,
    input: WriteInputs[K]
  ): Promise<OperationResult<WriteOutputs[K]>> {
    const invalid = this.checkText(op, input);
    if (invalid) {
      return fail(invalid);
    }
    const applier = this.appliers[op];
    return applier(session, input);
  }

  /**
   * Apply a batch of actions in order; one failure never aborts the rest
   * unless stopOnError is set
   */
  async processPendingActions(
    session: SessionContext,
    actions: BatchAction[],
    options: { stopOnError?: boolean } = {}
  ): Promise<BatchSummary> {
    const results: BatchActionResult[] = [];
    let stopped = false;

    for (const action of actions) {
      const op = action.op.trim().toLowerCase();

      if (stopped) {
        results.push({
          id: action.id,
          op,
          status: 'skipped',
          ok: false,
          reason: 'not attempted because an earlier action failed',
        });
        continue;
      }

      if (!isWriteOp(op)) {
        results.push({
          id: action.id,
          op,
          status: 'skipped',
          ok: false,
          reason: `unsupported op '${action.op}'`,
        });
        continue;
      }

      const outcome = await this.replayOne(session, op, action.args);
      if (outcome.ok) {
        results.push({ id: action.id, op, status: 'applied', ok: true, data: outcome.data });
      } else {
        results.push({ id: action.id, op, status: 'failed', ok: false, error: outcome.error });
        stopped = options.stopOnError === true;
      }
    }

    const summary = summarize(results);
    orchestratorLogger.info(
      { applied: summary.applied, failed: summary.failed, skipped: summary.skipped },
      'Batch processed'
    );
    return summary;
  }

  /**
   * Drain the workspace queue through processPendingActions
   */
  async replayQueue(
    session: SessionContext,
    options: { stopOnError?: boolean } = {}
  ): Promise<OperationResult<QueueReplaySummary>> {
    if (!this.queue) {
      return fail(invalidInput('the pending action queue is disabled'));
    }
    const report = await this.queue.replay(async (actions) => {
      const summary = await this.processPendingActions(session, actions, options);
      return summary.results;
    });
    return succeed({ ...summarize(report.results), remaining: report.remaining });
  }

  private async replayOne<K extends WriteOp>(
    session: SessionContext,
    op: K,
    args: unknown
  ): Promise<OperationResult<WriteOutputs[K]>> {
    const parsed = WRITE_INPUT_SCHEMAS[op].safeParse(args ?? {});
    if (!parsed.success) {
      const detail = parsed.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      return fail(invalidInput(`invalid ${op} args: ${detail}`));
    }
    return this.apply(session, op, parsed.data);
  }

  private checkText<K extends WriteOp>(op: K, input: WriteInputs[K]): OperationError | null {
    const check = TEXT_CHECKS[op];
    return check(input);
  }

  // ============================================================
  // Reminder writes
  // ============================================================

  private async reminderAdd(
    session: SessionContext,
    input: ReminderAddInput
  ): Promise<OperationResult<Reminder>> {
    let lists: ReminderList[] | undefined;
    const routeByText = input.listName === undefined && this.options.autoRouteLists;
    if (input.listId !== undefined || routeByText) {
      const fetched = await this.resolver.fetchLists();
      if (!fetched.ok) {
        return fail(fromRunnerFailure(fetched.failure));
      }
      lists = fetched.payload;
    }

    const explicit = await this.resolveListName(input.listId, input.listName, lists);
    if (!explicit.ok) {
      return explicit;
    }
    const listName =
      explicit.data ?? (lists ? inferBestListName(lists, input.title, input.notes) : null);

    const result = await this.runner.execute({
      op: 'add',
      title: input.title,
      list: listName ?? undefined,
      due: input.due,
      notes: input.notes,
      priority: input.priority,
    });
    if (!result.ok) {
      return fail(fromRunnerFailure(result.failure));
    }

    session.rememberReminder(result.payload.id);
    return succeed(result.payload);
  }

  private async reminderEdit(
    session: SessionContext,
    input: ReminderEditInput
  ): Promise<OperationResult<Reminder>> {
    const resolved = await this.resolver.resolveReminder(input.reminderId);
    if (resolved.kind !== 'unique') {
      return fail(resolutionError(resolved));
    }

    const listName = await this.resolveListName(input.listId, input.listName);
    if (!listName.ok) {
      return listName;
    }

    const result = await this.runner.execute({
      op: 'edit',
      id: resolved.id,
      title: input.title,
      list: listName.data ?? undefined,
      due: input.due,
      clearDue: input.clearDue,
      notes: input.notes,
      priority: input.priority,
      complete: input.complete,
    });
    if (!result.ok) {
      return fail(fromRunnerFailure(result.failure));
    }

    session.rememberReminder(result.payload.id);
    return succeed(result.payload);
  }

  private async reminderComplete(
    session: SessionContext,
    input: ReminderCompleteInput
  ): Promise<OperationResult<CompleteResult>> {
    const references = collectReferences(input);
    if (references.length === 0) {
      return fail(invalidInput('reminderIds or reminderId is required', 'reminderIds'));
    }

    const outcome = await this.resolver.resolveReminders(references);
    if (outcome.kind === 'upstream') {
      return fail(resolutionError(outcome));
    }

    const ids: string[] = [];
    for (const { resolution } of outcome.results) {
      if (resolution.kind !== 'unique') {
        return fail(resolutionError(resolution));
      }
      ids.push(resolution.id);
    }

    const completedIds = unique(ids);
    const dryRun = input.dryRun === true;
    const result = await this.runner.execute({ op: 'complete', ids: completedIds, dryRun });
    if (!result.ok) {
      return fail(fromRunnerFailure(result.failure));
    }

    if (!dryRun) {
      session.rememberReminder(completedIds[completedIds.length - 1]);
    }
    return succeed({ completedIds, reminders: result.payload, dryRun });
  }

  private async reminderDelete(
    session: SessionContext,
    input: ReminderDeleteInput
  ): Promise<OperationResult<DeleteResult>> {
    let references = collectReferences(input);
    let usedRecentReference = false;

    if (references.length === 0) {
      const recent = session.getLastTouchedReminderId();
      if (recent === null) {
        return fail(invalidInput(NO_RECENT_REMINDER, 'reminderIds'));
      }
      references = [recent];
      usedRecentReference = true;
    }

    const outcome = await this.resolver.resolveReminders(references);
    if (outcome.kind === 'upstream') {
      return fail(resolutionError(outcome));
    }

    const ids: string[] = [];
    const missing: string[] = [];
    for (const { reference, resolution } of outcome.results) {
      if (resolution.kind === 'unique') {
        ids.push(resolution.id);
      } else if (resolution.kind === 'not_found') {
        missing.push(reference);
      } else {
        return fail(resolutionError(resolution));
      }
    }

    const allowMissing = input.allowMissing ?? this.options.deleteAllowMissing;
    if (missing.length > 0 && !allowMissing) {
      return fail(notFound(missing[0], `reminder references not found: ${missing.join(', ')}`));
    }

    const dryRun = input.dryRun === true;
    const deletedIds = unique(ids);
    if (deletedIds.length === 0) {
      return succeed({
        deletedIds: [],
        deletedReminders: [],
        alreadyAbsentRefs: missing,
        usedRecentReference,
        dryRun,
        message: 'nothing to delete; all references already absent',
      });
    }

    const result = await this.runner.execute({ op: 'delete', ids: deletedIds, dryRun });
    if (!result.ok) {
      return fail(fromRunnerFailure(result.failure));
    }

    if (!dryRun) {
      session.rememberReminder(deletedIds[deletedIds.length - 1]);
    }
    return succeed({
      deletedIds,
      deletedReminders: result.payload,
      alreadyAbsentRefs: missing,
      usedRecentReference,
      dryRun,
      message: dryRun ? 'dry run; nothing was deleted' : 'deletion applied',
    });
  }

  // ============================================================
  // List writes
  // ============================================================

  private async listCreate(input: ListCreateInput): Promise<OperationResult<ReminderList>> {
    const result = await this.runner.execute({ op: 'list-create', name: input.name });
    if (!result.ok) {
      return fail(fromRunnerFailure(result.failure));
    }
    return this.findListByTitle(input.name, 'created');
  }

  private async listRename(input: ListRenameInput): Promise<OperationResult<ReminderList>> {
    const target = await this.resolveExistingList(input.listId, input.listName);
    if (!target.ok) {
      return target;
    }

    const result = await this.runner.execute({
      op: 'list-rename',
      name: target.data.name,
      newName: input.newName,
    });
    if (!result.ok) {
      return fail(fromRunnerFailure(result.failure));
    }
    return this.findListByTitle(input.newName, 'renamed');
  }

  private async listDelete(input: ListDeleteInput): Promise<OperationResult<ListDeleteResult>> {
    const target = await this.resolveExistingList(input.listId, input.listName);
    if (!target.ok) {
      return target;
    }

    const result = await this.runner.execute({ op: 'list-delete', name: target.data.name });
    if (!result.ok) {
      return fail(fromRunnerFailure(result.failure));
    }
    const deleted: ListDeleteResult = {
      deleted: true,
      listId: target.data.id,
      listName: target.data.name,
    };
    return succeed(deleted);
  }

  // ============================================================
  // List references
  // ============================================================

  /**
   * List name for a command's --list option
   *
   * A listId is resolved as a list reference; a bare listName is passed as
   * given. When both are present they must name the same list.
   */
  private async resolveListName(
    listId: string | undefined,
    listName: string | undefined,
    knownLists?: ReminderList[]
  ): Promise<OperationResult<string | null>> {
    if (listId === undefined) {
      if (listName === undefined) {
        return succeed(null);
      }
      const invalid = checkFields([[listName, 'listName', 'listName']]);
      return invalid ? fail(invalid) : succeed(listName);
    }

    let lists = knownLists;
    if (!lists) {
      const fetched = await this.resolver.fetchLists();
      if (!fetched.ok) {
        return fail(fromRunnerFailure(fetched.failure));
      }
      lists = fetched.payload;
    }

    const resolution = resolveReference(lists.map(listEntry), listId);
    if (resolution.kind !== 'unique') {
      return fail(resolutionError(resolution));
    }
    if (listName !== undefined && resolution.name !== listName) {
      return fail(invalidInput('listId and listName refer to different lists', 'listName'));
    }
    return succeed(resolution.name);
  }

  /**
   * Resolve the list a rename or delete applies to
   */
  private async resolveExistingList(
    listId: string | undefined,
    listName: string | undefined
  ): Promise<OperationResult<ReferenceEntry>> {
    const reference = listId ?? listName;
    if (reference === undefined) {
      return fail(invalidInput('listId or listName is required', 'listId'));
    }

    const resolved = await this.resolver.resolveList(reference);
    if (resolved.kind !== 'unique') {
      return fail(resolutionError(resolved));
    }
    if (listId !== undefined && listName !== undefined && resolved.name !== listName) {
      return fail(invalidInput('listId and listName refer to different lists', 'listName'));
    }
    return succeed({ id: resolved.id, name: resolved.name });
  }

  private async findListByTitle(
    title: string,
    action: 'created' | 'renamed'
  ): Promise<OperationResult<ReminderList>> {
    const lists = await this.resolver.fetchLists();
    if (!lists.ok) {
      return fail(fromRunnerFailure(lists.failure));
    }
    const match = lists.payload.find((list) => list.title === title);
    if (!match) {
      return fail(notFound(title, `${action} list '${title}' not found after operation`));
    }
    return succeed(match);
  }
}
