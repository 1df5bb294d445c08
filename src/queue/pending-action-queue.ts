/**
 * Pending Action Queue
 *
 * Write actions deferred while remindctl is unavailable. Each workspace owns
 * one JSON Lines file; every read-modify-write holds the per-file mutex and
 * rewrites go through a temporary file and rename.
 */

import { createHash, randomUUID } from 'crypto';
import { promises as fs } from 'fs';
import { homedir } from 'os';
import { join } from 'path';
import { z } from 'zod';
import { WRITE_OPS, type BatchActionResult, type WriteOp } from '../core/operation-schemas.js';
import { queueLogger } from '../utils/logger.js';
import { FileMutex } from './file-mutex.js';

export const PendingActionSchema = z.object({
  id: z.string().min(1),
  createdAt: z.string(),
  op: z.enum(WRITE_OPS),
  args: z.unknown(),
  attempts: z.number().int().min(0),
  lastError: z.string().nullable(),
});

export type PendingAction = z.infer<typeof PendingActionSchema>;

export interface PendingActionQueueOptions {
  queueDir: string;
  workspace: string;
  mutex?: FileMutex;
  now?: () => Date;
}

export interface QueueReplayReport {
  results: BatchActionResult[];
  removed: number;
  failed: number;
  remaining: number;
}

/**
 * Anything that can defer a write action
 */
export interface ActionQueue {
  readonly workspace: string;
  append(op: WriteOp, args: unknown): Promise<PendingAction>;
  size(): Promise<number>;
  replay(
    processor: (actions: PendingAction[]) => Promise<BatchActionResult[]>
  ): Promise<QueueReplayReport>;
}

export const DEFAULT_QUEUE_DIR = join(homedir(), '.remindctl-mcp', 'queue');

const FILE_MODE = 0o600;
const DIR_MODE = 0o700;
const MAX_SLUG_LENGTH = 40;

/**
 * Queue file name for a workspace: readable slug plus a hash of the exact name
 */
export function queueFileName(workspace: string): string {
  const slug =
    workspace
      .toLowerCase()
      .replace(/[^a-z0-9]+/g, '-')
      .replace(/^-+|-+$/g, '')
      .slice(0, MAX_SLUG_LENGTH) || 'workspace';
  const digest = createHash('sha256').update(workspace, 'utf8').digest('hex').slice(0, 12);
  return `${slug}-${digest}.jsonl`;
}

// fs errors can come from another realm, so this checks the shape, not the class
export function isNotFound(error: unknown): boolean {
  return (
    typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT'
  );
}

/**
 * Parse queue file contents; a trailing partial record is skipped
 */
export function parseQueueContent(content: string, filePath: string): PendingAction[] {
  const lines = content.split('\n');
  const endsCleanly = content.endsWith('\n');
  const actions: PendingAction[] = [];

  lines.forEach((line, index) => {
    if (line.trim() === '') {
      return;
    }
    const isTrailing = index === lines.length - 1 && !endsCleanly;

    let raw: unknown;
    try {
      raw = JSON.parse(line);
    } catch {
      if (isTrailing) {
        queueLogger.debug({ filePath }, 'Skipping trailing partial record');
      } else {
        queueLogger.warn({ filePath, line: index + 1 }, 'Skipping unreadable queue record');
      }
      return;
    }

    const parsed = PendingActionSchema.safeParse(raw);
    if (parsed.success) {
      actions.push(parsed.data);
    } else {
      queueLogger.warn({ filePath, line: index + 1 }, 'Skipping invalid queue record');
    }
  });

  return actions;
}

function serialize(actions: PendingAction[]): string {
  return actions.map((action) => `${JSON.stringify(action)}\n`).join('');
}

/**
 * Workspace-scoped queue of deferred write actions
 */
export class PendingActionQueue implements ActionQueue {
  readonly workspace: string;
  readonly filePath: string;
  private readonly queueDir: string;
  private readonly mutex: FileMutex;
  private readonly now: () => Date;

  constructor(options: PendingActionQueueOptions) {
    this.workspace = options.workspace;
    this.queueDir = options.queueDir;
    this.filePath = join(options.queueDir, queueFileName(options.workspace));
    this.mutex = options.mutex ?? new FileMutex();
    this.now = options.now ?? (() => new Date());
  }

  getMutex(): FileMutex {
    return this.mutex;
  }

  /**
   * Append one action with zero attempts
   */
  async append(op: WriteOp, args: unknown): Promise<PendingAction> {
    const action: PendingAction = {
      id: randomUUID(),
      createdAt: this.now().toISOString(),
      op,
      args,
      attempts: 0,
      lastError: null,
    };

    await this.mutex.withLock(this.filePath, async () => {
      await fs.mkdir(this.queueDir, { recursive: true, mode: DIR_MODE });
      const existing = await this.readRaw();
      // Terminate a partial record left by an interrupted write
      const separator = existing.length > 0 && !existing.endsWith('\n') ? '\n' : '';
      await fs.appendFile(this.filePath, `${separator}${JSON.stringify(action)}\n`, {
        encoding: 'utf8',
        mode: FILE_MODE,
      });
    });

    queueLogger.info({ workspace: this.workspace, id: action.id, op }, 'Action queued');
    return action;
  }

  async list(): Promise<PendingAction[]> {
    return this.mutex.withLock(this.filePath, () => this.readAll());
  }

  async size(): Promise<number> {
    const actions = await this.list();
    return actions.length;
  }

  /**
   * Remove one action by id
   * @returns false when no action had that id
   */
  async remove(id: string): Promise<boolean> {
    return this.mutex.withLock(this.filePath, async () => {
      const actions = await this.readAll();
      const kept = actions.filter((action) => action.id !== id);
      if (kept.length === actions.length) {
        return false;
      }
      await this.writeAll(kept);
      queueLogger.info({ workspace: this.workspace, id }, 'Action removed');
      return true;
    });
  }

  /**
   * Replay a snapshot of the queue through a processor
   *
   * The processor runs outside the file lock so appends are never blocked by
   * remindctl calls. Results are applied by id: applied entries are removed,
   * failed entries get attempts + 1 and lastError, skipped entries stay as they are.
   */
  async replay(
    processor: (actions: PendingAction[]) => Promise<BatchActionResult[]>
  ): Promise<QueueReplayReport> {
    return this.mutex.withLock(`${this.filePath}.replay`, async () => {
      const snapshot = await this.list();
      if (snapshot.length === 0) {
        return { results: [], removed: 0, failed: 0, remaining: 0 };
      }

      const results = await processor(snapshot);
      const byId = new Map(results.map((result) => [result.id, result]));

      return this.mutex.withLock(this.filePath, async () => {
        const current = await this.readAll();
        let removed = 0;
        let failed = 0;
        const next: PendingAction[] = [];

        for (const action of current) {
          const result = byId.get(action.id);
          if (result?.status === 'applied') {
            removed++;
            continue;
          }
          if (result?.status === 'failed') {
            failed++;
            next.push({
              ...action,
              attempts: action.attempts + 1,
              lastError: result.error.message,
            });
            continue;
          }
          next.push(action);
        }

        await this.writeAll(next);
        queueLogger.info(
          { workspace: this.workspace, removed, failed, remaining: next.length },
          'Replay finished'
        );
        return { results, removed, failed, remaining: next.length };
      });
    });
  }

  private async readRaw(): Promise<string> {
    try {
      return await fs.readFile(this.filePath, 'utf8');
    } catch (error) {
      if (isNotFound(error)) {
        return '';
      }
      throw error;
    }
  }

  private async readAll(): Promise<PendingAction[]> {
    return parseQueueContent(await this.readRaw(), this.filePath);
  }

  private async writeAll(actions: PendingAction[]): Promise<void> {
    await fs.mkdir(this.queueDir, { recursive: true, mode: DIR_MODE });
    const tmpPath = `${this.filePath}.tmp`;
    await fs.writeFile(tmpPath, serialize(actions), { encoding: 'utf8', mode: FILE_MODE });
    await fs.rename(tmpPath, this.filePath);
  }
}
