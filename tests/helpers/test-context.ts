/**
 * Test context factories
 *
 * Wires the orchestrator against the in-process remindctl stand-in, with an
 * optional queue in a temporary directory.
 */

import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import type { HealthProbe, HealthReport } from '../../src/core/health-monitor.js';
import {
  MutationOrchestrator,
  type OrchestratorOptions,
} from '../../src/core/mutation-orchestrator.js';
import { SessionContext } from '../../src/core/session-context.js';
import { ReferenceResolver } from '../../src/integrations/reference-resolver.js';
import { PendingActionQueue } from '../../src/queue/pending-action-queue.js';
import type { OperationError, OperationResult } from '../../src/types/errors.js';
import type { ToolContext } from '../../src/tools/types.js';
import { FakeRemindctl, type FakeSeed } from './fake-remindctl.js';

/**
 * Health probe that reflects the fake's availability on every call
 */
export class FakeHealth implements HealthProbe {
  constructor(private readonly fake: FakeRemindctl) {}

  async check(): Promise<HealthReport> {
    const available = this.fake.available && this.fake.authorized;
    let status = 'unavailable';
    if (this.fake.available) {
      status = this.fake.authorized ? 'authorized' : 'denied';
    }
    return {
      available,
      authorized: available,
      status,
      checkedAt: '2026-01-01T00:00:00.000Z',
      failure: this.fake.available
        ? undefined
        : { kind: 'binary_unavailable', command: 'status', detail: 'spawn remindctl ENOENT' },
    };
  }

  async isAvailable(): Promise<boolean> {
    const report = await this.check();
    return report.available;
  }
}

export const DEFAULT_TEST_OPTIONS: OrchestratorOptions = {
  deleteAllowMissing: true,
  autoRouteLists: true,
  authRequired: false,
};

export interface TestContext extends ToolContext {
  fake: FakeRemindctl;
  cleanup(): Promise<void>;
}

export interface TestContextOptions {
  seed?: FakeSeed;
  withQueue?: boolean;
  workspace?: string;
  options?: Partial<OrchestratorOptions>;
}

export async function createTempDir(prefix = 'remindctl-mcp-test-'): Promise<string> {
  return mkdtemp(join(tmpdir(), prefix));
}

export async function createTestContext(options: TestContextOptions = {}): Promise<TestContext> {
  const fake = new FakeRemindctl(options.seed);
  const queueDir = options.withQueue ? await createTempDir() : null;
  const queue = queueDir
    ? new PendingActionQueue({ queueDir, workspace: options.workspace ?? 'test' })
    : null;

  const orchestrator = new MutationOrchestrator({
    runner: fake,
    resolver: new ReferenceResolver(fake),
    health: new FakeHealth(fake),
    queue,
    options: { ...DEFAULT_TEST_OPTIONS, ...options.options },
  });

  return {
    fake,
    orchestrator,
    queue,
    session: new SessionContext('test-session'),
    cleanup: async () => {
      if (queueDir) {
        await rm(queueDir, { recursive: true, force: true });
      }
    },
  };
}

/**
 * Parse the JSON text of a tool response
 */
export function parseToolText(response: {
  content: Array<{ type: 'text'; text: string }>;
}): unknown {
  return JSON.parse(response.content[0].text);
}

/**
 * Unwrap a successful result, failing the test otherwise
 */
export function expectOk<T>(result: OperationResult<T>): T {
  if (!result.ok) {
    throw new Error(`expected success, got ${result.error.kind}: ${result.error.message}`);
  }
  return result.data;
}

/**
 * Unwrap a failed result, failing the test otherwise
 */
export function expectFailure<T>(result: OperationResult<T>): OperationError {
  if (result.ok) {
    throw new Error('expected failure, got success');
  }
  return result.error;
}
