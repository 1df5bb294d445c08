/**
 * remindctl Runner
 *
 * Spawns one remindctl process per call via execFile, bounded by a read or
 * write timeout, and classifies the outcome. Payloads are validated with the
 * per-command zod schema before they leave this module.
 */

import { execFile, type ExecFileException } from 'child_process';
import type { RunnerFailure } from '../types/errors.js';
import { runnerLogger } from '../utils/logger.js';
import {
  PAYLOAD_SCHEMAS,
  buildArgs,
  isReadCommand,
  producesOutput,
  type CommandOp,
  type CommandPayloads,
  type RemindctlCommand,
} from './remindctl-commands.js';

export type RunResult<T> = { ok: true; payload: T } | { ok: false; failure: RunnerFailure };

/**
 * Anything that can execute remindctl commands
 */
export interface RemindctlExecutor {
  execute<C extends RemindctlCommand>(command: C): Promise<RunResult<CommandPayloads[C['op']]>>;
}

export interface RemindctlRunnerOptions {
  binary: string;
  readTimeoutMs: number;
  writeTimeoutMs: number;
  maxBufferBytes?: number;
}

const STDERR_EXCERPT_LIMIT = 500;
const PARSE_DETAIL_LIMIT = 300;
const DEFAULT_MAX_BUFFER = 16 * 1024 * 1024;

interface ProcessOutput {
  error: ExecFileException | null;
  stdout: string;
  stderr: string;
}

function truncate(value: string, limit: number): string {
  const chars = [...value];
  return chars.length > limit ? chars.slice(0, limit).join('') : value;
}

/**
 * Environment handed to the child: PATH, and HOME when set
 */
export function scrubbedEnv(source: NodeJS.ProcessEnv = process.env): NodeJS.ProcessEnv {
  const env: NodeJS.ProcessEnv = { PATH: source.PATH ?? '' };
  if (source.HOME) {
    env.HOME = source.HOME;
  }
  return env;
}

/**
 * Validate raw command output against the command's payload schema
 */
export function parsePayload<K extends CommandOp>(
  op: K,
  raw: unknown
): RunResult<CommandPayloads[K]> {
  const schema = PAYLOAD_SCHEMAS[op];
  const parsed = schema.safeParse(raw);
  if (parsed.success) {
    return { ok: true, payload: parsed.data };
  }

  const detail = parsed.error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
  return {
    ok: false,
    failure: {
      kind: 'parse_error',
      command: op,
      detail: truncate(detail, PARSE_DETAIL_LIMIT),
    },
  };
}

/**
 * Parse stdout as a single JSON document and validate it
 */
export function parseOutput<K extends CommandOp>(
  op: K,
  stdout: string
): RunResult<CommandPayloads[K]> {
  if (!producesOutput(op)) {
    return parsePayload(op, null);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(stdout);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return {
      ok: false,
      failure: {
        kind: 'parse_error',
        command: op,
        detail: truncate(`invalid JSON: ${message}`, PARSE_DETAIL_LIMIT),
      },
    };
  }
  return parsePayload(op, raw);
}

/**
 * Classify a failed execFile call
 */
export function classifyProcessError(
  command: string,
  error: ExecFileException,
  stderr: string,
  timeoutMs: number
): RunnerFailure {
  const code = error.code;

  if (code === 'ENOENT' || code === 'EACCES') {
    return { kind: 'binary_unavailable', command, detail: error.message };
  }
  if (code === 'ERR_CHILD_PROCESS_STDIO_MAXBUFFER') {
    return {
      kind: 'process_error',
      command,
      exitCode: null,
      stderr: 'output exceeded buffer limit',
    };
  }
  if (error.killed) {
    return { kind: 'timeout', command, timeoutMs };
  }

  return {
    kind: 'process_error',
    command,
    exitCode: typeof code === 'number' ? code : null,
    stderr: truncate(stderr.trim(), STDERR_EXCERPT_LIMIT),
  };
}

/**
 * remindctl Runner
 */
export class RemindctlRunner implements RemindctlExecutor {
  private readonly binary: string;
  private readonly readTimeoutMs: number;
  private readonly writeTimeoutMs: number;
  private readonly maxBufferBytes: number;

  constructor(options: RemindctlRunnerOptions) {
    this.binary = options.binary;
    this.readTimeoutMs = options.readTimeoutMs;
    this.writeTimeoutMs = options.writeTimeoutMs;
    this.maxBufferBytes = options.maxBufferBytes ?? DEFAULT_MAX_BUFFER;
  }

  getTimeouts(): { readTimeoutMs: number; writeTimeoutMs: number } {
    return { readTimeoutMs: this.readTimeoutMs, writeTimeoutMs: this.writeTimeoutMs };
  }

  async execute<C extends RemindctlCommand>(
    command: C
  ): Promise<RunResult<CommandPayloads[C['op']]>> {
    const label = command.op;
    const built = buildArgs(command);
    if (!built.ok) {
      runnerLogger.debug(
        { command: label, outcome: 'invalid_input', field: built.field },
        'Rejected before spawn'
      );
      return {
        ok: false,
        failure: {
          kind: 'invalid_input',
          command: label,
          field: built.field,
          message: built.message,
        },
      };
    }

    const timeoutMs = isReadCommand(command.op) ? this.readTimeoutMs : this.writeTimeoutMs;
    const startedAt = Date.now();
    const output = await this.spawn(built.args, timeoutMs);
    const durationMs = Date.now() - startedAt;

    const result: RunResult<CommandPayloads[C['op']]> = output.error
      ? { ok: false, failure: classifyProcessError(label, output.error, output.stderr, timeoutMs) }
      : parseOutput<C['op']>(command.op, output.stdout);

    if (result.ok) {
      runnerLogger.debug({ command: label, durationMs, outcome: 'ok' }, 'remindctl finished');
    } else {
      runnerLogger.warn(
        { command: label, durationMs, outcome: result.failure.kind },
        'remindctl failed'
      );
    }
    return result;
  }

  /**
   * Check that remindctl can be executed at all
   */
  async preflight(): Promise<RunResult<CommandPayloads['status']>> {
    return this.execute({ op: 'status' });
  }

  private spawn(args: string[], timeoutMs: number): Promise<ProcessOutput> {
    return new Promise((resolve) => {
      const child = execFile(
        this.binary,
        args,
        {
          encoding: 'utf8',
          timeout: timeoutMs,
          killSignal: 'SIGKILL',
          maxBuffer: this.maxBufferBytes,
          env: scrubbedEnv(),
          windowsHide: true,
        },
        (error, stdout, stderr) => {
          resolve({ error, stdout, stderr });
        }
      );
      child.stdin?.end();
    });
  }
}
