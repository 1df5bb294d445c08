/**
 * Error type definitions
 *
 * Domain failures travel as values (OperationResult), not exceptions.
 * Only startup problems (bad configuration) are thrown.
 */

export enum ErrorKind {
  INVALID_INPUT = 'invalid_input',
  NOT_FOUND = 'not_found',
  AMBIGUOUS = 'ambiguous',
  UPSTREAM = 'upstream',
  UNAUTHORIZED = 'unauthorized',
}

export type UpstreamKind = 'timeout' | 'process_error' | 'parse_error' | 'binary_unavailable';

/**
 * Classified failure of a single remindctl invocation
 */
export type RunnerFailure =
  | { kind: 'invalid_input'; command: string; field: string; message: string }
  | { kind: 'timeout'; command: string; timeoutMs: number }
  | { kind: 'process_error'; command: string; exitCode: number | null; stderr: string }
  | { kind: 'parse_error'; command: string; detail: string }
  | { kind: 'binary_unavailable'; command: string; detail: string };

/**
 * Structured error returned by every tool call
 */
export interface OperationError {
  kind: ErrorKind;
  message: string;
  /** Reference that failed to resolve */
  reference?: string;
  /** Every matching canonical id, for ambiguous references */
  candidates?: string[];
  /** Offending input field, for invalid input */
  field?: string;
  upstream?: UpstreamKind;
  exitCode?: number | null;
}

export type OperationSuccess<T> = { ok: true; data: T };
export type OperationFailure = { ok: false; error: OperationError };
export type OperationResult<T> = OperationSuccess<T> | OperationFailure;

export function succeed<T>(data: T): OperationSuccess<T> {
  return { ok: true, data };
}

export function fail(error: OperationError): OperationFailure {
  return { ok: false, error };
}

export function invalidInput(message: string, field?: string): OperationError {
  return { kind: ErrorKind.INVALID_INPUT, message, field };
}

export function notFound(reference: string, message?: string): OperationError {
  return {
    kind: ErrorKind.NOT_FOUND,
    message: message ?? `reference '${reference}' not found`,
    reference,
  };
}

export function ambiguous(reference: string, candidates: string[]): OperationError {
  return {
    kind: ErrorKind.AMBIGUOUS,
    message: `reference '${reference}' is ambiguous, candidates: ${candidates.join(', ')}`,
    reference,
    candidates,
  };
}

export function unauthorized(message = 'missing or invalid bearer token'): OperationError {
  return { kind: ErrorKind.UNAUTHORIZED, message };
}

/**
 * Convert a runner failure into the error shape exposed to callers
 */
export function fromRunnerFailure(failure: RunnerFailure): OperationError {
  switch (failure.kind) {
    case 'invalid_input':
      return invalidInput(failure.message, failure.field);
    case 'timeout':
      return {
        kind: ErrorKind.UPSTREAM,
        upstream: 'timeout',
        message: `remindctl ${failure.command} timed out after ${failure.timeoutMs}ms`,
      };
    case 'process_error':
      return {
        kind: ErrorKind.UPSTREAM,
        upstream: 'process_error',
        exitCode: failure.exitCode,
        message: failure.stderr
          ? `remindctl ${failure.command} failed: ${failure.stderr}`
          : `remindctl ${failure.command} exited with code ${failure.exitCode ?? 'unknown'}`,
      };
    case 'parse_error':
      return {
        kind: ErrorKind.UPSTREAM,
        upstream: 'parse_error',
        message: `remindctl ${failure.command} returned unexpected output: ${failure.detail}`,
      };
    case 'binary_unavailable':
      return {
        kind: ErrorKind.UPSTREAM,
        upstream: 'binary_unavailable',
        message: `remindctl is unavailable: ${failure.detail}`,
      };
  }
}

/**
 * Invalid startup configuration
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';

    // Maintain proper prototype chain
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}
