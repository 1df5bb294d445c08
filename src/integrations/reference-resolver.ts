/**
 * Reference Resolver
 *
 * Maps a caller-supplied reference (full id, id prefix or display name) to
 * exactly one canonical id. Every listing is fetched fresh; list order is
 * never used to choose between candidates.
 */

import {
  ambiguous,
  fromRunnerFailure,
  invalidInput,
  notFound,
  type OperationError,
  type RunnerFailure,
} from '../types/errors.js';
import type { Reminder, ReminderList } from '../types/models.js';
import { resolverLogger } from '../utils/logger.js';
import type { RemindctlExecutor, RunResult } from './remindctl-runner.js';

export interface ReferenceEntry {
  id: string;
  name: string;
}

export type MatchKind = 'id' | 'prefix' | 'name';

export type Resolution =
  | { kind: 'unique'; id: string; name: string; matchedBy: MatchKind }
  | { kind: 'ambiguous'; reference: string; candidates: string[] }
  | { kind: 'not_found'; reference: string }
  | { kind: 'invalid'; reference: string; message: string };

export type UpstreamResolution = { kind: 'upstream'; failure: RunnerFailure };

export type ResolveOutcome = Resolution | UpstreamResolution;

export interface ResolvedReference {
  reference: string;
  resolution: Resolution;
}

export type BatchResolveOutcome =
  | { kind: 'resolved'; results: ResolvedReference[] }
  | UpstreamResolution;

/**
 * Shortest reference treated as an id prefix
 */
export const MIN_PREFIX_LENGTH = 4;

const DIGITS_ONLY = /^[0-9]+$/;

function sortedIds(entries: ReferenceEntry[]): string[] {
  return entries.map((entry) => entry.id).sort();
}

function fromMatches(
  reference: string,
  matches: ReferenceEntry[],
  matchedBy: MatchKind
): Resolution | null {
  if (matches.length === 0) {
    return null;
  }
  if (matches.length === 1) {
    const [match] = matches;
    return { kind: 'unique', id: match.id, name: match.name, matchedBy };
  }
  return { kind: 'ambiguous', reference, candidates: sortedIds(matches) };
}

/**
 * Resolve one reference against a listing
 */
export function resolveReference(entries: ReferenceEntry[], reference: string): Resolution {
  if (reference.length === 0) {
    return { kind: 'invalid', reference, message: 'reference cannot be empty' };
  }
  if (DIGITS_ONLY.test(reference)) {
    return {
      kind: 'invalid',
      reference,
      message: `reference '${reference}' looks like a position; provide an id, id prefix or name`,
    };
  }

  const exact = entries.find((entry) => entry.id === reference);
  if (exact) {
    return { kind: 'unique', id: exact.id, name: exact.name, matchedBy: 'id' };
  }

  if (reference.length >= MIN_PREFIX_LENGTH) {
    const lowered = reference.toLowerCase();
    const byPrefix = fromMatches(
      reference,
      entries.filter((entry) => entry.id.toLowerCase().startsWith(lowered)),
      'prefix'
    );
    if (byPrefix) {
      return byPrefix;
    }
  }

  const byName =
    fromMatches(
      reference,
      entries.filter((entry) => entry.name === reference),
      'name'
    ) ??
    fromMatches(
      reference,
      entries.filter((entry) => entry.name.toLowerCase() === reference.toLowerCase()),
      'name'
    );

  if (byName) {
    return byName;
  }
  if (reference.length < MIN_PREFIX_LENGTH) {
    return {
      kind: 'invalid',
      reference,
      message: `reference '${reference}' is too short, use at least ${MIN_PREFIX_LENGTH} characters`,
    };
  }
  return { kind: 'not_found', reference };
}

/**
 * Convert a non-unique outcome into the caller-facing error
 */
export function resolutionError(
  outcome: Exclude<ResolveOutcome, { kind: 'unique' }>
): OperationError {
  switch (outcome.kind) {
    case 'ambiguous':
      return ambiguous(outcome.reference, outcome.candidates);
    case 'not_found':
      return notFound(outcome.reference);
    case 'invalid':
      return { ...invalidInput(outcome.message), reference: outcome.reference };
    case 'upstream':
      return fromRunnerFailure(outcome.failure);
  }
}

export function reminderEntry(reminder: Reminder): ReferenceEntry {
  return { id: reminder.id, name: reminder.title };
}

export function listEntry(list: ReminderList): ReferenceEntry {
  return { id: list.id, name: list.title };
}

/**
 * Resolves references through fresh remindctl listings
 */
export class ReferenceResolver {
  constructor(private readonly runner: RemindctlExecutor) {}

  fetchReminders(): Promise<RunResult<Reminder[]>> {
    return this.runner.execute({ op: 'show', filter: 'all' });
  }

  fetchLists(): Promise<RunResult<ReminderList[]>> {
    return this.runner.execute({ op: 'lists' });
  }

  async resolveReminder(reference: string): Promise<ResolveOutcome> {
    const outcome = await this.resolveReminders([reference]);
    if (outcome.kind === 'upstream') {
      return outcome;
    }
    return outcome.results[0].resolution;
  }

  /**
   * Resolve several reminder references against a single listing
   */
  async resolveReminders(references: string[]): Promise<BatchResolveOutcome> {
    const listing = await this.fetchReminders();
    if (!listing.ok) {
      return { kind: 'upstream', failure: listing.failure };
    }

    const entries = listing.payload.map(reminderEntry);
    const results = references.map((reference) => ({
      reference,
      resolution: resolveReference(entries, reference),
    }));
    this.logOutcomes('reminder', results);
    return { kind: 'resolved', results };
  }

  async resolveList(reference: string): Promise<ResolveOutcome> {
    const listing = await this.fetchLists();
    if (!listing.ok) {
      return { kind: 'upstream', failure: listing.failure };
    }

    const resolution = resolveReference(listing.payload.map(listEntry), reference);
    this.logOutcomes('list', [{ reference, resolution }]);
    return resolution;
  }

  private logOutcomes(target: 'reminder' | 'list', results: ResolvedReference[]): void {
    for (const { resolution } of results) {
      resolverLogger.debug(
        {
          target,
          outcome: resolution.kind,
          matchedBy: resolution.kind === 'unique' ? resolution.matchedBy : undefined,
          candidates: resolution.kind === 'ambiguous' ? resolution.candidates.length : undefined,
        },
        'Reference resolved'
      );
    }
  }
}
