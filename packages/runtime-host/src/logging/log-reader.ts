/**
 * Classguard Runtime Host: LogReader
 *
 * Reads the JSONL decision log with dedupe-on-read. Pure: callers obtain
 * the raw text through StateIO.readLogRaw().
 *
 * Guarantees:
 * - every well-formed decision line is returned; other lines are counted
 *   in `parseErrors` and dropped
 * - events are deduplicated by event_id, first seen wins
 * - content not ending in '\n' has its last (partial) line dropped and
 *   flagged
 * - more than one timestamp regression in file order sets `outOfOrder`
 * - output is sorted by timestamp, then event_id
 */

import type { AccessDecisionLog, AccessOperation, AccessView, DenyRule } from '@classguard/core';
import { DecisionOutcome } from '@classguard/core';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** One line of decisions.jsonl. */
export interface DecisionEvent extends AccessDecisionLog {
  /** 26-character ULID; the deduplication key. */
  readonly event_id: string;
}

export interface LogReadStats {
  /** Non-empty lines processed, partial trailing line excluded. */
  readonly totalLines: number;
  /** Events returned, after deduplication. */
  readonly parsedEvents: number;
  readonly duplicates: number;
  /** Lines that were not JSON, or not a decision entry. */
  readonly parseErrors: number;
  readonly partialTrailingLine: boolean;
  /** A single regression is tolerated as clock skew. */
  readonly outOfOrder: boolean;
}

export interface LogReadResult {
  readonly events: ReadonlyArray<DecisionEvent>;
  readonly stats: LogReadStats;
}

// ---------------------------------------------------------------------------
// Line Parsing
// ---------------------------------------------------------------------------

const OPERATIONS: ReadonlySet<string> = new Set<AccessOperation>(['read', 'write', 'delete']);
const VIEWS: ReadonlySet<string> = new Set<AccessView>(['instance', 'class']);
const RULES: ReadonlySet<string> = new Set<DenyRule>([
  'private',
  'protected',
  'constant',
  'method',
  'undeclared',
  'scope',
]);

function isStringOrNull(value: unknown): value is string | null {
  return value === null || typeof value === 'string';
}

function isOneOf<T extends string>(value: unknown, allowed: ReadonlySet<string>): value is T {
  return typeof value === 'string' && allowed.has(value);
}

function isOutcome(value: unknown): value is DecisionOutcome {
  return value === DecisionOutcome.Allow || value === DecisionOutcome.Deny;
}

/** Parse one JSONL line into a decision event, or null if it is not one. */
export function parseDecisionLine(line: string): DecisionEvent | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch (err: unknown) {
    if (err instanceof SyntaxError) {
      return null;
    }
    throw err;
  }
  if (typeof parsed !== 'object' || parsed === null) {
    return null;
  }
  const r: Record<string, unknown> = { ...parsed };
  const { event_id, class_id, class_name, member, declaring_class_id, operation, view, context, outcome, rule, timestamp } = r;

  if (
    typeof event_id !== 'string' ||
    typeof class_id !== 'string' ||
    typeof class_name !== 'string' ||
    typeof member !== 'string' ||
    typeof timestamp !== 'string' ||
    !isStringOrNull(declaring_class_id) ||
    !isStringOrNull(context) ||
    !isOneOf<AccessOperation>(operation, OPERATIONS) ||
    !isOneOf<AccessView>(view, VIEWS) ||
    !isOutcome(outcome) ||
    !(rule === null || isOneOf<DenyRule>(rule, RULES))
  ) {
    return null;
  }

  return {
    event_id,
    class_id,
    class_name,
    member,
    declaring_class_id,
    operation,
    view,
    context,
    outcome,
    rule,
    timestamp,
  };
}

// ---------------------------------------------------------------------------
// Reader
// ---------------------------------------------------------------------------

/**
 * Parse, deduplicate and sort the raw text of a decision log.
 */
export function readLog(rawContent: string): LogReadResult {
  const partialTrailingLine = rawContent.length > 0 && !rawContent.endsWith('\n');
  const rawLines = rawContent.split('\n');
  // Either the partial line or the empty string after the final '\n'.
  rawLines.pop();
  const lines = rawLines.filter((l) => l.length > 0);

  let duplicates = 0;
  let parseErrors = 0;
  const seen = new Set<string>();
  const inFileOrder: DecisionEvent[] = [];

  for (const line of lines) {
    const event = parseDecisionLine(line);
    if (event === null) {
      parseErrors++;
      continue;
    }
    if (seen.has(event.event_id)) {
      duplicates++;
      continue;
    }
    seen.add(event.event_id);
    inFileOrder.push(event);
  }

  let regressions = 0;
  inFileOrder.forEach((event, i) => {
    const previous = inFileOrder[i - 1];
    if (previous !== undefined && event.timestamp < previous.timestamp) {
      regressions++;
    }
  });

  const events = [...inFileOrder].sort(
    (a, b) => compare(a.timestamp, b.timestamp) || compare(a.event_id, b.event_id),
  );

  return {
    events,
    stats: {
      totalLines: lines.length,
      parsedEvents: events.length,
      duplicates,
      parseErrors,
      partialTrailingLine,
      outOfOrder: regressions > 1,
    },
  };
}

function compare(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
