/**
 * Classguard Runtime Host: File-backed Decision Log Sink
 *
 * Implements LogSink from @classguard/core by appending each access
 * decision as one JSONL line to `logs/decisions.jsonl` through the injected
 * StateIO. This is the only place that writes decision entries.
 *
 * Each line carries the entry's fields plus a fresh `event_id` (ULID), the
 * key readLog() deduplicates on.
 */

import type { AccessDecisionLog, LogSink } from '@classguard/core';
import type { StateIO } from '../state/state-io.js';
import { ulid } from './ulid.js';

export const DECISIONS_LOG = 'decisions.jsonl';

export class FileLogSink implements LogSink {
  constructor(
    private readonly stateIO: StateIO,
    private readonly nextId: () => string = ulid,
  ) {}

  append(entry: AccessDecisionLog): void {
    this.stateIO.appendLine(DECISIONS_LOG, JSON.stringify({ event_id: this.nextId(), ...entry }));
  }
}
