/**
 * Classguard Core: Decision Logger
 *
 * Forwards access decision entries to an injected LogSink.
 *
 * Every Deny is recorded. Allow entries are recorded only when the engine
 * is configured with `logPermits`; permitted reads sit on the hot path of
 * every attribute access. The choice is made by the access gate, not here.
 *
 * Without a sink (the default, and the usual case in tests) record() is a
 * no-op.
 */

import type { AccessDecisionLog } from '../types/decision.js';
import type { LogSink } from './log-sink.js';

export class DecisionLogger {
  constructor(private readonly sink?: LogSink) {}

  /** True when entries go somewhere. Lets callers skip building them. */
  get enabled(): boolean {
    return this.sink !== undefined;
  }

  record(entry: AccessDecisionLog): void {
    this.sink?.append(entry);
  }
}
