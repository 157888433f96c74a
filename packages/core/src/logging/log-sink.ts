/**
 * Classguard Core: Log Sink Interface
 *
 * The injection point for decision log persistence.
 *
 * Core owns the contract; concrete sinks live in the runtime host package
 * and are handed to configureEngine(). The engine itself never writes to
 * disk.
 */

import type { AccessDecisionLog } from '../types/decision.js';

/**
 * Receives access decision entries.
 *
 * append() is called synchronously on the attribute access path, before
 * the operation completes or its AccessDeniedError is thrown. A sink that
 * throws aborts the operation with the sink's error.
 */
export interface LogSink {
  append(entry: AccessDecisionLog): void;
}
