/**
 * @classguard/runtime-host
 *
 * Side-effectful implementations behind the interfaces @classguard/core
 * defines: the file-backed decision log sink, its reader, state I/O, and
 * home directory resolution. Core never imports this package.
 */

// State I/O
export type { StateIO } from './state/state-io.js';
export { FileStateIO, MemoryStateIO } from './state/state-io.js';

// Logging
export { DECISIONS_LOG, FileLogSink } from './logging/file-log-sink.js';
export type { DecisionEvent, LogReadResult, LogReadStats } from './logging/log-reader.js';
export { parseDecisionLine, readLog } from './logging/log-reader.js';
export type { UlidSources } from './logging/ulid.js';
export { createUlidGenerator, ulid } from './logging/ulid.js';

// Home directory
export type { ResolveClassguardHomeOptions } from './home.js';
export { HOME_ENV_VAR, ensureClassguardHome, resolveClassguardHome } from './home.js';
