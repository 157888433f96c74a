/**
 * Classguard Core: Engine Configuration
 *
 * Process-wide settings read by the access gate on each decision.
 *
 *   configureEngine({ logSink: new FileLogSink(stateIO) });
 *   configureEngine({ logPermits: true });
 *   resetEngineConfig();
 *
 * configureEngine() merges: options left out keep their current value.
 * Passing `logSink: undefined` explicitly detaches the sink.
 */

import { DecisionLogger } from '../logging/decision-log.js';
import type { LogSink } from '../logging/log-sink.js';

export interface EngineOptions {
  readonly logSink?: LogSink | undefined;
  /** Record Allow decisions too. Off by default. */
  readonly logPermits?: boolean;
  /** Timestamp source for log entries. Defaults to the current ISO time. */
  readonly clock?: () => string;
}

export interface EngineConfig {
  readonly logger: DecisionLogger;
  readonly logPermits: boolean;
  readonly clock: () => string;
}

function defaults(): EngineConfig {
  return {
    logger: new DecisionLogger(),
    logPermits: false,
    clock: () => new Date().toISOString(),
  };
}

let current: EngineConfig = defaults();

export function configureEngine(options: EngineOptions): EngineConfig {
  current = {
    logger: 'logSink' in options ? new DecisionLogger(options.logSink) : current.logger,
    logPermits: options.logPermits ?? current.logPermits,
    clock: options.clock ?? current.clock,
  };
  return current;
}

export function getEngineConfig(): EngineConfig {
  return current;
}

/** Restore the defaults: no sink, permits unlogged, wall-clock timestamps. */
export function resetEngineConfig(): void {
  current = defaults();
}
