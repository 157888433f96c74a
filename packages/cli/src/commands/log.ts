/**
 * classguard log: Query the decision log
 *
 * Reads <home>/logs/decisions.jsonl (deduplicated on read) and prints the
 * most recent entries, optionally filtered by outcome.
 *
 * Only denials are logged unless the engine ran with logPermits.
 */

import { Command, InvalidArgumentError } from 'commander';
import React from 'react';
import { render } from 'ink';
import { DecisionOutcome } from '@classguard/core';
import type { DecisionEvent } from '@classguard/runtime-host';
import { DECISIONS_LOG, FileStateIO, readLog, resolveClassguardHome } from '@classguard/runtime-host';
import { DecisionLogPanel } from '../tui/dashboard/DecisionLogPanel.js';
import { formatDecisionList } from '../tui/output/decisions.js';
import { t } from '../tui/theme.js';

export interface LogQuery {
  readonly outcome?: DecisionOutcome | undefined;
  readonly limit: number;
}

interface LogOptions extends LogQuery {
  readonly json?: boolean;
  readonly panel?: boolean;
  readonly home?: string;
}

export const DEFAULT_LIMIT = 100;

export function parseOutcome(value: string): DecisionOutcome {
  const outcome = Object.values(DecisionOutcome).find((o) => o === value);
  if (outcome === undefined) {
    throw new InvalidArgumentError('Expected Allow or Deny.');
  }
  return outcome;
}

export function parseLimit(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return n;
}

/** Entries matching the outcome filter, the most recent `limit` of them, oldest first. */
export function selectEvents(events: ReadonlyArray<DecisionEvent>, query: LogQuery): DecisionEvent[] {
  const matching = query.outcome === undefined ? [...events] : events.filter((e) => e.outcome === query.outcome);
  return matching.slice(-query.limit);
}

function renderPanel(events: ReadonlyArray<DecisionEvent>): void {
  const instance = render(React.createElement(DecisionLogPanel, { events, isFocused: true }));
  instance.unmount();
}

export const logCommand = new Command('log')
  .description('Query the decision log')
  .option('--outcome <outcome>', 'Filter by outcome (Allow|Deny)', parseOutcome)
  .option('--limit <n>', 'Maximum number of entries to return', parseLimit, DEFAULT_LIMIT)
  .option('--json', 'Output as JSON')
  .option('--panel', 'Render as a bordered panel')
  .option('--home <dir>', 'classguard home directory (default: $CLASSGUARD_HOME or ~/.classguard)')
  .action((options: LogOptions) => {
    const home = resolveClassguardHome({ home: options.home });
    const { events, stats } = readLog(new FileStateIO(home).readLogRaw(DECISIONS_LOG));
    const selected = selectEvents(events, options);

    if (options.json === true) {
      process.stdout.write(JSON.stringify(selected, null, 2) + '\n');
      return;
    }
    if (options.panel === true) {
      renderPanel(selected);
    } else {
      process.stdout.write(formatDecisionList(selected));
    }

    if (stats.parseErrors > 0 || stats.partialTrailingLine) {
      const skipped = stats.parseErrors + (stats.partialTrailingLine ? 1 : 0);
      process.stderr.write(t.amber(`  ${skipped} malformed line(s) skipped`) + '\n');
    }
  });
