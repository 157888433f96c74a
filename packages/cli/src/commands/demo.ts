/**
 * classguard demo: Run the reference scenarios
 *
 * Usage:
 *   classguard demo [--json] [--home <dir>]
 *
 * Runs each reference scenario against the engine with decisions logged to
 * <home>/logs/decisions.jsonl, and prints what every step returned or
 * raised. Exits 1 if any step did not behave as expected.
 */

import { Command } from 'commander';
import type { LogSink } from '@classguard/core';
import { configureEngine, resetEngineConfig } from '@classguard/core';
import { FileLogSink, FileStateIO, ensureClassguardHome } from '@classguard/runtime-host';
import { buildReferenceScenarios } from '../scenarios/reference.js';
import type { Scenario, ScenarioResult } from '../scenarios/runner.js';
import { runScenarios } from '../scenarios/runner.js';
import { formatScenarioReport } from '../tui/output/scenarios.js';

interface DemoOptions {
  readonly json?: boolean;
  readonly home?: string;
}

/**
 * Build and run scenarios with `sink` attached to the engine. The engine
 * configuration is restored afterwards, also when building throws.
 */
export function runLogged(sink: LogSink, build: () => Scenario[]): ScenarioResult[] {
  configureEngine({ logSink: sink });
  try {
    return runScenarios(build());
  } finally {
    resetEngineConfig();
  }
}

export const demoCommand = new Command('demo')
  .description('Run the reference scenarios with file-backed decision logging')
  .option('--json', 'Output as JSON')
  .option('--home <dir>', 'classguard home directory (default: $CLASSGUARD_HOME or ~/.classguard)')
  .action((options: DemoOptions) => {
    const home = ensureClassguardHome({ home: options.home });
    const results = runLogged(new FileLogSink(new FileStateIO(home)), buildReferenceScenarios);

    if (options.json === true) {
      process.stdout.write(JSON.stringify(results, null, 2) + '\n');
    } else {
      process.stdout.write(formatScenarioReport(results));
    }

    if (!results.every((r) => r.passed)) {
      process.exitCode = 1;
    }
  });
