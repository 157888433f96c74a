/**
 * @classguard/cli
 *
 * The `classguard` command and the pieces it is built from.
 *
 * Usage:
 *   classguard --help
 *   classguard demo [--json] [--home <dir>]
 *   classguard log [--outcome Allow|Deny] [--limit <n>] [--json] [--panel] [--home <dir>]
 */

export { program } from './commands/index.js';
export { runLogged } from './commands/demo.js';
export type { LogQuery } from './commands/log.js';
export { DEFAULT_LIMIT, parseLimit, parseOutcome, selectEvents } from './commands/log.js';
export type { Scenario, ScenarioResult, ScenarioStep, StepOutcome, StepResult } from './scenarios/runner.js';
export { describeError, describeValue, runScenario, runScenarios } from './scenarios/runner.js';
export { buildReferenceScenarios } from './scenarios/reference.js';
export { formatDecisionLine, formatDecisionList } from './tui/output/decisions.js';
export { formatScenarioReport } from './tui/output/scenarios.js';
