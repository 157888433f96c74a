/**
 * Scenario runner: executes scenario steps and records what each did.
 *
 * A step either returns a value or raises. The runner records which, and
 * whether that matches the step's expectation. Errors raised by a step are
 * the subject of the demo: they are recorded, never rethrown.
 */

import { ClassguardError } from '@classguard/core';

export type StepOutcome = 'returns' | 'raises';

export interface ScenarioStep {
  readonly label: string;
  readonly expect: StepOutcome;
  readonly run: () => unknown;
}

export interface Scenario {
  readonly id: string;
  readonly title: string;
  readonly steps: ReadonlyArray<ScenarioStep>;
}

export interface StepResult {
  readonly label: string;
  readonly expected: StepOutcome;
  readonly actual: StepOutcome;
  /** The returned value, or `<code or name>: <message>` of the error raised. */
  readonly detail: string;
  readonly passed: boolean;
}

export interface ScenarioResult {
  readonly id: string;
  readonly title: string;
  readonly steps: ReadonlyArray<StepResult>;
  readonly passed: boolean;
}

export function describeValue(value: unknown): string {
  if (typeof value === 'string') {
    return JSON.stringify(value);
  }
  return String(value);
}

export function describeError(err: unknown): string {
  if (err instanceof ClassguardError) {
    return `${err.code}: ${err.message}`;
  }
  if (err instanceof Error) {
    return `${err.name}: ${err.message}`;
  }
  return String(err);
}

function runStep(step: ScenarioStep): StepResult {
  let actual: StepOutcome;
  let detail: string;
  try {
    detail = describeValue(step.run());
    actual = 'returns';
  } catch (err: unknown) {
    detail = describeError(err);
    actual = 'raises';
  }
  return { label: step.label, expected: step.expect, actual, detail, passed: actual === step.expect };
}

/** Steps run in order; a step that misses its expectation does not stop the rest. */
export function runScenario(scenario: Scenario): ScenarioResult {
  const steps = scenario.steps.map(runStep);
  return {
    id: scenario.id,
    title: scenario.title,
    steps,
    passed: steps.every((s) => s.passed),
  };
}

export function runScenarios(scenarios: ReadonlyArray<Scenario>): ScenarioResult[] {
  return scenarios.map(runScenario);
}
