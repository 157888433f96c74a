import type { ScenarioResult, StepResult } from '../../scenarios/runner.js'
import { t } from '../theme.js'

function formatStep(step: StepResult): string {
  const mark = step.passed ? t.green('✓') : t.red('✕')
  const verb = step.actual === 'returns' ? t.muted('returned') : t.muted('raised')
  return `    ${mark} ${t.text(step.label)}  ${verb} ${t.white(step.detail)}`
}

/**
 * formatScenarioReport: one block per scenario, then a summary line.
 *
 *   ● apple-visibility  Private weight behind protected accessors
 *     ✓ subclass method reads the weight  returned 2
 */
export function formatScenarioReport(results: ReadonlyArray<ScenarioResult>): string {
  let out = '\n'
  for (const result of results) {
    const dot = result.passed ? t.green('●') : t.red('●')
    out += `  ${dot} ${t.blue(result.id)}  ${t.muted(result.title)}\n`
    for (const step of result.steps) {
      out += formatStep(step) + '\n'
    }
    out += '\n'
  }
  const passed = results.filter((r) => r.passed).length
  const summary = `${passed}/${results.length} scenarios behaved as expected`
  out += '  ' + (passed === results.length ? t.green(summary) : t.red(summary)) + '\n'
  return out
}
