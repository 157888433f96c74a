import type { DecisionEvent } from '@classguard/runtime-host'
import { outcomeColor, t } from '../theme.js'

/**
 * Where the operation came from: `external`, or the class name part of
 * the context id (`Apple#3` → `Apple`).
 */
export function contextLabel(context: string | null): string {
  if (context === null) return 'external'
  const hash = context.lastIndexOf('#')
  return hash > 0 ? context.slice(0, hash) : context
}

/** `read Apple.weight`: the member as addressed, with `(class)` for the class view. */
export function describeAccess(event: DecisionEvent): string {
  const view = event.view === 'class' ? ' (class)' : ''
  return `${event.operation} ${event.class_name}.${event.member}${view}`
}

/**
 * formatDecisionLine: one decision per line.
 *
 * Format: timestamp  outcome  operation Class.member  rule  from context
 */
export function formatDecisionLine(event: DecisionEvent): string {
  const outcome = outcomeColor(event.outcome)(event.outcome.padEnd(5))
  const rule = event.rule === null ? '' : '  ' + t.amber(event.rule)
  return (
    t.dim(event.timestamp) + '  ' +
    outcome + '  ' +
    t.text(describeAccess(event)) +
    rule + '  ' +
    t.muted('from ' + contextLabel(event.context))
  )
}

export function formatDecisionList(events: ReadonlyArray<DecisionEvent>): string {
  if (events.length === 0) {
    return t.muted('  no decisions logged') + '\n'
  }
  return events.map((e) => '  ' + formatDecisionLine(e) + '\n').join('')
}
