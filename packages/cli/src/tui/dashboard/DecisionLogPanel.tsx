import React from 'react'
import { Box, Text } from 'ink'
import { DecisionOutcome } from '@classguard/core'
import type { DecisionEvent } from '@classguard/runtime-host'
import { Panel } from './Panel.js'
import { contextLabel, describeAccess } from '../output/decisions.js'
import { hex } from '../theme.js'

interface DecisionLogPanelProps {
  events: ReadonlyArray<DecisionEvent>
  isFocused: boolean
}

function outcomeSymbol(outcome: DecisionEvent['outcome']): { sym: string; color: string } {
  switch (outcome) {
    case DecisionOutcome.Allow: return { sym: '✓ allow', color: hex.green }
    case DecisionOutcome.Deny:  return { sym: '✕ deny',  color: hex.red }
  }
}

/**
 * DecisionLogPanel: logged access decisions, one row each.
 *
 * Format: timestamp | outcome colored | access | rule | context dim
 */
export function DecisionLogPanel({ events, isFocused }: DecisionLogPanelProps): React.ReactElement {
  return (
    <Panel label="Decision Log" meta={`last ${events.length}`} isFocused={isFocused}>
      {events.map((event) => {
        const { sym, color } = outcomeSymbol(event.outcome)
        return (
          <Box key={event.event_id} gap={2}>
            <Text color={hex.dim}>{event.timestamp}</Text>
            <Text color={color}>{sym}</Text>
            <Box flexGrow={1}><Text color={hex.text}>{describeAccess(event)}</Text></Box>
            {event.rule !== null && <Text color={hex.muted}>{event.rule}</Text>}
            <Text color={hex.muted}>{contextLabel(event.context)}</Text>
          </Box>
        )
      })}
    </Panel>
  )
}
