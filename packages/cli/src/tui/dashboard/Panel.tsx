import React from 'react'
import { Box, Text } from 'ink'
import { hex } from '../theme.js'

interface PanelProps {
  label: string
  meta?: string
  isFocused: boolean
  flexGrow?: number
  children: React.ReactNode
}

/**
 * Panel: bordered panel with an uppercase label row and optional
 * right-aligned meta text.
 */
export function Panel({ label, meta, isFocused, flexGrow = 1, children }: PanelProps): React.ReactElement {
  const borderColor = isFocused ? hex.blue : hex.border

  return (
    <Box
      flexGrow={flexGrow}
      flexDirection="column"
      borderStyle="single"
      borderColor={borderColor}
      paddingX={1}
    >
      <Box justifyContent="space-between">
        <Text color={hex.blue} dimColor={!isFocused}>
          {label.toUpperCase()}
        </Text>
        {meta !== undefined && (
          <Text color={hex.muted}>{meta}</Text>
        )}
      </Box>

      {children}
    </Box>
  )
}
