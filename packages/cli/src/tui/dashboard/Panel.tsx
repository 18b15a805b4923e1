import React from 'react'
import { Box, Text } from 'ink'
import type { EntryStatus } from '@holdback/kernel'
import { hex, panelTone } from '../theme.js'

interface PanelProps {
  label: string
  meta?: string
  /** Status of the entry at the cursor, shown after the meta text. */
  head?: EntryStatus
  isFocused: boolean
  flexGrow?: number
  children: React.ReactNode
}

/**
 * Panel — bordered dashboard section with a label row.
 */
export function Panel({ label, meta, head, isFocused, flexGrow = 1, children }: PanelProps): React.ReactElement {
  const tone = panelTone(isFocused, head)
  const right = [meta, head === undefined ? undefined : `head ${head}`]
    .filter((part): part is string => part !== undefined)
    .join(' · ')

  return (
    <Box flexGrow={flexGrow} flexDirection="column" borderStyle="round" borderColor={tone.border} paddingX={1}>
      <Box justifyContent="space-between" gap={2}>
        <Text color={hex.blue} bold={isFocused}>{label}</Text>
        {right !== '' && <Text color={tone.meta}>{right}</Text>}
      </Box>
      {children}
    </Box>
  )
}
