import React from 'react'
import { Box, Text } from 'ink'
import { Panel } from './Panel.js'
import { hex, statusHex } from '../theme.js'
import { entryTiming } from '../output/status.js'
import type { EntrySummary } from '../services/index.js'

interface EntryPanelProps {
  entries: EntrySummary[]
  now: number
  isFocused: boolean
  flexGrow?: number
}

/**
 * EntryPanel — entries from the cursor to the tail.
 *
 * Format: slot | status colored | commitment prefix | timing dim
 */
export function EntryPanel({ entries, now, isFocused, flexGrow }: EntryPanelProps): React.ReactElement {
  return (
    <Panel
      label="Pending"
      meta={`${entries.length} entries`}
      head={entries[0]?.status}
      isFocused={isFocused}
      flexGrow={flexGrow}
    >
      {entries.length === 0 && <Text color={hex.dim}>(none)</Text>}
      {entries.map((entry) => (
        <Box key={entry.slot} gap={2}>
          <Text color={hex.text}>{String(entry.slot).padStart(4)}</Text>
          <Text color={statusHex(entry.status)}>{entry.status.padEnd(8)}</Text>
          <Box flexGrow={1}><Text color={hex.blueDim}>{entry.commitment.slice(0, 16)}</Text></Box>
          <Text color={hex.muted}>{entryTiming(entry, now)}</Text>
        </Box>
      ))}
    </Panel>
  )
}
