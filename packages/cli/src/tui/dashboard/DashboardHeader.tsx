import React from 'react'
import { Box, Text } from 'ink'
import { hex } from '../theme.js'
import type { QueueSummary } from '../services/index.js'

interface DashboardHeaderProps {
  summary: QueueSummary
}

/**
 * DashboardHeader — full-width header row.
 *
 * ◈ HOLDBACK — treasury · cursor 4 / tail 7    q quit · tab navigate · r refresh
 */
export function DashboardHeader({ summary }: DashboardHeaderProps): React.ReactElement {
  return (
    <Box justifyContent="space-between" paddingX={1} borderStyle="single" borderColor="#222222">
      <Box gap={1}>
        <Text color={hex.blue} bold>◈ HOLDBACK</Text>
        <Text color="#2A2A2A">—</Text>
        <Text color={hex.muted}>{summary.name}</Text>
        <Text color="#2A2A2A">·</Text>
        <Text color={hex.muted}>
          {'cursor '}
          <Text color={hex.text}>{String(summary.cursor)}</Text>
          {' / tail '}
          <Text color={hex.text}>{String(summary.tail)}</Text>
        </Text>
      </Box>

      <Text color={hex.dim}>q quit · tab navigate · r refresh</Text>
    </Box>
  )
}
