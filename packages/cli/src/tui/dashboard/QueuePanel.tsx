import React from 'react'
import { Box, Text } from 'ink'
import { Panel } from './Panel.js'
import { hex } from '../theme.js'
import { formatDuration } from '../output/status.js'
import type { QueueSummary } from '../services/index.js'

interface QueuePanelProps {
  summary: QueueSummary
  isFocused: boolean
}

function Row({ label, children }: { label: string; children: React.ReactNode }): React.ReactElement {
  return (
    <Box justifyContent="space-between">
      <Text color={hex.muted}>{label}</Text>
      {children}
    </Box>
  )
}

/**
 * QueuePanel — administrator, timing policy and counters.
 */
export function QueuePanel({ summary, isFocused }: QueuePanelProps): React.ReactElement {
  return (
    <Panel label="Queue" meta={summary.avatar} isFocused={isFocused}>
      <Row label="administrator">
        <Text color={hex.text}>{summary.administrator}</Text>
      </Row>
      <Row label="target">
        <Text color={hex.text}>{summary.target}</Text>
      </Row>
      <Row label="cooldown">
        <Text color={hex.text}>{formatDuration(summary.cooldown)}</Text>
      </Row>
      <Row label="expiration">
        <Text color={summary.expiration === 0 ? hex.muted : hex.text}>
          {summary.expiration === 0 ? 'never' : formatDuration(summary.expiration)}
        </Text>
      </Row>
      <Row label="approved">
        <Text color={hex.blue}>{String(summary.approved)}</Text>
      </Row>
      <Row label="salt">
        <Text color={hex.text}>{String(summary.salt)}</Text>
      </Row>
    </Panel>
  )
}
