import React from 'react'
import { Box, Text } from 'ink'
import { Panel } from './Panel.js'
import { hex } from '../theme.js'
import type { EventSummary } from '../services/index.js'

interface EventLogPanelProps {
  events: EventSummary[]
  isFocused: boolean
}

const EVENT_HEX: Record<string, string> = {
  TransactionExecuted:  hex.green,
  TransactionsVetoed:   hex.red,
  ExpiredSkipped:       hex.red,
  TransactionsApproved: hex.blue,
}

/**
 * EventLogPanel — last N queue events, full width.
 */
export function EventLogPanel({ events, isFocused }: EventLogPanelProps): React.ReactElement {
  return (
    <Panel label="Event Log" meta={`last ${events.length}`} isFocused={isFocused}>
      {events.map((event) => (
        <Box key={event.eventId} gap={2}>
          <Text color={hex.dim}>{event.timestamp}</Text>
          <Text color={EVENT_HEX[event.type] ?? hex.text}>{event.type}</Text>
          <Box flexGrow={1}><Text color={hex.muted}>{event.detail}</Text></Box>
        </Box>
      ))}
    </Panel>
  )
}
