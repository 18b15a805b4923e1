import React from 'react'
import { Box, Text } from 'ink'
import { Panel } from './Panel.js'
import { hex } from '../theme.js'

interface ProposerPanelProps {
  proposers: string[]
  isFocused: boolean
}

export function ProposerPanel({ proposers, isFocused }: ProposerPanelProps): React.ReactElement {
  return (
    <Panel label="Proposers" meta={`${proposers.length} registered`} isFocused={isFocused}>
      {proposers.length === 0 && <Text color={hex.dim}>(none)</Text>}
      {proposers.map((p) => (
        <Box key={p} gap={1}>
          <Text color={hex.green}>●</Text>
          <Text color={hex.text}>{p}</Text>
        </Box>
      ))}
    </Panel>
  )
}
