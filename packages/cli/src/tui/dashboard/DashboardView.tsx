import React, { useReducer, useState, useEffect } from 'react'
import { Box, Text, useInput, useApp, useStdout } from 'ink'
import chalk from 'chalk'
import { hex } from '../theme.js'
import type { EventSummary, IQueueService, QueueSummary } from '../services/index.js'
import { DashboardHeader } from './DashboardHeader.js'
import { QueuePanel } from './QueuePanel.js'
import { ProposerPanel } from './ProposerPanel.js'
import { EntryPanel } from './EntryPanel.js'
import { EventLogPanel } from './EventLogPanel.js'

// ─── State ───────────────────────────────────────────────────────────────────

interface DashboardData {
  summary: QueueSummary
  events: EventSummary[]
}

type DashboardState =
  | { phase: 'loading' }
  | { phase: 'ready'; data: DashboardData }
  | { phase: 'error'; message: string }

type DashboardAction =
  | { type: 'LOADED'; data: DashboardData }
  | { type: 'ERROR'; message: string }
  | { type: 'RELOAD' }

function reducer(_prev: DashboardState, action: DashboardAction): DashboardState {
  switch (action.type) {
    case 'LOADED': return { phase: 'ready', data: action.data }
    case 'ERROR':  return { phase: 'error', message: action.message }
    case 'RELOAD': return { phase: 'loading' }
  }
}

const PANEL_COUNT = 4
const EVENT_LIMIT = 8

// ─── Component ───────────────────────────────────────────────────────────────

export interface DashboardViewProps {
  service: IQueueService
}

/**
 * DashboardView — full-screen Ink dashboard for `holdback dashboard`.
 *
 * Keyboard:
 *   q / Escape  → exit
 *   Tab         → next panel
 *   Shift+Tab   → previous panel
 *   r           → re-fetch all data
 */
export function DashboardView({ service }: DashboardViewProps): React.ReactElement {
  const { exit } = useApp()
  const [state, dispatch] = useReducer(reducer, { phase: 'loading' })
  const [activePanel, setActivePanel] = useState(0)
  const [refreshKey, setRefreshKey] = useState(0)
  const { stdout } = useStdout()

  useEffect(() => {
    let cancelled = false

    const load = async (): Promise<void> => {
      try {
        const [summary, events] = await Promise.all([
          service.getSummary(),
          service.getRecentEvents(EVENT_LIMIT),
        ])
        if (!cancelled) dispatch({ type: 'LOADED', data: { summary, events } })
      } catch (err) {
        if (!cancelled) {
          const message = err instanceof Error ? err.message : String(err)
          dispatch({ type: 'ERROR', message })
        }
      }
    }

    dispatch({ type: 'RELOAD' })
    void load()

    return () => { cancelled = true }
  }, [service, refreshKey])

  useInput((input, key) => {
    if (input === 'q' || key.escape) {
      exit()
      return
    }
    if (key.tab && !key.shift) {
      setActivePanel(p => (p + 1) % PANEL_COUNT)
      return
    }
    if (key.tab && key.shift) {
      setActivePanel(p => (p - 1 + PANEL_COUNT) % PANEL_COUNT)
      return
    }
    if (input === 'r') {
      setRefreshKey(k => k + 1)
    }
  })

  // ─── Loading ─────────────────────────────────────────────────────────────

  if (state.phase === 'loading') {
    return (
      <Box flexDirection="column" padding={1}>
        <Text color={hex.blue}>◈ HOLDBACK</Text>
        <Text color={hex.dim}>loading…</Text>
      </Box>
    )
  }

  if (state.phase === 'error') {
    return (
      <Box flexDirection="column" padding={1}>
        <Text color={hex.red}>error loading dashboard: {state.message}</Text>
        <Text color={hex.dim}>press q to exit</Text>
      </Box>
    )
  }

  const { summary, events } = state.data
  const cols = stdout.columns ?? 80

  const slLeft  = ` ◈ ${summary.name} · ${summary.tail - summary.cursor} pending · ${summary.approved} approved`
  const slRight = 'q quit · r refresh · tab navigate panels '
  const slFill  = ' '.repeat(Math.max(0, cols - slLeft.length - slRight.length))
  const slLine  = chalk.bgHex(hex.blueDim).white(slLeft + slFill + slRight)

  // ─── Layout ──────────────────────────────────────────────────────────────

  return (
    <Box flexDirection="column">
      <DashboardHeader summary={summary} />

      {/* Row 1: Queue | Proposers */}
      <Box flexDirection="row">
        <QueuePanel    summary={summary}              isFocused={activePanel === 0} />
        <ProposerPanel proposers={summary.proposers}  isFocused={activePanel === 1} />
      </Box>

      {/* Row 2: Pending entries, full width */}
      <EntryPanel entries={summary.entries} now={summary.now} isFocused={activePanel === 2} />

      {/* Row 3: Event log, full width */}
      <EventLogPanel events={events} isFocused={activePanel === 3} />

      <Box>
        <Text>{slLine}</Text>
      </Box>
    </Box>
  )
}
