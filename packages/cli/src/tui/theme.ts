import chalk, { type ChalkInstance } from 'chalk'
import type { EntryStatus } from '@holdback/kernel'

export const t = {
  blue:       chalk.hex('#4FC3F7'),
  blueBright: chalk.hex('#81D4FA'),
  blueDim:    chalk.hex('#0277BD'),
  text:       chalk.hex('#C8C8C0'),
  white:      chalk.hex('#F2F2EC'),
  dim:        chalk.hex('#444444'),
  muted:      chalk.hex('#666666'),
  amber:      chalk.hex('#D4880A'),
  green:      chalk.hex('#81C784'),
  red:        chalk.hex('#CF6679'),
} as const

/** Hex values of the theme, for ink components that take a color prop. */
export const hex = {
  blue:    '#4FC3F7',
  blueDim: '#0277BD',
  text:    '#C8C8C0',
  dim:     '#444444',
  muted:   '#666666',
  amber:   '#D4880A',
  green:   '#81C784',
  red:     '#CF6679',
  border:  '#242424',
} as const

const _statusHex: Record<EntryStatus, string> = {
  consumed: hex.dim,
  cooling:  hex.amber,
  approved: hex.blue,
  ready:    hex.green,
  expired:  hex.red,
  unknown:  hex.muted,
}

export const statusHex = (status: EntryStatus): string => _statusHex[status]

export const statusColor = (status: EntryStatus): ChalkInstance => chalk.hex(_statusHex[status])

const _eventColors: Record<string, ChalkInstance> = {
  TransactionExecuted: t.green,
  TransactionsVetoed:  t.red,
  ExpiredSkipped:      t.red,
  TransactionsApproved: t.blue,
  AdministrationTransferred: t.amber,
}

export const eventColor = (eventType: string): ChalkInstance =>
  _eventColors[eventType] ?? t.text

export interface PanelTone {
  border: string
  meta: string
}

/**
 * Colours of a dashboard panel. `head` is the status of the entry at the
 * cursor, for panels that list entries: it tints the meta text, and the
 * border while focused.
 */
export const panelTone = (isFocused: boolean, head?: EntryStatus): PanelTone => {
  const accent = head === undefined ? undefined : _statusHex[head]
  return {
    border: isFocused ? (accent ?? hex.blue) : hex.border,
    meta: accent ?? hex.muted,
  }
}
