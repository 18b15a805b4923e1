/**
 * IQueueService — the single boundary between the TUI and the queue.
 *
 * All data the dashboard and the formatted command output display comes
 * through these shapes. Components and output functions never import
 * @holdback/runtime-host directly.
 */

import type { EntryStatus } from '@holdback/kernel'

export interface QueueSummary {
  name: string
  id: string
  administrator: string
  avatar: string
  target: string
  cooldown: number
  expiration: number
  cursor: number
  tail: number
  approved: number
  salt: number
  proposers: string[]
  entries: EntrySummary[]
  /** Clock reading the entry statuses were computed at. */
  now: number
}

export interface EntrySummary {
  slot: number
  commitment: string
  createdAt: number
  status: EntryStatus
  readyAt: number
  expiresAt: number | null
}

export interface EventSummary {
  eventId: string
  type: string
  timestamp: string
  /** One-line description of the event's fields. */
  detail: string
}

export interface IQueueService {
  getSummary(): Promise<QueueSummary>
  getRecentEvents(limit: number): Promise<EventSummary[]>
}
