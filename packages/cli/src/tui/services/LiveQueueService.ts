import { SENTINEL_IDENTITY } from '@holdback/kernel'
import type { Clock, DelayQueue } from '@holdback/kernel'
import { SystemClock } from '@holdback/runtime-host'
import type { LoggedEvent, QueueRecord, QueueRuntime } from '@holdback/runtime-host'
import type { EventSummary, IQueueService, QueueSummary } from './IQueueService.js'

const PAGE_SIZE = 100

/**
 * LiveQueueService — reads the queue from its runtime on every call, so
 * the dashboard's refresh picks up changes made by other processes.
 */
export class LiveQueueService implements IQueueService {
  constructor(
    private readonly runtime: QueueRuntime,
    private readonly record: QueueRecord,
    private readonly clock: Clock = new SystemClock(),
  ) {}

  async getSummary(): Promise<QueueSummary> {
    return summarizeQueue(this.runtime.load(), this.record, this.clock.now())
  }

  async getRecentEvents(limit: number): Promise<EventSummary[]> {
    const { events } = this.runtime.readEvents()
    return events.slice(Math.max(0, events.length - limit)).map(describeEvent)
  }
}

/** Every registered proposer, newest first, walked page by page. */
export function allProposers(queue: DelayQueue): string[] {
  const out: string[] = []
  let start = SENTINEL_IDENTITY
  for (;;) {
    const page = queue.listPaginated(start, PAGE_SIZE)
    out.push(...page.identities)
    if (page.next === SENTINEL_IDENTITY) return out
    start = page.next
  }
}

export function summarizeQueue(queue: DelayQueue, record: QueueRecord, now: number): QueueSummary {
  return {
    name: record.name,
    id: record.id,
    administrator: queue.administrator,
    avatar: queue.avatar,
    target: queue.target,
    cooldown: queue.cooldown,
    expiration: queue.expiration,
    cursor: queue.cursor,
    tail: queue.tail,
    approved: queue.approvedCount,
    salt: queue.saltCounter,
    proposers: allProposers(queue),
    entries: queue.pendingEntries(now).map((e) => ({ ...e })),
    now,
  }
}

const DETAIL_FIELDS: Record<string, ReadonlyArray<string>> = {
  DelaySetup:                ['administrator', 'avatar', 'target'],
  ProposerRegistered:        ['proposer'],
  ProposerDeregistered:      ['proposer'],
  TransactionAdded:          ['slot', 'proposer'],
  SecretTransactionAdded:    ['slot', 'proposer', 'salt'],
  TransactionExecuted:       ['slot', 'caller', 'success'],
  TransactionsVetoed:        ['fromCursor', 'count'],
  TransactionsApproved:      ['cursor', 'count'],
  ExpiredSkipped:            ['fromCursor', 'count'],
  CooldownSet:               ['cooldown'],
  ExpirationSet:             ['expiration'],
  AdministrationTransferred: ['previous', 'next'],
}

export function describeEvent(event: LoggedEvent): EventSummary {
  const keys = DETAIL_FIELDS[event.event_type] ?? Object.keys(event.fields)
  const detail = keys
    .filter((key) => event.fields[key] !== undefined)
    .map((key) => `${key}=${String(event.fields[key])}`)
    .join(' ')
  return { eventId: event.event_id, type: event.event_type, timestamp: event.timestamp, detail }
}
