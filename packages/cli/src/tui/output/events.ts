import { eventColor, t } from '../theme.js'
import type { EventSummary } from '../services/index.js'

/**
 * formatEvents — one line per event: timestamp, type, detail.
 */
export function formatEvents(events: ReadonlyArray<EventSummary>): string {
  if (events.length === 0) return '\n  ' + t.dim('(no events)') + '\n'

  let out = '\n'
  for (const e of events) {
    const typePad = ' '.repeat(Math.max(1, 26 - e.type.length))
    out += '  ' + t.dim(e.timestamp) + '  ' + eventColor(e.type)(e.type) + typePad + t.text(e.detail) + '\n'
  }
  return out
}

/**
 * formatProposers — registry traversal order, newest first.
 */
export function formatProposers(proposers: ReadonlyArray<string>): string {
  if (proposers.length === 0) return '\n  ' + t.dim('(no proposers)') + '\n'
  return '\n' + proposers.map((p) => '  ' + t.green('●') + ' ' + t.white(p) + '\n').join('')
}
