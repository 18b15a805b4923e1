import { statusColor, t } from '../theme.js'
import type { EntrySummary, QueueSummary } from '../services/index.js'

/** `90` → `1m 30s`; `0` → `0s`. */
export function formatDuration(seconds: number): string {
  if (seconds <= 0) return '0s'
  const d = Math.floor(seconds / 86_400)
  const h = Math.floor((seconds % 86_400) / 3_600)
  const m = Math.floor((seconds % 3_600) / 60)
  const s = seconds % 60
  const parts: string[] = []
  if (d > 0) parts.push(`${d}d`)
  if (h > 0) parts.push(`${h}h`)
  if (m > 0) parts.push(`${m}m`)
  if (s > 0) parts.push(`${s}s`)
  return parts.join(' ')
}

/** How long until an entry changes status, relative to `now`. */
export function entryTiming(entry: EntrySummary, now: number): string {
  switch (entry.status) {
    case 'cooling':
      return `ready in ${formatDuration(entry.readyAt - now)}`
    case 'ready':
    case 'approved':
      return entry.expiresAt === null ? 'no expiry' : `expires in ${formatDuration(entry.expiresAt - now)}`
    case 'expired':
      return entry.expiresAt === null ? '' : `expired ${formatDuration(now - entry.expiresAt)} ago`
    case 'consumed':
    case 'unknown':
      return ''
  }
}

const labelW = 14
const label = (s: string) => t.muted(s + ' '.repeat(Math.max(1, labelW - s.length)))

/**
 * formatStatus — the queue's configuration, counters and pending entries.
 */
export function formatStatus(summary: QueueSummary): string {
  let out = '\n'

  out += '  ' + t.blue('◈ ' + summary.name) + '  ' + t.dim(summary.id) + '\n\n'

  out += '  ' + label('administrator') + t.white(summary.administrator) + '\n'
  out += '  ' + label('avatar') + t.text(summary.avatar) + '\n'
  out += '  ' + label('target') + t.text(summary.target) + '\n'
  out += '  ' + label('cooldown') + t.text(formatDuration(summary.cooldown)) + '\n'
  out += '  ' + label('expiration') +
    (summary.expiration === 0 ? t.muted('never') : t.text(formatDuration(summary.expiration))) + '\n'
  out += '  ' + label('cursor') + t.white(String(summary.cursor)) +
    t.dim('  tail ') + t.white(String(summary.tail)) +
    t.dim('  approved ') + t.blue(String(summary.approved)) +
    t.dim('  salt ') + t.text(String(summary.salt)) + '\n'
  out += '  ' + label('proposers') + t.white(String(summary.proposers.length)) + '\n'

  out += '\n  ' + t.muted('pending') + '\n'
  if (summary.entries.length === 0) {
    out += '    ' + t.dim('(none)') + '\n'
  }
  for (const entry of summary.entries) {
    const statusPad = ' '.repeat(Math.max(1, 9 - entry.status.length))
    out += (
      '    ' +
      t.white(String(entry.slot).padStart(4)) + '  ' +
      statusColor(entry.status)(entry.status) + statusPad +
      t.blueDim(entry.commitment.slice(0, 16)) + '  ' +
      t.muted(entryTiming(entry, summary.now)) +
      '\n'
    )
  }

  return out
}
