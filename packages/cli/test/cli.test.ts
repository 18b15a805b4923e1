/**
 * End-to-end runs of the holdback command tree against a temp home
 * directory. Output is captured from console.log; failures from stderr and
 * a stubbed process.exit.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import type { MockInstance } from 'vitest'
import { mkdtempSync, readFileSync } from 'node:fs'
import { join } from 'node:path'
import { tmpdir } from 'node:os'
import { CallType, hashAction, hashSecretAction } from '@holdback/kernel'
import { listQueues } from '@holdback/runtime-host'
import { createProgram } from '../src/commands/index.js'

let home: string
let log: MockInstance
let stderr: MockInstance

async function run(...args: string[]): Promise<void> {
  await createProgram().parseAsync(['--home', home, ...args], { from: 'user' })
}

/** The JSON printed by the most recent console.log call. */
function lastJson(): unknown {
  const calls = log.mock.calls
  return JSON.parse(String(calls[calls.length - 1]?.[0]))
}

async function initQueue(...extra: string[]): Promise<void> {
  await run('init', 'treasury', '--admin', '0xadmin', '--avatar', '0xavatar', '--target', '0xtarget', ...extra)
}

beforeEach(() => {
  home = mkdtempSync(join(tmpdir(), 'holdback-cli-'))
  log = vi.spyOn(console, 'log').mockImplementation(() => undefined)
  stderr = vi.spyOn(process.stderr, 'write').mockImplementation(() => true)
  vi.spyOn(process.stdout, 'write').mockImplementation(() => true)
  vi.spyOn(process, 'exit').mockImplementation((code) => {
    throw new Error(`process.exit(${String(code)})`)
  })
})

afterEach(() => {
  vi.restoreAllMocks()
})

describe('holdback CLI', () => {
  it('creates the first queue as the active one', async () => {
    await initQueue('--cooldown', '0', '--json')
    expect(lastJson()).toMatchObject({ name: 'treasury' })
    expect(listQueues(home).map((q) => q.name)).toEqual(['treasury'])
  })

  it('runs a proposal through to the outbox', async () => {
    await initQueue()
    await run('--as', '0xadmin', 'proposers', 'add', '0xalice')
    await run('--as', '0xalice', 'propose', '0xdest', '--value', '5', '--payload', '0xAB', '--json')

    const commitment = hashAction({ to: '0xdest', value: 5n, payload: '0xab', callType: CallType.Call })
    expect(lastJson()).toEqual({ slot: 0, commitment })

    await run('--as', '0xbob', 'execute', '0xdest', '--value', '5', '--payload', '0xab', '--json')
    expect(lastJson()).toEqual({ slot: 0, commitment })

    const queueId = listQueues(home)[0]?.id ?? ''
    const outbox = readFileSync(join(home, 'queues', queueId, 'logs', 'outbox.jsonl'), 'utf-8')
    expect(outbox.trim().split('\n').map((l) => JSON.parse(l))).toMatchObject([
      { slot: 0, to: '0xdest', value: '5', payload: '0xab', caller: '0xbob', call_type: 'call' },
    ])

    await run('status', '--json')
    expect(lastJson()).toMatchObject({ cursor: 1, tail: 1, approved: 0, proposers: ['0xalice'], entries: [] })

    await run('log', '--type', 'TransactionExecuted', '--json')
    expect(lastJson()).toMatchObject({ events: [{ event_type: 'TransactionExecuted' }] })
  })

  it('hashes a secret action without a queue', async () => {
    await run('hash', '0xdest', '--value', '1', '--salt', '0')
    const action = { to: '0xdest', value: 1n, payload: '0x', callType: CallType.Call }
    expect(log).toHaveBeenCalledTimes(1)
    expect(log).toHaveBeenCalledWith(hashSecretAction(action, 0))
  })

  it('vetoes and approves as the administrator', async () => {
    await initQueue('--cooldown', '3600')
    await run('--as', '0xadmin', 'proposers', 'add', '0xalice')
    for (const value of ['1', '2', '3']) {
      await run('--as', '0xalice', 'propose', '0xdest', '--value', value)
    }

    await run('--as', '0xadmin', 'veto', '1', '--approve', '1')
    await run('status', '--json')
    expect(lastJson()).toMatchObject({ cursor: 1, tail: 3, approved: 1 })

    await run('--as', '0xadmin', 'approve', '2')
    await run('status', '--json')
    expect(lastJson()).toMatchObject({ approved: 2 })
  })

  it('reports queue errors with their code and exits 1', async () => {
    await initQueue()
    await expect(run('--as', '0xmallory', 'proposers', 'add', '0xeve')).rejects.toThrow('process.exit(1)')
    expect(stderr).toHaveBeenCalledWith(
      "[holdback proposers add] NotAuthorized: '0xmallory' is not the administrator of this queue\n",
    )
  })

  it('removes the queue record when initialization is rejected', async () => {
    await expect(initQueue('--expiration', '30')).rejects.toThrow('process.exit(1)')
    expect(String(stderr.mock.calls[0]?.[0])).toMatch(/^\[holdback init\] InvalidExpiration: /)
    expect(listQueues(home)).toEqual([])
  })

  it('explains how to start when there is no queue', async () => {
    await expect(run('status')).rejects.toThrow('process.exit(1)')
    expect(stderr).toHaveBeenCalledWith(
      "[holdback status] No active queue. Run 'holdback init <name>' to create one.\n",
    )
  })
})
