/**
 * Shared plumbing for holdback commands: global options, home and queue
 * resolution, caller identity, and error reporting.
 *
 * Global options (accepted before or after the subcommand):
 *   --home <dir>        Holdback home directory (see resolveHoldbackHome)
 *   --persist-home      Remember --home in the OS config file
 *   --queue <name>      Queue to operate on instead of the active one
 *   --as <identity>     Caller identity; falls back to HOLDBACK_IDENTITY
 */

import type { Command } from 'commander';
import { isDelayQueueError } from '@holdback/kernel';
import type { Identity } from '@holdback/kernel';
import {
  QueueRuntime,
  findQueue,
  getActiveQueue,
  queueStateIO,
  resolveHoldbackHome,
} from '@holdback/runtime-host';
import type { QueueRecord } from '@holdback/runtime-host';

export type GlobalOptions = {
  home?: string;
  persistHome?: boolean;
  queue?: string;
  as?: string;
};

export interface QueueContext {
  readonly home: string;
  readonly record: QueueRecord;
  readonly runtime: QueueRuntime;
}

export function globalOptions(command: Command): GlobalOptions {
  return command.optsWithGlobals<GlobalOptions>();
}

export function resolveHome(command: Command): string {
  const opts = globalOptions(command);
  return resolveHoldbackHome({ home: opts.home, persist: opts.persistHome });
}

/**
 * The queue named by --queue, or the active queue.
 *
 * @throws {Error} If the named queue does not exist or no queue is active
 */
export function openQueue(command: Command): QueueContext {
  const home = resolveHome(command);
  const { queue } = globalOptions(command);
  const record = queue !== undefined ? findQueue(queue, home) : getActiveQueue(home);
  if (record === null) {
    throw new Error(
      queue !== undefined
        ? `Queue not found: ${queue}. Use 'holdback queues list' to see available queues.`
        : "No active queue. Run 'holdback init <name>' to create one.",
    );
  }
  return { home, record, runtime: new QueueRuntime({ stateIO: queueStateIO(record.id, home) }) };
}

/**
 * The identity the command acts as: --as, then HOLDBACK_IDENTITY.
 *
 * @throws {Error} If neither is set
 */
export function resolveCaller(opts: GlobalOptions, env: NodeJS.ProcessEnv = process.env): Identity {
  if (opts.as !== undefined && opts.as !== '') return opts.as;
  const fromEnv = env['HOLDBACK_IDENTITY'];
  if (fromEnv !== undefined && fromEnv !== '') return fromEnv;
  throw new Error('No caller identity. Pass --as <identity> or set HOLDBACK_IDENTITY.');
}

// ---------------------------------------------------------------------------
// Error reporting
// ---------------------------------------------------------------------------

/** `[holdback <command>] <CODE>: <message>` for queue errors, `[holdback <command>] <message>` otherwise. */
export function formatError(commandName: string, err: unknown): string {
  const prefix = `[holdback ${commandName}]`;
  if (isDelayQueueError(err)) {
    let line = `${prefix} ${err.code}: ${err.message}`;
    if (err.cause instanceof Error) line += `\n  cause: ${err.cause.message}`;
    return line;
  }
  return `${prefix} ${err instanceof Error ? err.message : String(err)}`;
}

/**
 * Wrap a commander action so a thrown error is printed to stderr and the
 * process exits with status 1.
 */
export function handle<A extends unknown[]>(
  commandName: string,
  fn: (...args: A) => void | Promise<void>,
): (...args: A) => Promise<void> {
  return async (...args: A) => {
    try {
      await fn(...args);
    } catch (err: unknown) {
      process.stderr.write(formatError(commandName, err) + '\n');
      process.exit(1);
    }
  };
}

/** Print `value` as indented JSON, bigints as decimal strings. */
export function printJson(value: unknown): void {
  // eslint-disable-next-line no-console
  console.log(
    JSON.stringify(value, (_key: string, v: unknown) => (typeof v === 'bigint' ? v.toString(10) : v), 2),
  );
}
