/**
 * holdback propose | enqueue | enqueue-secret | hash — put actions in the queue
 *
 *   holdback propose <to> [--value] [--payload] [--call-type]
 *       Append an action; the queue computes its commitment.
 *   holdback enqueue <hash>
 *       Append a commitment computed off-line (see `holdback hash`).
 *   holdback enqueue-secret <hash> [--note <text>]
 *       Append a salted commitment; it must have been computed with the
 *       queue's current salt counter (shown by `holdback status`).
 *   holdback hash <to> [--value] [--payload] [--call-type] [--salt <n>]
 *       Print the commitment of an action. Needs no queue.
 *
 * All but `hash` require a registered proposer (--as).
 */

import { Command, Option } from 'commander';
import { hashAction, hashSecretAction, toCommitmentHash } from '@holdback/kernel';
import { globalOptions, handle, openQueue, printJson, resolveCaller } from './context.js';
import type { ActionOptions } from './parse.js';
import { buildAction, parseInteger, withActionOptions } from './parse.js';

interface JsonOption {
  json?: boolean;
}

function printSlot(fields: Record<string, string | number>, json: boolean | undefined): void {
  if (json === true) {
    printJson(fields);
    return;
  }
  for (const [key, value] of Object.entries(fields)) {
    // eslint-disable-next-line no-console
    console.log(`${(key + ':').padEnd(12)}${value}`);
  }
}

export function proposeCommand(): Command {
  return withActionOptions(
    new Command('propose')
      .description('Queue an action (registered proposers only)')
      .argument('<to>', 'identity the action calls'),
  )
    .option('--json', 'Output as JSON')
    .action(handle('propose', async (to: string, options: ActionOptions & JsonOption, command: Command) => {
      const caller = resolveCaller(globalOptions(command));
      const action = buildAction(to, options);
      const slot = await openQueue(command).runtime.run((queue) => queue.propose(caller, action));
      printSlot({ slot, commitment: hashAction(action) }, options.json);
    }));
}

export function enqueueCommand(): Command {
  return new Command('enqueue')
    .description('Queue a precomputed commitment (registered proposers only)')
    .argument('<hash>', 'commitment as 64 hex characters, optionally 0x-prefixed')
    .option('--json', 'Output as JSON')
    .action(handle('enqueue', async (raw: string, options: JsonOption, command: Command) => {
      const caller = resolveCaller(globalOptions(command));
      const commitment = toCommitmentHash(raw);
      const slot = await openQueue(command).runtime.run((queue) => queue.enqueue(caller, commitment));
      printSlot({ slot, commitment }, options.json);
    }));
}

export function enqueueSecretCommand(): Command {
  return new Command('enqueue-secret')
    .description('Queue a salted commitment that hides the action until execution')
    .argument('<hash>', 'salted commitment as 64 hex characters')
    .option('--note <text>', 'opaque reference recorded in the event log', '')
    .option('--json', 'Output as JSON')
    .action(handle('enqueue-secret', async (raw: string, options: { note: string } & JsonOption, command: Command) => {
      const caller = resolveCaller(globalOptions(command));
      const commitment = toCommitmentHash(raw);
      const { slot, salt } = await openQueue(command).runtime.run((queue) => {
        const consumed = queue.saltCounter;
        return { slot: queue.enqueueSecret(caller, commitment, options.note), salt: consumed };
      });
      printSlot({ slot, salt, commitment }, options.json);
    }));
}

export function hashCommand(): Command {
  return withActionOptions(
    new Command('hash')
      .description('Print the commitment of an action')
      .argument('<to>', 'identity the action calls'),
  )
    .addOption(new Option('--salt <n>', 'compute the secret commitment for this salt').argParser(parseInteger))
    .action(handle('hash', (to: string, options: ActionOptions & { salt?: number }) => {
      const action = buildAction(to, options);
      const commitment =
        options.salt === undefined ? hashAction(action) : hashSecretAction(action, options.salt);
      // eslint-disable-next-line no-console
      console.log(commitment);
    }));
}
