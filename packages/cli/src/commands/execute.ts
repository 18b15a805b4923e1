/**
 * holdback execute | skip-expired — the execution gate
 *
 *   holdback execute <to> [--value] [--payload] [--call-type] [--salt <n>]
 *       Reveal the action at the cursor and hand it to the executor. Anyone
 *       may execute; the action must match the queued commitment. Pass
 *       --salt for an entry queued with enqueue-secret.
 *   holdback skip-expired
 *       Move the cursor past every expired entry at the front of the queue.
 *
 * A failed dispatch still consumes the slot: the action must be queued
 * again to retry.
 */

import { Command, Option } from 'commander';
import { globalOptions, handle, openQueue, printJson, resolveCaller } from './context.js';
import type { ActionOptions } from './parse.js';
import { buildAction, parseInteger, withActionOptions } from './parse.js';

export function executeCommand(): Command {
  return withActionOptions(
    new Command('execute')
      .description('Execute the entry at the cursor')
      .argument('<to>', 'identity the action calls'),
  )
    .addOption(new Option('--salt <n>', 'salt of a secret entry').argParser(parseInteger))
    .option('--json', 'Output as JSON')
    .action(handle('execute', async (
      to: string,
      options: ActionOptions & { salt?: number; json?: boolean },
      command: Command,
    ) => {
      const caller = resolveCaller(globalOptions(command));
      const action = buildAction(to, options);
      const { salt } = options;
      const receipt = await openQueue(command).runtime.run((queue) =>
        salt === undefined ? queue.executeNext(caller, action) : queue.executeNextSecret(caller, action, salt),
      );
      if (receipt.logError !== undefined) {
        const reason = receipt.logError instanceof Error ? receipt.logError.message : String(receipt.logError);
        process.stderr.write(`[holdback execute] warning: slot ${receipt.slot} executed but not logged: ${reason}\n`);
      }
      if (options.json === true) {
        printJson({ slot: receipt.slot, commitment: receipt.commitment });
        return;
      }
      // eslint-disable-next-line no-console
      console.log(`Executed slot ${receipt.slot}  ${receipt.commitment}`);
    }));
}

export function skipExpiredCommand(): Command {
  return new Command('skip-expired')
    .description('Advance the cursor past expired entries')
    .action(handle('skip-expired', async (_options: object, command: Command) => {
      const caller = resolveCaller(globalOptions(command));
      const skipped = await openQueue(command).runtime.run((queue) => queue.skipExpired(caller));
      // eslint-disable-next-line no-console
      console.log(skipped === 0 ? 'No expired entries at the cursor.' : `Skipped ${skipped} expired entries.`);
    }));
}
