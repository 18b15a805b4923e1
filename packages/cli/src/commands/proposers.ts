/**
 * holdback proposers — the proposer registry
 *
 * Subcommands:
 *   holdback proposers list [--start <identity>] [--page-size <n>]
 *   holdback proposers add <identity>
 *   holdback proposers remove <identity> [--prev <identity>]
 *
 * add and remove require the administrator (--as).
 */

import { Command, Option } from 'commander';
import { SENTINEL_IDENTITY } from '@holdback/kernel';
import { allProposers } from '../tui/services/index.js';
import { formatProposers } from '../tui/output/events.js';
import { globalOptions, handle, openQueue, printJson, resolveCaller } from './context.js';
import { parseInteger } from './parse.js';

interface ListOptions {
  start?: string;
  pageSize?: number;
  json?: boolean;
}

function listCommand(): Command {
  return new Command('list')
    .description('List registered proposers, newest first')
    .option('--start <identity>', 'list the proposers after this one')
    .addOption(new Option('--page-size <n>', 'return at most n proposers').argParser(parseInteger))
    .option('--json', 'Output as JSON')
    .action(handle('proposers list', (options: ListOptions, command: Command) => {
      const queue = openQueue(command).runtime.load();

      if (options.start === undefined && options.pageSize === undefined) {
        const proposers = allProposers(queue);
        if (options.json === true) {
          printJson({ proposers });
          return;
        }
        process.stdout.write(formatProposers(proposers));
        return;
      }

      const page = queue.listPaginated(options.start ?? SENTINEL_IDENTITY, options.pageSize ?? 10);
      if (options.json === true) {
        printJson(page);
        return;
      }
      process.stdout.write(formatProposers(page.identities));
      if (page.next !== SENTINEL_IDENTITY) {
        // eslint-disable-next-line no-console
        console.log(`\n  next page: holdback proposers list --start ${page.next}`);
      }
    }));
}

function addCommand(): Command {
  return new Command('add')
    .description('Register a proposer (administrator only)')
    .argument('<identity>', 'identity to register')
    .action(handle('proposers add', async (identity: string, _options: object, command: Command) => {
      const caller = resolveCaller(globalOptions(command));
      await openQueue(command).runtime.run((queue) => queue.register(caller, identity));
      // eslint-disable-next-line no-console
      console.log(`Registered proposer: ${identity}`);
    }));
}

function removeCommand(): Command {
  return new Command('remove')
    .description('Deregister a proposer (administrator only)')
    .argument('<identity>', 'identity to deregister')
    .option('--prev <identity>', 'the identity linked before it; looked up when omitted')
    .action(handle('proposers remove', async (identity: string, options: { prev?: string }, command: Command) => {
      const caller = resolveCaller(globalOptions(command));
      await openQueue(command).runtime.run((queue) => {
        const prev = options.prev ?? queue.previousOf(identity) ?? SENTINEL_IDENTITY;
        queue.deregister(caller, prev, identity);
      });
      // eslint-disable-next-line no-console
      console.log(`Deregistered proposer: ${identity}`);
    }));
}

export function proposersCommand(): Command {
  return new Command('proposers')
    .description('Manage the proposer registry')
    .addCommand(listCommand())
    .addCommand(addCommand())
    .addCommand(removeCommand());
}
