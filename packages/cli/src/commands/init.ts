/**
 * holdback init — create a queue
 *
 * The caller (--as or HOLDBACK_IDENTITY, defaulting to the administrator)
 * is recorded as the initiator. The first queue created becomes active.
 */

import { Command, Option } from 'commander';
import {
  QueueRuntime,
  createQueueRecord,
  deleteQueueRecord,
  queueDir,
  queueStateIO,
} from '@holdback/runtime-host';
import { globalOptions, handle, printJson, resolveHome } from './context.js';
import { parseInteger } from './parse.js';

interface InitOptions {
  admin: string;
  avatar: string;
  target: string;
  cooldown: number;
  expiration: number;
  json?: boolean;
}

export function initCommand(): Command {
  return new Command('init')
    .description('Create a delay queue')
    .argument('<name>', "queue name: lowercase letters, digits, '.', '_' or '-'")
    .requiredOption('--admin <identity>', 'administrator of the queue')
    .requiredOption('--avatar <identity>', 'identity the executor acts for')
    .requiredOption('--target <identity>', 'identity the executor forwards calls to')
    .addOption(
      new Option('--cooldown <seconds>', 'waiting period before an entry may execute')
        .argParser(parseInteger)
        .default(0),
    )
    .addOption(
      new Option('--expiration <seconds>', 'window after the cooldown; 0 means never, otherwise at least 60')
        .argParser(parseInteger)
        .default(0),
    )
    .option('--json', 'Output as JSON')
    .action(handle('init', (name: string, options: InitOptions, command: Command) => {
      const home = resolveHome(command);
      const initiator = globalOptions(command).as ?? process.env['HOLDBACK_IDENTITY'] ?? options.admin;

      const record = createQueueRecord(name, home);
      const runtime = new QueueRuntime({ stateIO: queueStateIO(record.id, home) });
      try {
        runtime.initialize({
          initiator,
          administrator: options.admin,
          avatar: options.avatar,
          target: options.target,
          cooldown: options.cooldown,
          expiration: options.expiration,
        });
      } catch (err: unknown) {
        deleteQueueRecord(record.id, home);
        throw err;
      }

      if (options.json === true) {
        printJson({ ...record, state_dir: queueDir(record.id, home) });
        return;
      }
      // eslint-disable-next-line no-console
      console.log('Created queue:');
      // eslint-disable-next-line no-console
      console.log(`  id:         ${record.id}`);
      // eslint-disable-next-line no-console
      console.log(`  name:       ${record.name}`);
      // eslint-disable-next-line no-console
      console.log(`  created_at: ${record.createdAt}`);
      // eslint-disable-next-line no-console
      console.log(`  state_dir:  ${queueDir(record.id, home)}`);
    }));
}
