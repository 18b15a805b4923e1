/**
 * holdback config — administrator settings of the active queue
 *
 *   holdback config set-cooldown <seconds>
 *   holdback config set-expiration <seconds>
 *   holdback config transfer-admin <identity>
 */

import { Command } from 'commander';
import { formatDuration } from '../tui/output/status.js';
import { globalOptions, handle, openQueue, resolveCaller } from './context.js';
import { parseInteger } from './parse.js';

function setCooldownCommand(): Command {
  return new Command('set-cooldown')
    .description('Change the cooldown; applies to every pending entry')
    .argument('<seconds>', 'new cooldown', parseInteger)
    .action(handle('config set-cooldown', async (seconds: number, _options: object, command: Command) => {
      const caller = resolveCaller(globalOptions(command));
      await openQueue(command).runtime.run((queue) => queue.setCooldown(caller, seconds));
      // eslint-disable-next-line no-console
      console.log(`Cooldown: ${formatDuration(seconds)}`);
    }));
}

function setExpirationCommand(): Command {
  return new Command('set-expiration')
    .description('Change the expiration window; 0 disables expiry')
    .argument('<seconds>', 'new expiration, 0 or at least 60', parseInteger)
    .action(handle('config set-expiration', async (seconds: number, _options: object, command: Command) => {
      const caller = resolveCaller(globalOptions(command));
      await openQueue(command).runtime.run((queue) => queue.setExpiration(caller, seconds));
      // eslint-disable-next-line no-console
      console.log(`Expiration: ${seconds === 0 ? 'never' : formatDuration(seconds)}`);
    }));
}

function transferAdminCommand(): Command {
  return new Command('transfer-admin')
    .description('Hand the administrator role to another identity')
    .argument('<identity>', 'new administrator')
    .action(handle('config transfer-admin', async (identity: string, _options: object, command: Command) => {
      const caller = resolveCaller(globalOptions(command));
      await openQueue(command).runtime.run((queue) => queue.transferAdministration(caller, identity));
      // eslint-disable-next-line no-console
      console.log(`Administrator: ${identity}`);
    }));
}

export function configCommand(): Command {
  return new Command('config')
    .description('Administrator settings of the queue')
    .addCommand(setCooldownCommand())
    .addCommand(setExpirationCommand())
    .addCommand(transferAdminCommand());
}
