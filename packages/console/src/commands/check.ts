/**
 * ordinance check — evaluate access without running a command
 *
 * Nothing is logged and no handler runs. Exits 1 when access is denied.
 */

import { Command } from 'commander';
import { formatDenial } from '../router.js';
import { t } from '../tui/theme.js';
import { guarded, runtimeFor } from './shared.js';

export const checkCommand = new Command('check')
  .description('Evaluate whether an alias may use an access with the given arguments')
  .argument('<alias>', 'alias to check as')
  .argument('<access>', 'access tag')
  .argument('[args...]', 'arguments, as they would be typed')
  .option('--json', 'Output as JSON')
  .action(guarded((alias: string, access: string, args: string[], options: { json?: boolean }, command: Command) => {
    const { control } = runtimeFor(command);
    const permission = control.getPermission(access);
    if (permission === undefined) {
      throw new Error(`unknown access "${access}"`);
    }

    const result = control.checkAccess(alias, permission, ...args);
    if (!result.ok) {
      process.exitCode = 1;
    }

    if (options.json === true) {
      console.log(JSON.stringify(
        result.ok
          ? { allowed: true, args: result.args }
          : { allowed: false, condition: result.condition.toJSON() },
        null,
        2,
      ));
      return;
    }
    if (result.ok) {
      console.log(t.green('allowed') + '  ' + t.text(JSON.stringify(result.args)));
    } else {
      console.log(t.red('denied') + '  ' + formatDenial(access, result.condition));
    }
  }));
