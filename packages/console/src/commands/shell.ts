/**
 * ordinance shell — start the interactive shell
 */

import { Command } from 'commander';
import { launchShell } from '../tui/shell.js';
import { guarded, homeOption } from './shared.js';

export const shellCommand = new Command('shell')
  .description('Start the interactive shell')
  .option('--as <alias>', 'Alias to act as (default: the configured alias)')
  .action(guarded(async (options: { as?: string }, command: Command) => {
    await launchShell({ home: homeOption(command), alias: options.as });
  }));
