/**
 * ordinance run — run one console line as an alias
 *
 * The line is gated and logged exactly as in the shell. Exits 1 unless the
 * command ran.
 */

import { Command } from 'commander';
import { CommandRouter } from '../router.js';
import { t } from '../tui/theme.js';
import { guarded, runtimeFor } from './shared.js';

export const runCommand = new Command('run')
  .description('Run a console command line as an alias')
  .argument('<alias>', 'alias to act as')
  .argument('<line...>', 'command and arguments')
  .action(guarded(async (alias: string, words: string[], _options: object, command: Command) => {
    const router = new CommandRouter(runtimeFor(command), {
      out: (line) => console.log(line),
      err: (line) => console.error(t.red(line)),
    });
    const outcome = await router.dispatch(alias, joinWords(words));
    if (outcome.kind !== 'ran') {
      process.exitCode = 1;
    }
  }));

/** Re-quote words the shell already split, so spaces inside them survive. */
export function joinWords(words: ReadonlyArray<string>): string {
  return words.map((w) => (/\s/.test(w) || w === '' ? `"${w}"` : w)).join(' ');
}
