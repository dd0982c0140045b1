/**
 * commands/index.ts — Commander program, configured and exported without .parse().
 *
 * Imported by src/bin/ordinance.ts for the non-interactive path.
 */

import { Command } from 'commander'
import { checkCommand } from './check.js'
import { logCommand } from './log.js'
import { runCommand } from './run.js'
import { shellCommand } from './shell.js'
import { statusCommand } from './status.js'

export const program = new Command()

program
  .name('ordinance')
  .description(
    'Ordinance — access control for command consoles.\n' +
    'Groups, users and parameter limits are declared in <home>/access.rules.',
  )
  .version('0.1.0')
  .option('--home <dir>', 'Ordinance home directory (default: $ORDINANCE_HOME or ~/.ordinance)')

program.addCommand(checkCommand)
program.addCommand(runCommand)
program.addCommand(statusCommand)
program.addCommand(logCommand)
program.addCommand(shellCommand)
