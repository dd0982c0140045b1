#!/usr/bin/env tsx
/**
 * bin/ordinance.ts — TTY-aware entry point for the `ordinance` CLI command.
 *
 * In a TTY with ORDINANCE_NO_TUI unset and no arguments: launches the
 * interactive shell. Otherwise: delegates to Commander.
 *
 * ordinance (in TTY)                 → interactive shell
 * ORDINANCE_NO_TUI=1 ordinance       → Commander help
 * ordinance run console slap 50      → Commander, in any terminal
 */

const isTTY         = process.stdout.isTTY === true && process.stdin.isTTY === true
const isInteractive = isTTY && process.env['ORDINANCE_NO_TUI'] === undefined && process.argv.length <= 2

if (isInteractive) {
  const { launchShell } = await import('../tui/shell.js')
  await launchShell()
} else {
  const { program } = await import('../commands/index.js')
  await program.parseAsync()
}
