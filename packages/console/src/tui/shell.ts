/**
 * shell.ts — Ordinance interactive readline shell.
 *
 * Two layers:
 *
 * READLINE — prompt, line editing, history, submit on Enter, Ctrl+C.
 *
 * STDOUT OUTPUT — direct process.stdout.write() with chalk coloring.
 *   Append-only. Command output in the default color, denials and errors
 *   in red.
 *
 * Lines that are not shell built-ins go through the CommandRouter, so every
 * plugin command is gated and logged.
 */

import * as readline from 'node:readline'
import { buildRuntime } from '../runtime.js'
import type { BuildRuntimeOptions } from '../runtime.js'
import { CommandRouter } from '../router.js'
import { renderHeader } from './output/header.js'
import { renderHelp } from './output/help.js'
import { renderStatus } from './output/status.js'
import { buildPS1 } from './prompt.js'
import { t } from './theme.js'

export interface ShellOptions extends BuildRuntimeOptions {
  /** Alias to act as. Default: the configured alias. */
  readonly alias?: string | undefined
}

/**
 * launchShell — entry point for the interactive TTY shell.
 *
 * Resolves once the shell is closed (exit, Ctrl+C or end of input).
 */
export async function launchShell(options: ShellOptions = {}): Promise<void> {
  const runtime = buildRuntime(options)
  let alias = options.alias ?? runtime.config.alias

  renderHeader(runtime)

  const router = new CommandRouter(runtime, {
    out: (line) => process.stdout.write('  ' + line + '\n'),
    err: (line) => process.stdout.write('  ' + t.red(line) + '\n'),
  })

  const groupOf = (who: string): string =>
    runtime.control.resolvePrincipal(who)?.parent?.name ?? t.red('unbound')

  const rl = readline.createInterface({
    input:       process.stdin,
    output:      process.stdout,
    terminal:    true,
    historySize: runtime.config.historySize,
  })

  const showPrompt = (): void => {
    rl.setPrompt(buildPS1(alias, groupOf(alias)))
    process.stdout.write('\n')
    rl.prompt()
  }

  if (runtime.control.resolvePrincipal(alias) === undefined) {
    process.stdout.write('\n  ' + t.amber(`alias "${alias}" is not bound to any user; every command will be denied`) + '\n')
  }
  showPrompt()

  rl.on('line', (line: string) => {
    const input = line.trim()
    const [cmd = '', arg = ''] = input.split(/\s+/)

    if (input === '') {
      showPrompt()
      return
    }
    if (cmd === 'exit' || cmd === 'quit') {
      rl.close()
      return
    }
    if (cmd === 'help') {
      renderHelp(runtime)
      showPrompt()
      return
    }
    if (cmd === 'status') {
      renderStatus(runtime, { recent: 5 })
      showPrompt()
      return
    }
    if (cmd === 'whoami') {
      process.stdout.write('  ' + t.white(alias) + t.dim(' in ') + t.text(groupOf(alias)) + '\n')
      showPrompt()
      return
    }
    if (cmd === 'as') {
      if (arg === '') {
        process.stdout.write('  ' + t.red('usage: as <alias>') + '\n')
      } else {
        alias = arg
      }
      showPrompt()
      return
    }

    router.dispatch(alias, input)
      .then(showPrompt)
      .catch((err: unknown) => {
        process.stdout.write('  ' + t.red(err instanceof Error ? err.message : String(err)) + '\n')
        showPrompt()
      })
  })

  rl.on('SIGINT', () => rl.close())

  await new Promise<void>((resolve) => {
    rl.on('close', () => {
      process.stdout.write('\n')
      resolve()
    })
  })
}
