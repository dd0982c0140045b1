import { t } from '../theme.js'
import type { ConsoleRuntime } from '../../runtime.js'

/**
 * renderHeader — print the startup banner and a one-line summary of the
 * loaded permission graph.
 */
export function renderHeader(runtime: ConsoleRuntime): void {
  process.stdout.write('\n')
  process.stdout.write('  ' + t.blueDim('◆') + ' ' + t.blue.bold('O R D I N A N C E') + '\n')
  process.stdout.write('    ' + t.muted('access control for command consoles') + '\n')
  process.stdout.write('\n  ' + t.dim('─'.repeat(60)) + '\n\n')

  const { control, plugins, declarationsHash } = runtime
  const running = plugins.list().filter((p) => p.running).length
  process.stdout.write(
    '  ' +
    t.muted('home') + ' ' + t.text(runtime.home) +
    '  ' + t.dim('·') +
    '  ' + t.muted('rules') + ' ' + t.blueDim(declarationsHash.slice(0, 8)) +
    '\n'
  )
  process.stdout.write(
    '  ' +
    t.text(String(control.listGroups().length)) + t.muted(' groups') + t.dim('  ·  ') +
    t.text(String(control.listUsers().length)) + t.muted(' users') + t.dim('  ·  ') +
    t.text(String(control.listPermissions().length)) + t.muted(' accesses') + t.dim('  ·  ') +
    t.green(String(running)) + t.muted(' plugins running') +
    '\n'
  )
}
