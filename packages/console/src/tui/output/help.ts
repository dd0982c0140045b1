import { t } from '../theme.js'
import type { Runtime } from '../../runtime.js'

/**
 * renderHelp — shell built-ins, then the commands of every running plugin.
 */
export function renderHelp(runtime: Pick<Runtime, 'plugins'>): void {
  const section = (label: string) =>
    '\n  ' + t.dim('─── ') + t.blue(label) + '\n'

  const cmd = (name: string, desc: string) => {
    const pad = ' '.repeat(Math.max(1, 32 - name.length))
    return '  ' + t.white(name) + t.dim(pad + desc) + '\n'
  }

  let out = '\n'

  for (const status of runtime.plugins.list()) {
    if (!status.running) continue
    out += section(status.manifest.name.toLowerCase())
    for (const command of runtime.plugins.commands()) {
      if (command.plugin.plugin_id !== status.manifest.plugin_id) continue
      const usage = command.permission.usage().split(' ').slice(1).join(' ')
      out += cmd(`${command.command.name} ${usage}`.trim(), command.command.summary ?? '')
    }
  }

  out += section('shell')
  out += cmd('as <alias>',  'act as another alias')
  out += cmd('whoami',      'show the alias and group you act as')
  out += cmd('help',        'show this help')
  out += cmd('exit',        'leave the shell (or Ctrl+C)')

  process.stdout.write(out)
}
