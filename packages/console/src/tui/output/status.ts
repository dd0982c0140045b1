import type { DecisionLogEntry } from '@ordinance/kernel'
import { formatEntry } from '../../commands/log.js'
import { decisionColor, t } from '../theme.js'
import type { Runtime } from '../../runtime.js'

export interface StatusReport {
  readonly declarations_hash: string
  readonly groups: ReadonlyArray<{ readonly name: string; readonly parent: string | null }>
  readonly users: ReadonlyArray<{ readonly name: string; readonly aliases: ReadonlyArray<string>; readonly group: string | null }>
  readonly accesses: ReadonlyArray<{ readonly tag: string; readonly usage: string; readonly granted_to: ReadonlyArray<string> }>
  readonly plugins: ReadonlyArray<{ readonly plugin_id: string; readonly version: string; readonly running: boolean }>
}

/** Snapshot of the loaded permission graph and plugins. */
export function describeStatus(runtime: Runtime): StatusReport {
  const { control, plugins } = runtime
  const groups = control.listGroups()

  return {
    declarations_hash: runtime.declarationsHash,
    groups: groups.map((g) => ({ name: g.name, parent: g.parent?.name ?? null })),
    users: control.listUsers().map((u) => ({ name: u.name, aliases: u.aliases, group: u.parent?.name ?? null })),
    accesses: control.listPermissions().map((p) => ({
      tag: p.tag,
      usage: p.usage(),
      granted_to: groups
        .filter((g) => g.grantFor(p) !== undefined && !g.isDenied(p))
        .map((g) => g.name),
    })),
    plugins: plugins.list().map(({ manifest, running }) => ({
      plugin_id: manifest.plugin_id,
      version: manifest.version,
      running,
    })),
  }
}

/** The last `limit` decisions gated by this runtime, oldest first. */
export function recentDecisions(runtime: Pick<Runtime, 'gate'>, limit: number): ReadonlyArray<DecisionLogEntry> {
  const all = runtime.gate.logger.query()
  return all.slice(Math.max(0, all.length - limit))
}

export interface RenderStatusOptions {
  /** Also list this many of the session's most recent decisions. */
  readonly recent?: number
}

export function renderStatus(runtime: Runtime, options: RenderStatusOptions = {}): void {
  const report = describeStatus(runtime)
  const none = '    ' + t.muted('(none)') + '\n'
  let out = '\n'

  out += '  ' + t.muted('rules hash') + '  ' + t.blueDim(report.declarations_hash) + '\n'

  out += '\n  ' + t.blue('groups') + '\n'
  for (const g of report.groups) {
    out += '    ' + t.white(g.name) + (g.parent === null ? '' : t.dim(' extends ') + t.text(g.parent)) + '\n'
  }

  out += '\n  ' + t.blue('users') + '\n'
  if (report.users.length === 0) out += none
  for (const u of report.users) {
    out += '    ' + t.white(u.aliases.join(', ')) + t.dim(' in ') + t.text(u.group ?? '-') + '\n'
  }

  out += '\n  ' + t.blue('accesses') + '\n'
  if (report.accesses.length === 0) out += none
  for (const a of report.accesses) {
    const granted = a.granted_to.length === 0 ? t.muted('no groups') : t.text(a.granted_to.join(', '))
    out += '    ' + t.white(a.usage) + t.dim('  → ') + granted + '\n'
  }

  out += '\n  ' + t.blue('plugins') + '\n'
  for (const p of report.plugins) {
    const state = p.running ? t.green('running') : t.amber('stopped')
    out += '    ' + t.white(p.plugin_id) + t.dim(`  v${p.version}  `) + state + '\n'
  }

  if (options.recent !== undefined) {
    const decisions = recentDecisions(runtime, options.recent)
    out += '\n  ' + t.blue('recent decisions') + '\n'
    if (decisions.length === 0) out += none
    for (const d of decisions) {
      out += '    ' + decisionColor(d.allowed)(formatEntry(d)) + '\n'
    }
  }

  process.stdout.write(out)
}
