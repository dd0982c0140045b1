import { kindColor, t } from './theme.js'

/**
 * buildPS1 — construct the colored prompt string.
 *
 * Format: [ordinance:console:admin] ❯
 */
export function buildPS1(alias: string, group: string): string {
  const bracket = t.blueDim
  const name    = t.blue.bold
  const who     = t.white
  const arrow   = t.blueDim

  return (
    bracket('[') +
    name('ordinance') +
    bracket(':') +
    who(alias) +
    bracket(':') +
    kindColor('group')(group) +
    bracket(']') +
    arrow(' ❯ ')
  )
}
