import chalk, { type ChalkInstance } from 'chalk'

export const t = {
  blue:       chalk.hex('#4FC3F7'),
  blueDim:    chalk.hex('#0277BD'),
  text:       chalk.hex('#C8C8C0'),
  white:      chalk.hex('#F2F2EC'),
  dim:        chalk.hex('#444444'),
  muted:      chalk.hex('#666666'),
  amber:      chalk.hex('#D4880A'),
  green:      chalk.hex('#81C784'),
  red:        chalk.hex('#CF6679'),
} as const

export const decisionColor = (allowed: boolean): ChalkInstance =>
  allowed ? t.green : t.red

const _kindColors: Record<string, ChalkInstance> = {
  group: t.blue,
  user:  t.text,
}

export const kindColor = (kind: string): ChalkInstance =>
  _kindColors[kind] ?? t.muted
