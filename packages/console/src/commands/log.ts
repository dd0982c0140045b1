/**
 * ordinance log — query the decision log
 *
 * Every gated command is logged, allowed or denied, to
 * <home>/logs/decisions.jsonl.
 */

import { Command } from 'commander';
import { DECISION_LOG_FILE, FileStateIO, readDecisionLog, resolveHome } from '@ordinance/runtime-host';
import type { LoggedDecision } from '@ordinance/runtime-host';
import type { DecisionLogEntry } from '@ordinance/kernel';
import { decisionColor, t } from '../tui/theme.js';
import { guarded, homeOption } from './shared.js';

export interface LogFilter {
  readonly alias?: string | undefined;
  readonly denied?: boolean | undefined;
  /** Keep the most recent `limit` entries. */
  readonly limit: number;
}

export function selectEntries(
  entries: ReadonlyArray<LoggedDecision>,
  filter: LogFilter,
): ReadonlyArray<LoggedDecision> {
  const matching = entries.filter((e) =>
    (filter.alias === undefined || e.alias === filter.alias) &&
    (filter.denied !== true || !e.allowed),
  );
  return matching.slice(Math.max(0, matching.length - filter.limit));
}

/** `2026-01-01T00:00:00.000Z  user1  slap 101  denied: specified number ...` */
export function formatEntry(entry: DecisionLogEntry): string {
  const line = [entry.command, ...entry.args.map(String)].join(' ');
  const verdict = entry.allowed
    ? entry.error === null ? 'allowed' : `allowed, failed: ${entry.error}`
    : `denied: ${entry.condition?.message ?? 'access denied'}`;
  return `${entry.timestamp}  ${entry.alias}  ${line}  ${verdict}`;
}

export const logCommand = new Command('log')
  .description('Query the decision log')
  .option('--alias <alias>', 'Only decisions made for this alias')
  .option('--denied', 'Only denied decisions')
  .option('--limit <n>', 'Maximum number of entries to show, most recent last', '20')
  .option('--json', 'Output as JSON')
  .action(guarded((options: { alias?: string; denied?: boolean; limit: string; json?: boolean }, command: Command) => {
    const limit = Number(options.limit);
    if (!Number.isInteger(limit) || limit < 0) {
      throw new Error('--limit must be a non-negative integer');
    }

    const stateIO = new FileStateIO(resolveHome({ home: homeOption(command) }));
    const { entries, stats } = readDecisionLog(stateIO.readLogRaw(DECISION_LOG_FILE));
    const selected = selectEntries(entries, { alias: options.alias, denied: options.denied, limit });

    if (stats.parseErrors > 0 || stats.partialTrailingLine) {
      console.error(t.amber(
        `warning: skipped ${stats.parseErrors} malformed line(s)` +
        (stats.partialTrailingLine ? ' and a partial last line' : ''),
      ));
    }

    if (options.json === true) {
      console.log(JSON.stringify(selected, null, 2));
      return;
    }
    if (selected.length === 0) {
      console.log(t.muted('no matching decisions'));
      return;
    }
    for (const entry of selected) {
      console.log(decisionColor(entry.allowed)(formatEntry(entry)));
    }
  }));
