/**
 * Ordinance Runtime Host — Decision Log Reader
 *
 * Pure function for reading `decisions.jsonl`. Accepts the raw JSONL text and
 * returns the entries with reading statistics.
 *
 * Guarantees:
 * - valid entries are returned; malformed lines are dropped and counted
 * - entries sharing an event_id are deduplicated (first seen wins)
 * - content not ending in '\n' has its last line dropped and flagged
 * - entries are sorted by (timestamp asc, event_id asc)
 *
 * No I/O. Callers obtain the raw content via StateIO.readLogRaw().
 */

import type { DecisionLogEntry } from '@ordinance/kernel';

/** A decision log entry as persisted by FileLogSink. */
export interface LoggedDecision extends DecisionLogEntry {
  readonly event_id: string;
}

export interface LogReadStats {
  /** Non-empty lines processed (partial trailing line excluded). */
  readonly totalLines: number;
  /** Entries returned. */
  readonly parsedEntries: number;
  /** Entries dropped because their event_id was already seen. */
  readonly duplicates: number;
  /** Lines dropped because they were not JSON or not a decision entry. */
  readonly parseErrors: number;
  /** The content did not end with '\n'; the last line was dropped. */
  readonly partialTrailingLine: boolean;
}

export interface LogReadResult {
  readonly entries: ReadonlyArray<LoggedDecision>;
  readonly stats: LogReadStats;
}

export function readDecisionLog(rawContent: string): LogReadResult {
  const partialTrailingLine = rawContent.length > 0 && !rawContent.endsWith('\n');
  const rawLines = rawContent.split('\n');
  const lineList = (partialTrailingLine ? rawLines.slice(0, -1) : rawLines).filter((l) => l.length > 0);

  let duplicates = 0;
  let parseErrors = 0;
  const seen = new Set<string>();
  const entries: LoggedDecision[] = [];

  for (const line of lineList) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch {
      parseErrors++;
      continue;
    }

    if (!isLoggedDecision(parsed)) {
      parseErrors++;
      continue;
    }
    if (seen.has(parsed.event_id)) {
      duplicates++;
      continue;
    }
    seen.add(parsed.event_id);
    entries.push(parsed);
  }

  entries.sort((a, b) => {
    if (a.timestamp !== b.timestamp) return a.timestamp < b.timestamp ? -1 : 1;
    if (a.event_id !== b.event_id) return a.event_id < b.event_id ? -1 : 1;
    return 0;
  });

  return {
    entries,
    stats: {
      totalLines: lineList.length,
      parsedEntries: entries.length,
      duplicates,
      parseErrors,
      partialTrailingLine,
    },
  };
}

function isLoggedDecision(value: unknown): value is LoggedDecision {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  const f = new Map(Object.entries(value));
  const nullableString = (key: string): boolean => f.get(key) === null || typeof f.get(key) === 'string';
  const args = f.get('args');
  const condition = f.get('condition');

  return (
    typeof f.get('event_id') === 'string' &&
    typeof f.get('timestamp') === 'string' &&
    typeof f.get('alias') === 'string' &&
    typeof f.get('command') === 'string' &&
    typeof f.get('access') === 'string' &&
    typeof f.get('allowed') === 'boolean' &&
    nullableString('principal') &&
    nullableString('error') &&
    nullableString('declarations_hash') &&
    Array.isArray(args) &&
    args.every((a) => typeof a === 'string' || typeof a === 'number') &&
    (condition === null || isConditionJSON(condition))
  );
}

function isConditionJSON(value: unknown): boolean {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const f = new Map(Object.entries(value));
  return typeof f.get('kind') === 'string' && typeof f.get('message') === 'string';
}
