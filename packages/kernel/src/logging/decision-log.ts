/**
 * Ordinance Kernel — Decision Logger
 *
 * Records decision log entries through an optional sink, and keeps the most
 * recent entries in memory for inspection.
 */

import type { LogSink } from './log-sink.js';
import type { DecisionLogEntry } from './types.js';

const DEFAULT_RETAINED = 100;

/**
 * Records decision log entries.
 *
 * The sink is optional: without one (tests, embedded use) entries are only
 * retained in memory. The command gate calls record() in a finally block so
 * that every decision is recorded.
 */
export class DecisionLogger {
  private readonly recent: DecisionLogEntry[] = [];

  constructor(
    private readonly sink?: LogSink,
    private readonly retain: number = DEFAULT_RETAINED,
  ) {}

  record(entry: DecisionLogEntry): void {
    this.recent.push(entry);
    if (this.recent.length > this.retain) {
      this.recent.shift();
    }
    this.sink?.append(entry);
  }

  /** Most recent entries, oldest first, optionally filtered by alias. */
  query(alias?: string): ReadonlyArray<DecisionLogEntry> {
    return alias === undefined ? [...this.recent] : this.recent.filter((e) => e.alias === alias);
  }
}
