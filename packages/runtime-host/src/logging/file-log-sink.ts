/**
 * Ordinance Runtime Host — File-backed Decision Log Sink
 *
 * Implements the LogSink interface from @ordinance/kernel by appending one
 * JSONL line per decision to `logs/decisions.jsonl` through the injected
 * StateIO.
 *
 * The kernel owns the LogSink interface and the DecisionLogger class. This
 * is the only place in the system that writes decision log entries to disk.
 *
 * The sink is synchronous: the write completes before the call returns.
 */

import { randomUUID } from 'node:crypto';
import type { DecisionLogEntry, LogSink } from '@ordinance/kernel';
import type { StateIO } from '../state/state-io.js';

export const DECISION_LOG_FILE = 'decisions.jsonl';

export class FileLogSink implements LogSink {
  constructor(
    private readonly stateIO: StateIO,
    private readonly newId: () => string = randomUUID,
  ) {}

  append(entry: DecisionLogEntry): void {
    this.stateIO.appendLine(DECISION_LOG_FILE, JSON.stringify({ event_id: this.newId(), ...entry }));
  }
}
