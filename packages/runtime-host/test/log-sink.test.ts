/**
 * Ordinance Runtime Host — FileLogSink Tests
 *
 * Every appended entry becomes one JSONL line carrying an event_id and the
 * full decision entry. Uses MemoryStateIO: no file system I/O.
 */

import { describe, it, expect } from 'vitest';
import { ConditionKind, DeniedLevel } from '@ordinance/kernel';
import type { DecisionLogEntry } from '@ordinance/kernel';
import { DECISION_LOG_FILE, FileLogSink } from '../src/logging/file-log-sink.js';
import { readDecisionLog } from '../src/logging/log-reader.js';
import { MemoryStateIO } from '../src/state/state-io.js';

function makeEntry(overrides: Partial<DecisionLogEntry> = {}): DecisionLogEntry {
  return {
    alias: 'user1',
    principal: 'user1',
    command: 'slap',
    access: 'slap',
    args: ['50'],
    allowed: true,
    condition: null,
    error: null,
    declarations_hash: 'abc123',
    timestamp: '2026-01-01T00:00:00.000Z',
    ...overrides,
  };
}

describe('FileLogSink', () => {
  it('writes one line per entry to decisions.jsonl', () => {
    const stateIO = new MemoryStateIO();
    const sink = new FileLogSink(stateIO, () => 'evt-1');
    sink.append(makeEntry());

    const lines = stateIO.readLines(DECISION_LOG_FILE);
    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0] ?? '')).toEqual({ event_id: 'evt-1', ...makeEntry() });
  });

  it('gives each entry a distinct random event_id by default', () => {
    const stateIO = new MemoryStateIO();
    const sink = new FileLogSink(stateIO);
    sink.append(makeEntry());
    sink.append(makeEntry());

    const ids = stateIO.readLines(DECISION_LOG_FILE).map((line) => {
      const parsed: unknown = JSON.parse(line);
      return typeof parsed === 'object' && parsed !== null && 'event_id' in parsed ? parsed.event_id : undefined;
    });
    expect(ids[0]).toMatch(/^[0-9a-f-]{36}$/);
    expect(ids[0]).not.toBe(ids[1]);
  });

  it('writes entries the reader accepts', () => {
    const stateIO = new MemoryStateIO();
    let n = 0;
    const sink = new FileLogSink(stateIO, () => `evt-${++n}`);
    sink.append(makeEntry());
    sink.append(
      makeEntry({
        alias: 'user2',
        principal: null,
        allowed: false,
        condition: {
          kind: ConditionKind.AccessDenied,
          level: DeniedLevel.NoAccess,
          parameterIndex: null,
          message: 'access denied',
        },
        timestamp: '2026-01-01T00:00:01.000Z',
      }),
    );

    const result = readDecisionLog(stateIO.readLogRaw(DECISION_LOG_FILE));
    expect(result.stats.parseErrors).toBe(0);
    expect(result.entries.map((e) => e.event_id)).toEqual(['evt-1', 'evt-2']);
    expect(result.entries[1]?.condition?.message).toBe('access denied');
  });
});
