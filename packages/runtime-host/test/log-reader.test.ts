/**
 * Ordinance Runtime Host — Decision Log Reader Tests
 *
 *   valid entries are parsed and returned
 *   malformed lines and non-decision objects are dropped and counted
 *   duplicate event_ids are dropped (first seen wins)
 *   a partial trailing line is dropped and flagged
 *   entries are sorted by (timestamp asc, event_id asc)
 *
 * Tests are pure: no I/O, no clock dependency, no state.
 */

import { describe, it, expect } from 'vitest';
import { readDecisionLog } from '../src/logging/log-reader.js';

function line(eventId: string, timestamp: string, extra: Record<string, unknown> = {}): string {
  return JSON.stringify({
    event_id: eventId,
    alias: 'user1',
    principal: 'user1',
    command: 'slap',
    access: 'slap',
    args: ['50'],
    allowed: true,
    condition: null,
    error: null,
    declarations_hash: null,
    timestamp,
    ...extra,
  });
}

describe('readDecisionLog', () => {
  it('returns zero stats for empty input', () => {
    expect(readDecisionLog('')).toEqual({
      entries: [],
      stats: { totalLines: 0, parsedEntries: 0, duplicates: 0, parseErrors: 0, partialTrailingLine: false },
    });
  });

  it('parses valid lines and skips blank ones', () => {
    const raw = [line('a', '2026-01-01T00:00:01.000Z'), '', line('b', '2026-01-01T00:00:02.000Z')].join('\n') + '\n';
    const result = readDecisionLog(raw);
    expect(result.stats.totalLines).toBe(2);
    expect(result.stats.parsedEntries).toBe(2);
    expect(result.entries.map((e) => e.event_id)).toEqual(['a', 'b']);
  });

  it('drops lines that are not JSON or not decision entries', () => {
    const raw =
      [
        line('a', '2026-01-01T00:00:01.000Z'),
        'not json',
        JSON.stringify({ event_id: 'x' }),
        line('b', '2026-01-01T00:00:02.000Z', { allowed: 'yes' }),
        line('c', '2026-01-01T00:00:03.000Z', { args: [{}] }),
      ].join('\n') + '\n';
    const result = readDecisionLog(raw);
    expect(result.stats.totalLines).toBe(5);
    expect(result.stats.parseErrors).toBe(4);
    expect(result.entries.map((e) => e.event_id)).toEqual(['a']);
  });

  it('keeps the first of duplicate event_ids', () => {
    const raw =
      [
        line('a', '2026-01-01T00:00:01.000Z', { command: 'first' }),
        line('a', '2026-01-01T00:00:01.000Z', { command: 'second' }),
      ].join('\n') + '\n';
    const result = readDecisionLog(raw);
    expect(result.stats.duplicates).toBe(1);
    expect(result.entries.map((e) => e.command)).toEqual(['first']);
  });

  it('drops and flags a partial trailing line', () => {
    const raw = line('a', '2026-01-01T00:00:01.000Z') + '\n' + '{"event_id":"b","ali';
    const result = readDecisionLog(raw);
    expect(result.stats.partialTrailingLine).toBe(true);
    expect(result.stats.totalLines).toBe(1);
    expect(result.stats.parseErrors).toBe(0);
    expect(result.entries).toHaveLength(1);
  });

  it('sorts by timestamp then event_id', () => {
    const raw =
      [
        line('c', '2026-01-01T00:00:02.000Z'),
        line('b', '2026-01-01T00:00:01.000Z'),
        line('a', '2026-01-01T00:00:02.000Z'),
      ].join('\n') + '\n';
    expect(readDecisionLog(raw).entries.map((e) => e.event_id)).toEqual(['b', 'a', 'c']);
  });
});
