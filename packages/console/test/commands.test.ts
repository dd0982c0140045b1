/**
 * Ordinance Console — Command Helper Tests
 *
 *   log/selectEntries filters by alias and outcome and keeps the newest
 *   log/formatEntry renders allowed, failed and denied decisions
 *   run/joinWords re-quotes words containing whitespace
 */

import { describe, it, expect } from 'vitest';
import { ConditionKind, DeniedLevel } from '@ordinance/kernel';
import type { LoggedDecision } from '@ordinance/runtime-host';
import { formatEntry, selectEntries } from '../src/commands/log.js';
import { joinWords } from '../src/commands/run.js';

function decision(eventId: string, alias: string, allowed: boolean, extra: Partial<LoggedDecision> = {}): LoggedDecision {
  return {
    event_id: eventId,
    alias,
    principal: alias,
    command: 'slap',
    access: 'slap',
    args: ['50'],
    allowed,
    condition: null,
    error: null,
    declarations_hash: null,
    timestamp: `2026-01-01T00:00:0${eventId}.000Z`,
    ...extra,
  };
}

const ENTRIES: ReadonlyArray<LoggedDecision> = [
  decision('1', 'user1', true),
  decision('2', 'user2', false),
  decision('3', 'user1', false),
  decision('4', 'user1', true),
];

describe('selectEntries', () => {
  it('filters by alias', () => {
    expect(selectEntries(ENTRIES, { alias: 'user1', limit: 10 }).map((e) => e.event_id)).toEqual(['1', '3', '4']);
  });

  it('keeps only denials', () => {
    expect(selectEntries(ENTRIES, { denied: true, limit: 10 }).map((e) => e.event_id)).toEqual(['2', '3']);
  });

  it('keeps the most recent entries up to the limit', () => {
    expect(selectEntries(ENTRIES, { limit: 2 }).map((e) => e.event_id)).toEqual(['3', '4']);
    expect(selectEntries(ENTRIES, { limit: 0 })).toEqual([]);
  });
});

describe('formatEntry', () => {
  it('renders an allowed decision', () => {
    expect(formatEntry(decision('1', 'user1', true))).toBe('2026-01-01T00:00:01.000Z  user1  slap 50  allowed');
  });

  it('renders a handler failure', () => {
    expect(formatEntry(decision('1', 'user1', true, { error: 'kaboom' }))).toBe(
      '2026-01-01T00:00:01.000Z  user1  slap 50  allowed, failed: kaboom',
    );
  });

  it('renders a denial with its message', () => {
    const entry = decision('2', 'user2', false, {
      args: ['101'],
      condition: {
        kind: ConditionKind.TooHigh,
        level: DeniedLevel.Parameters,
        parameterIndex: 1,
        message: 'specified number 101 is above your allowed maximum of 100',
      },
    });
    expect(formatEntry(entry)).toBe(
      '2026-01-01T00:00:02.000Z  user2  slap 101  denied: specified number 101 is above your allowed maximum of 100',
    );
  });
});

describe('joinWords', () => {
  it('quotes words with whitespace and empty words', () => {
    expect(joinWords(['say', 'hello there', ''])).toBe('say "hello there" ""');
  });

  it('leaves plain words alone', () => {
    expect(joinWords(['slap', '50', '2'])).toBe('slap 50 2');
  });
});
