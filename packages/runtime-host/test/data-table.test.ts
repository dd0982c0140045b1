/**
 * Ordinance Runtime Host — Data Table Tests
 *
 *   rows/insert-fetch, replace, remove, getAll, empty
 *   schema/unregistered key, wrong type, list key and value types
 *   schema/reserved primary key, reserved and duplicate field names
 *   persistence/rows survive a new table on the same StateIO
 *   persistence/transactions defer writes until endTransaction
 *   persistence/corrupt table file is reported
 */

import { describe, it, expect } from 'vitest';
import { DataTable, DataTableError } from '../src/data/data-table.js';
import { MemoryStateIO } from '../src/state/state-io.js';

function settingsTable(io: MemoryStateIO): DataTable {
  return new DataTable(io, 'settings', 'alias', 'string')
    .addKey('volume', 'number')
    .addKey('muted', 'boolean')
    .addKeyValueList('scores', 'number', 'string');
}

describe('DataTable rows', () => {
  it('inserts and fetches a row with the primary key filled in', () => {
    const table = settingsTable(new MemoryStateIO());
    table.insert('user1', { volume: 7, muted: false });
    expect(table.fetch('user1')).toEqual({ alias: 'user1', volume: 7, muted: false });
  });

  it('returns undefined for a missing row', () => {
    expect(settingsTable(new MemoryStateIO()).fetch('nobody')).toBeUndefined();
  });

  it('replaces a row on a second insert', () => {
    const table = settingsTable(new MemoryStateIO());
    table.insert('user1', { volume: 7 });
    table.insert('user1', { muted: true });
    expect(table.fetch('user1')).toEqual({ alias: 'user1', muted: true });
  });

  it('returns copies that do not alias stored rows', () => {
    const table = settingsTable(new MemoryStateIO());
    table.insert('user1', { scores: { '1': 'gold' } });
    const row = table.fetch('user1');
    const scores = row?.['scores'];
    if (typeof scores !== 'object') throw new Error('expected a list');
    expect(scores).toEqual({ '1': 'gold' });
    expect(table.fetch('user1')).not.toBe(row);
  });

  it('removes rows and reports whether one existed', () => {
    const table = settingsTable(new MemoryStateIO());
    table.insert('user1');
    expect(table.remove('user1')).toBe(true);
    expect(table.remove('user1')).toBe(false);
    expect(table.fetch('user1')).toBeUndefined();
  });

  it('getAll keys rows by primary key', () => {
    const table = new DataTable(new MemoryStateIO(), 'counts', 'id', 'number').addKey('hits', 'number');
    table.insert(1, { hits: 10 });
    table.insert(2, { hits: 20 });
    const all = table.getAll();
    expect([...all.keys()]).toEqual([1, 2]);
    expect(all.get(2)).toEqual({ id: 2, hits: 20 });
  });

  it('empty removes every row', () => {
    const table = settingsTable(new MemoryStateIO());
    table.insert('user1');
    table.insert('user2');
    table.empty();
    expect(table.getAll().size).toBe(0);
  });
});

describe('DataTable schema', () => {
  it('rejects an unregistered key', () => {
    const table = settingsTable(new MemoryStateIO());
    expect(() => table.insert('user1', { colour: 'red' })).toThrow(
      'tried to pass in key "colour" to table "settings", but key was not registered',
    );
  });

  it('rejects a value of the wrong type', () => {
    const table = settingsTable(new MemoryStateIO());
    expect(() => table.insert('user1', { volume: 'loud' })).toThrow('key "volume" of table "settings" must be a number');
  });

  it('rejects list entries with the wrong key or value type', () => {
    const table = settingsTable(new MemoryStateIO());
    expect(() => table.insert('user1', { scores: { first: 'gold' } })).toThrow(DataTableError);
    expect(() => table.insert('user1', { scores: { '1': 5 } })).toThrow(DataTableError);
  });

  it('rejects a primary key of the wrong type', () => {
    const table = settingsTable(new MemoryStateIO());
    expect(() => table.insert(5)).toThrow('primary key of table "settings" must be a string');
  });

  it('rejects reserved primary key names', () => {
    expect(() => new DataTable(new MemoryStateIO(), 'bad', 'key', 'string')).toThrow(DataTableError);
    expect(() => new DataTable(new MemoryStateIO(), 'bad', 'value', 'string')).toThrow(DataTableError);
  });

  it('rejects reserved and duplicate field names', () => {
    const table = new DataTable(new MemoryStateIO(), 'plain', 'id', 'string').addKey('a', 'string');
    expect(() => table.addKey('id', 'string')).toThrow('"id" is reserved in table "plain"');
    expect(() => table.addKey('value', 'string')).toThrow(DataTableError);
    expect(() => table.addKeyValueList('a', 'string', 'string')).toThrow(
      'key "a" is already declared in table "plain"',
    );
  });

  it('rejects table names that are not plain file names', () => {
    expect(() => new DataTable(new MemoryStateIO(), '../escape', 'id', 'string')).toThrow(
      'invalid table name "../escape"',
    );
  });
});

describe('DataTable persistence', () => {
  it('writes rows under <name>.json and reloads them in a new table', () => {
    const io = new MemoryStateIO();
    settingsTable(io).insert('user1', { volume: 3 });
    expect(io.readJson('settings.json')).toEqual({ rows: { user1: { volume: 3, alias: 'user1' } } });
    expect(settingsTable(io).fetch('user1')).toEqual({ alias: 'user1', volume: 3 });
  });

  it('defers writes until the transaction ends', () => {
    const io = new MemoryStateIO();
    const table = settingsTable(io);
    table.beginTransaction();
    table.insert('user1', { volume: 1 });
    table.insert('user2', { volume: 2 });
    expect(io.readJson('settings.json')).toBeUndefined();
    table.endTransaction();
    expect(Object.keys(rowsOf(io.readJson('settings.json')))).toEqual(['user1', 'user2']);
  });

  it('does not nest transactions', () => {
    const table = settingsTable(new MemoryStateIO());
    table.beginTransaction();
    expect(() => table.beginTransaction()).toThrow('table "settings" is already in a transaction');
    table.endTransaction();
    expect(() => table.endTransaction()).toThrow('table "settings" is not in a transaction');
  });

  it('reports a corrupt table file', () => {
    const io = new MemoryStateIO();
    io.writeJson('settings.json', { rows: [1, 2] });
    expect(() => settingsTable(io).fetch('user1')).toThrow('could not read table "settings", possible corruption');
  });
});

function rowsOf(stored: unknown): object {
  if (typeof stored !== 'object' || stored === null || !('rows' in stored)) {
    throw new Error('not a stored table');
  }
  const rows = stored.rows;
  if (typeof rows !== 'object' || rows === null) {
    throw new Error('rows missing');
  }
  return rows;
}
