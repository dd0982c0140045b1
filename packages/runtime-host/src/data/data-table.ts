/**
 * Ordinance Runtime Host — Data Tables
 *
 * A small keyed row store for host-level data (plugin state, per-user
 * settings). Rows are addressed by a primary key and hold declared scalar
 * keys plus declared key-value lists. Each table persists as
 * `state/<name>.json` through StateIO.
 *
 * The access kernel never reads data tables; the permission graph is
 * rebuilt from declarations at start.
 */

import type { StateIO } from '../state/state-io.js';

export type FieldType = 'string' | 'number' | 'boolean';
export type FieldValue = string | number | boolean;
export type PrimaryKeyType = 'string' | 'number';
export type PrimaryKey = string | number;

/** A key-value list. Object keys are text; numeric list keys are stored as decimal text. */
export type KeyValueList = { readonly [key: string]: FieldValue };

export type RowData = { readonly [field: string]: FieldValue | KeyValueList };

interface ListSchema {
  readonly keyType: FieldType;
  readonly valueType: FieldType;
}

interface StoredTable {
  readonly rows: Record<string, RowData>;
}

const RESERVED_KEYS: ReadonlySet<string> = new Set(['key', 'value']);
const TABLE_NAME = /^[A-Za-z0-9_-]+$/;

export class DataTableError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DataTableError';
  }
}

export class DataTable {
  private readonly keys = new Map<string, FieldType>();
  private readonly lists = new Map<string, ListSchema>();
  private rows: Map<string, RowData> | undefined;
  private inTransaction = false;

  constructor(
    private readonly stateIO: StateIO,
    readonly name: string,
    readonly primaryKey: string,
    readonly primaryKeyType: PrimaryKeyType,
  ) {
    if (!TABLE_NAME.test(name)) {
      throw new DataTableError(`invalid table name "${name}"`);
    }
    if (RESERVED_KEYS.has(primaryKey)) {
      throw new DataTableError(`cannot have a primary key name of "${primaryKey}", "key" and "value" are reserved`);
    }
  }

  private get filename(): string {
    return `${this.name}.json`;
  }

  /** Declare a scalar key. */
  addKey(name: string, type: FieldType): this {
    this.checkNewField(name);
    this.keys.set(name, type);
    return this;
  }

  /** Declare a key-value list. */
  addKeyValueList(name: string, keyType: FieldType, valueType: FieldType): this {
    this.checkNewField(name);
    this.lists.set(name, { keyType, valueType });
    return this;
  }

  /**
   * Insert or replace the row at `pk`. Every field in `data` must be a
   * declared key or list of the declared type. Returns a copy of the stored row.
   */
  insert(pk: PrimaryKey, data: RowData = {}): RowData {
    this.checkPrimaryKey(pk);
    const row: Record<string, FieldValue | KeyValueList> = {};
    for (const [field, value] of Object.entries(data)) {
      if (field === this.primaryKey) {
        if (value !== pk) {
          throw new DataTableError(`row field "${field}" disagrees with primary key ${JSON.stringify(pk)}`);
        }
        continue;
      }
      row[field] = this.checkField(field, value);
    }
    row[this.primaryKey] = pk;

    this.load().set(String(pk), row);
    this.save();
    return copyRow(row);
  }

  /** A copy of the row at `pk`, or undefined. */
  fetch(pk: PrimaryKey): RowData | undefined {
    const row = this.load().get(String(pk));
    return row === undefined ? undefined : copyRow(row);
  }

  /** Remove the row at `pk`. Returns whether a row was removed. */
  remove(pk: PrimaryKey): boolean {
    const removed = this.load().delete(String(pk));
    if (removed) {
      this.save();
    }
    return removed;
  }

  /** Copies of every row, keyed by primary key. */
  getAll(): ReadonlyMap<PrimaryKey, RowData> {
    const all = new Map<PrimaryKey, RowData>();
    for (const row of this.load().values()) {
      const pk = row[this.primaryKey];
      if (typeof pk === 'string' || typeof pk === 'number') {
        all.set(pk, copyRow(row));
      }
    }
    return all;
  }

  /** Remove every row. */
  empty(): void {
    this.load().clear();
    this.save();
  }

  /** Defer persistence until endTransaction(). Transactions do not nest. */
  beginTransaction(): void {
    if (this.inTransaction) {
      throw new DataTableError(`table "${this.name}" is already in a transaction`);
    }
    this.inTransaction = true;
  }

  endTransaction(): void {
    if (!this.inTransaction) {
      throw new DataTableError(`table "${this.name}" is not in a transaction`);
    }
    this.inTransaction = false;
    this.save();
  }

  // -------------------------------------------------------------------------
  // Internal
  // -------------------------------------------------------------------------

  private load(): Map<string, RowData> {
    if (this.rows !== undefined) {
      return this.rows;
    }
    const stored = this.stateIO.readJson(this.filename);
    const rows = new Map<string, RowData>();
    if (stored !== undefined) {
      if (!isStoredTable(stored)) {
        throw new DataTableError(`could not read table "${this.name}", possible corruption`);
      }
      for (const [pk, row] of Object.entries(stored.rows)) {
        rows.set(pk, row);
      }
    }
    this.rows = rows;
    return rows;
  }

  private save(): void {
    if (this.inTransaction || this.rows === undefined) {
      return;
    }
    const stored: StoredTable = { rows: Object.fromEntries(this.rows) };
    this.stateIO.writeJson(this.filename, stored);
  }

  private checkNewField(name: string): void {
    if (name === this.primaryKey || RESERVED_KEYS.has(name)) {
      throw new DataTableError(`"${name}" is reserved in table "${this.name}"`);
    }
    if (this.keys.has(name) || this.lists.has(name)) {
      throw new DataTableError(`key "${name}" is already declared in table "${this.name}"`);
    }
  }

  private checkPrimaryKey(pk: PrimaryKey): void {
    if (typeof pk !== this.primaryKeyType || (typeof pk === 'number' && !Number.isFinite(pk))) {
      throw new DataTableError(`primary key of table "${this.name}" must be a ${this.primaryKeyType}`);
    }
  }

  private checkField(field: string, value: FieldValue | KeyValueList): FieldValue | KeyValueList {
    const keyType = this.keys.get(field);
    if (keyType !== undefined) {
      if (typeof value !== keyType) {
        throw new DataTableError(`key "${field}" of table "${this.name}" must be a ${keyType}`);
      }
      return value;
    }

    const list = this.lists.get(field);
    if (list === undefined) {
      throw new DataTableError(`tried to pass in key "${field}" to table "${this.name}", but key was not registered`);
    }
    if (typeof value !== 'object') {
      throw new DataTableError(`list "${field}" of table "${this.name}" must be an object`);
    }
    const copy: Record<string, FieldValue> = {};
    for (const [key, item] of Object.entries(value)) {
      if (!matchesKeyType(key, list.keyType) || typeof item !== list.valueType) {
        throw new DataTableError(
          `list "${field}" of table "${this.name}" maps ${list.keyType} to ${list.valueType}; ` +
            `got ${JSON.stringify(key)} => ${JSON.stringify(item)}`,
        );
      }
      copy[key] = item;
    }
    return copy;
  }
}

/** Create a data table persisted as `state/<name>.json`. */
export function createDataTable(
  stateIO: StateIO,
  name: string,
  primaryKey: string,
  primaryKeyType: PrimaryKeyType,
): DataTable {
  return new DataTable(stateIO, name, primaryKey, primaryKeyType);
}

function matchesKeyType(key: string, type: FieldType): boolean {
  switch (type) {
    case 'string':
      return true;
    case 'number':
      return key.trim() !== '' && Number.isFinite(Number(key));
    case 'boolean':
      return key === 'true' || key === 'false';
  }
}

function copyRow(row: RowData): RowData {
  const copy: Record<string, FieldValue | KeyValueList> = {};
  for (const [field, value] of Object.entries(row)) {
    copy[field] = typeof value === 'object' ? { ...value } : value;
  }
  return copy;
}

function isFieldValue(value: unknown): value is FieldValue {
  return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';
}

function isRow(value: unknown): value is RowData {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  return Object.values(value).every(
    (field) =>
      isFieldValue(field) ||
      (typeof field === 'object' && field !== null && !Array.isArray(field) && Object.values(field).every(isFieldValue)),
  );
}

function isStoredTable(value: unknown): value is StoredTable {
  if (typeof value !== 'object' || value === null || !('rows' in value)) {
    return false;
  }
  const rows = value.rows;
  return typeof rows === 'object' && rows !== null && !Array.isArray(rows) && Object.values(rows).every(isRow);
}
