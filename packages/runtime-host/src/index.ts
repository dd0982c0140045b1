/**
 * @ordinance/runtime-host
 *
 * Side-effectful host layer: state I/O, home directory and configuration,
 * the file-backed decision log sink and reader, and data tables.
 *
 * The kernel stays free of I/O; everything that touches the file system for
 * it lives here and is injected.
 */

export { FileStateIO, MemoryStateIO } from './state/state-io.js';
export type { StateIO } from './state/state-io.js';

export { ConfigError, DEFAULT_CONFIG, parseConfig, readConfig, resolveHome } from './home.js';
export type { OrdinanceConfig, ResolveHomeOptions } from './home.js';

export { DECISION_LOG_FILE, FileLogSink } from './logging/file-log-sink.js';
export { readDecisionLog } from './logging/log-reader.js';
export type { LogReadResult, LogReadStats, LoggedDecision } from './logging/log-reader.js';

export { DataTable, DataTableError, createDataTable } from './data/data-table.js';
export type {
  FieldType,
  FieldValue,
  KeyValueList,
  PrimaryKey,
  PrimaryKeyType,
  RowData,
} from './data/data-table.js';
