/**
 * Ordinance Runtime Host — StateIO Interface
 *
 * A home-scoped, injectable I/O abstraction for reading/writing JSON state
 * files and appending to JSONL log files.
 *
 * Two implementations are provided:
 *   - FileStateIO   — durable file I/O under a home directory
 *   - MemoryStateIO — in-memory I/O for tests and embedded (non-persistent) use
 *
 * Everything stateful (data tables, the plugin registry, the decision log
 * sink) takes a StateIO rather than touching the file system, so tests run
 * against memory and two homes never see each other's files.
 */

import { appendFileSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';

// ---------------------------------------------------------------------------
// StateIO Interface
// ---------------------------------------------------------------------------

/**
 * A home-scoped I/O abstraction for reading, writing, and appending state.
 *
 * All file paths are relative filenames; the implementation resolves them.
 *
 * Invariants:
 * - readJson and writeJson address the `state/` subdirectory
 * - appendLine and readLogRaw address the `logs/` subdirectory
 */
export interface StateIO {
  /**
   * Read and parse a JSON file.
   *
   * Returns undefined if the file does not exist or does not parse. The
   * value is untyped: callers validate its shape before use.
   */
  readJson(filename: string): unknown;

  /**
   * Serialize a value as JSON and write it, replacing any existing file.
   * Creates the state subdirectory if it does not exist.
   */
  writeJson(filename: string, value: unknown): void;

  /**
   * Append a line (a newline is added) to a log file.
   * Creates the logs subdirectory if it does not exist.
   */
  appendLine(logfilename: string, line: string): void;

  /** Raw text of a log file; an empty string if it does not exist. */
  readLogRaw(logfilename: string): string;
}

// ---------------------------------------------------------------------------
// FileStateIO
// ---------------------------------------------------------------------------

/**
 * Durable file-system StateIO for a home directory.
 *
 * Reads and writes JSON state at `<homeDir>/state/<filename>` and appends
 * log lines to `<homeDir>/logs/<logfilename>`.
 *
 * Synchronous I/O matches the console's single-process, synchronous design.
 * ENOENT and SyntaxError are recoverable (undefined is returned); other I/O
 * errors are rethrown for the operator to address.
 */
export class FileStateIO implements StateIO {
  constructor(private readonly homeDir: string) {}

  readJson(filename: string): unknown {
    const filePath = join(this.homeDir, 'state', filename);
    try {
      const raw = readFileSync(filePath, 'utf-8');
      return JSON.parse(raw) as unknown;
    } catch (err: unknown) {
      if (err instanceof SyntaxError || isNodeError(err, 'ENOENT')) {
        return undefined;
      }
      throw err;
    }
  }

  writeJson(filename: string, value: unknown): void {
    const subDir = join(this.homeDir, 'state');
    mkdirSync(subDir, { recursive: true });
    writeFileSync(join(subDir, filename), JSON.stringify(value, null, 2), 'utf-8');
  }

  appendLine(logfilename: string, line: string): void {
    const logsDir = join(this.homeDir, 'logs');
    mkdirSync(logsDir, { recursive: true });
    appendFileSync(join(logsDir, logfilename), line + '\n', 'utf-8');
  }

  readLogRaw(logfilename: string): string {
    try {
      return readFileSync(join(this.homeDir, 'logs', logfilename), 'utf-8');
    } catch (err: unknown) {
      if (isNodeError(err, 'ENOENT')) {
        return '';
      }
      throw err;
    }
  }
}

// ---------------------------------------------------------------------------
// MemoryStateIO
// ---------------------------------------------------------------------------

/**
 * In-memory StateIO. Multiple instances are completely isolated.
 *
 * Values round-trip through JSON text on write, so tests see the same
 * serialization effects as FileStateIO (undefined members dropped, etc.).
 */
export class MemoryStateIO implements StateIO {
  private readonly store: Map<string, string> = new Map();
  private readonly logs: Map<string, string[]> = new Map();

  readJson(filename: string): unknown {
    const raw = this.store.get(filename);
    return raw === undefined ? undefined : (JSON.parse(raw) as unknown);
  }

  writeJson(filename: string, value: unknown): void {
    this.store.set(filename, JSON.stringify(value));
  }

  appendLine(logfilename: string, line: string): void {
    const lines = this.logs.get(logfilename) ?? [];
    lines.push(line);
    this.logs.set(logfilename, lines);
  }

  /**
   * Every line appended to a log file. Specific to MemoryStateIO, for tests
   * that check log output without the file system.
   */
  readLines(logfilename: string): ReadonlyArray<string> {
    return this.logs.get(logfilename) ?? [];
  }

  readLogRaw(logfilename: string): string {
    const lines = this.logs.get(logfilename) ?? [];
    if (lines.length === 0) return '';
    // Match FileStateIO: each appendLine adds 'line\n'
    return lines.join('\n') + '\n';
  }
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

/** Narrow an unknown error to a Node.js errno exception with a specific code. */
function isNodeError(err: unknown, code: string): boolean {
  return err instanceof Error && 'code' in err && err.code === code;
}
