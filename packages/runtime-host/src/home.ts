/**
 * Ordinance Runtime Host — Home Directory and Configuration
 *
 * Resolves the Ordinance home directory using the following precedence:
 *
 *   1. Explicit `home` option (e.g. from the --home CLI flag)
 *   2. ORDINANCE_HOME environment variable
 *   3. Default: ~/.ordinance
 *
 * Everything the console reads or writes lives under the resolved home:
 *
 *   <home>/
 *     config.json       console configuration (optional)
 *     access.rules      declaration file (default location)
 *     state/            data tables (plugins.json, ...)
 *     logs/             decisions.jsonl
 */

import { existsSync, mkdirSync, readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { isAbsolute, join } from 'node:path';

// ---------------------------------------------------------------------------
// Home resolution
// ---------------------------------------------------------------------------

export interface ResolveHomeOptions {
  /** Explicit override, highest precedence. */
  readonly home?: string | undefined;
  /** Environment to read ORDINANCE_HOME from. Default: process.env. */
  readonly env?: NodeJS.ProcessEnv;
}

/**
 * Resolve the Ordinance home directory, creating it if it does not exist.
 *
 * @returns The path to the resolved home directory
 */
export function resolveHome(opts: ResolveHomeOptions = {}): string {
  const env = opts.env ?? process.env;
  const fromEnv = env['ORDINANCE_HOME'];

  let home: string;
  if (typeof opts.home === 'string' && opts.home !== '') {
    home = opts.home;
  } else if (typeof fromEnv === 'string' && fromEnv !== '') {
    home = fromEnv;
  } else {
    home = join(homedir(), '.ordinance');
  }

  if (!existsSync(home)) {
    mkdirSync(home, { recursive: true });
  }
  return home;
}

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export interface OrdinanceConfig {
  /** Declaration file; relative paths resolve against the home directory. */
  readonly rulesFile: string;
  /** Alias the console acts as when none is given. */
  readonly alias: string;
  /** Whether gated commands are appended to logs/decisions.jsonl. */
  readonly logDecisions: boolean;
  /** Lines of shell history kept in memory. */
  readonly historySize: number;
}

export const DEFAULT_CONFIG: OrdinanceConfig = {
  rulesFile: 'access.rules',
  alias: 'console',
  logDecisions: true,
  historySize: 50,
};

/** `<home>/config.json` is present but unreadable or has a field of the wrong type. */
export class ConfigError extends Error {
  constructor(
    readonly field: string | null,
    message: string,
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Read `<home>/config.json`, filling unset fields with defaults.
 *
 * A missing file yields the defaults. `rulesFile` in the result is always
 * absolute.
 *
 * @throws {ConfigError} when the file is not a JSON object or a field has the wrong type
 */
export function readConfig(home: string): OrdinanceConfig {
  const path = join(home, 'config.json');
  let raw: string;
  try {
    raw = readFileSync(path, 'utf-8');
  } catch (err: unknown) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      return withAbsoluteRules(home, DEFAULT_CONFIG);
    }
    throw err;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new ConfigError(null, `${path} is not valid JSON`);
  }
  return withAbsoluteRules(home, parseConfig(parsed));
}

/**
 * Validate a parsed config object. Unknown fields are ignored.
 *
 * @internal exported for tests
 */
export function parseConfig(value: unknown): OrdinanceConfig {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new ConfigError(null, 'config must be a JSON object');
  }
  const fields = new Map(Object.entries(value));

  const rulesFile = optional(fields, 'rulesFile', 'string', DEFAULT_CONFIG.rulesFile);
  const alias = optional(fields, 'alias', 'string', DEFAULT_CONFIG.alias);
  const logDecisions = optional(fields, 'logDecisions', 'boolean', DEFAULT_CONFIG.logDecisions);
  const historySize = optional(fields, 'historySize', 'number', DEFAULT_CONFIG.historySize);

  if (rulesFile === '') {
    throw new ConfigError('rulesFile', 'config field "rulesFile" must not be empty');
  }
  if (alias === '') {
    throw new ConfigError('alias', 'config field "alias" must not be empty');
  }
  if (!Number.isInteger(historySize) || historySize < 0) {
    throw new ConfigError('historySize', 'config field "historySize" must be a non-negative integer');
  }
  return { rulesFile, alias, logDecisions, historySize };
}

type FieldType = { string: string; number: number; boolean: boolean };

function optional<K extends keyof FieldType>(
  fields: ReadonlyMap<string, unknown>,
  name: string,
  type: K,
  fallback: FieldType[K],
): FieldType[K] {
  const value = fields.get(name);
  if (value === undefined) {
    return fallback;
  }
  if (!isType(value, type)) {
    throw new ConfigError(name, `config field "${name}" must be a ${type}`);
  }
  return value;
}

function isType<K extends keyof FieldType>(value: unknown, type: K): value is FieldType[K] {
  return typeof value === type;
}

function withAbsoluteRules(home: string, config: OrdinanceConfig): OrdinanceConfig {
  return isAbsolute(config.rulesFile) ? config : { ...config, rulesFile: join(home, config.rulesFile) };
}
