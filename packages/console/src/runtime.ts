/**
 * runtime.ts — build the access context, plugins and command gate the
 * console commands and the shell run against.
 *
 * Boot order:
 *   1. register first-party plugins (their accesses exist, ungranted)
 *   2. replay the rules file
 *   3. apply plugin grants
 *   4. restore which plugins were stopped
 */

import { existsSync, readFileSync, writeFileSync } from 'node:fs';
import {
  AccessControl,
  CommandGate,
  applyDeclarations,
  hashDeclarations,
  parseDeclarations,
} from '@ordinance/kernel';
import type { Declaration, ParseError } from '@ordinance/kernel';
import { PluginRegistry } from '@ordinance/plugin-loader';
import { FileLogSink, FileStateIO, readConfig, resolveHome } from '@ordinance/runtime-host';
import type { OrdinanceConfig, StateIO } from '@ordinance/runtime-host';
import { FIRST_PARTY_PLUGINS } from './catalog.js';
import type { CatalogEntry } from './catalog.js';
import { DEFAULT_RULES } from './default-rules.js';

export interface Runtime {
  readonly control: AccessControl;
  readonly plugins: PluginRegistry;
  readonly gate: CommandGate;
  readonly stateIO: StateIO;
  readonly declarationsHash: string;
}

export interface ConsoleRuntime extends Runtime {
  readonly home: string;
  readonly config: OrdinanceConfig;
}

/** The rules file does not parse. Every bad line is reported. */
export class RulesFileError extends Error {
  constructor(
    readonly path: string,
    readonly errors: ReadonlyArray<ParseError>,
  ) {
    super(
      `${path} has ${errors.length} error(s):\n` +
        errors.map((e) => `  line ${e.line}: ${e.message}`).join('\n'),
    );
    this.name = 'RulesFileError';
  }
}

export interface AssembleOptions {
  readonly declarations: ReadonlyArray<Declaration>;
  readonly stateIO: StateIO;
  readonly logDecisions?: boolean;
  readonly plugins?: ReadonlyArray<CatalogEntry>;
  readonly clock?: () => string;
}

/** Wire a runtime from already-parsed declarations. No file access beyond `stateIO`. */
export function assembleRuntime(options: AssembleOptions): Runtime {
  const control = new AccessControl();
  const plugins = new PluginRegistry(control, options.stateIO);
  for (const { manifest, handlers } of options.plugins ?? FIRST_PARTY_PLUGINS) {
    plugins.register(manifest, handlers);
  }

  applyDeclarations(control, options.declarations);
  plugins.applyGrants();
  plugins.applyPersistedState();

  const declarationsHash = hashDeclarations(options.declarations);
  const gate = new CommandGate(control, {
    sink: options.logDecisions === false ? undefined : new FileLogSink(options.stateIO),
    declarationsHash,
    clock: options.clock,
  });
  return { control, plugins, gate, stateIO: options.stateIO, declarationsHash };
}

export interface BuildRuntimeOptions {
  readonly home?: string | undefined;
  readonly env?: NodeJS.ProcessEnv;
}

/**
 * Resolve the home directory, read its config and rules file, and assemble
 * the runtime. A missing rules file is created with the default rules.
 *
 * @throws {RulesFileError} when the rules file does not parse
 */
export function buildRuntime(options: BuildRuntimeOptions = {}): ConsoleRuntime {
  const home = resolveHome({ home: options.home, env: options.env });
  const config = readConfig(home);

  if (!existsSync(config.rulesFile)) {
    writeFileSync(config.rulesFile, DEFAULT_RULES, 'utf-8');
  }
  const parsed = parseDeclarations(readFileSync(config.rulesFile, 'utf-8'));
  if (!parsed.ok) {
    throw new RulesFileError(config.rulesFile, parsed.errors);
  }

  const runtime = assembleRuntime({
    declarations: parsed.declarations,
    stateIO: new FileStateIO(home),
    logDecisions: config.logDecisions,
  });
  return { ...runtime, home, config };
}
