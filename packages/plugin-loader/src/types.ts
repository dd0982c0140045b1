/**
 * Ordinance Plugin Loader — Plugin Types
 *
 * A plugin is a named bundle of console commands. Each command is gated by
 * an access tag that the plugin registers with the AccessControl, together
 * with the tag's positional parameters and the groups it is granted to.
 */

import type { ParamSpec } from '@ordinance/declaration-dsl';
import type { ParamValue, Principal } from '@ordinance/kernel';

// ---------------------------------------------------------------------------
// Manifest
// ---------------------------------------------------------------------------

export interface PluginCommand {
  /** Command name as typed at the console. */
  readonly name: string;
  /** Access tag the command is gated by. Several commands may share one. */
  readonly access: string;
  /** Groups the access is granted to, without override. */
  readonly grant: ReadonlyArray<string>;
  readonly params: ReadonlyArray<ParamSpec>;
  /** One-line help text. */
  readonly summary?: string;
}

export interface PluginManifest {
  readonly plugin_id: string;
  readonly name: string;
  readonly description: string;
  readonly author: string;
  readonly version: string;
  readonly commands: ReadonlyArray<PluginCommand>;
}

// ---------------------------------------------------------------------------
// Handlers
// ---------------------------------------------------------------------------

/**
 * What a command handler receives besides its arguments. `plugins` is typed
 * structurally so handlers can manage plugins without a cycle back to the
 * registry class.
 */
export interface CommandContext {
  readonly alias: string;
  readonly principal: Principal;
  readonly output: (line: string) => void;
  readonly plugins: PluginControl;
}

export type CommandHandler = (context: CommandContext, ...args: ParamValue[]) => void | Promise<void>;

/** Handlers keyed by command name. */
export type PluginHandlers = Readonly<Record<string, CommandHandler>>;

// ---------------------------------------------------------------------------
// Registry views
// ---------------------------------------------------------------------------

export interface PluginStatus {
  readonly manifest: PluginManifest;
  readonly running: boolean;
}

/** The part of the registry exposed to command handlers. */
export interface PluginControl {
  list(): ReadonlyArray<PluginStatus>;
  find(name: string): PluginStatus | undefined;
  start(pluginId: string): void;
  stop(pluginId: string): void;
}
