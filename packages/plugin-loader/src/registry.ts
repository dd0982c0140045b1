/**
 * Ordinance Plugin Loader — Plugin Registry
 *
 * The PluginRegistry is the authoritative record of loaded plugins, whether
 * each is running, and the command table built from the running ones.
 *
 * Lifecycle at boot:
 * 1. register() every plugin. Each command's access tag and parameters are
 *    registered with the AccessControl, ungranted.
 * 2. Replay the declaration file. Rules may now restrict or deny plugin
 *    accesses like any other.
 * 3. applyGrants(). Each access is granted to the groups its commands name.
 * 4. applyPersistedState(). Plugins stopped in an earlier session stay
 *    stopped.
 *
 * Registered plugins start running. Stopped plugin ids are persisted in the
 * `plugins` data table, so stop/start survives a restart.
 */

import { Permission, RegistrationError, buildParameter } from '@ordinance/kernel';
import type { AccessControl, Principal } from '@ordinance/kernel';
import { createDataTable } from '@ordinance/runtime-host';
import type { DataTable, StateIO } from '@ordinance/runtime-host';
import { PluginError } from './errors.js';
import type {
  CommandHandler,
  PluginCommand,
  PluginControl,
  PluginHandlers,
  PluginManifest,
  PluginStatus,
} from './types.js';
import { validateManifest } from './validator.js';

export const PLUGIN_TABLE = 'plugins';

/** A command of a running plugin, ready to be gated and run. */
export interface ResolvedCommand {
  readonly plugin: PluginManifest;
  readonly command: PluginCommand;
  readonly permission: Permission;
  readonly handler: CommandHandler;
}

interface PluginEntry {
  readonly manifest: PluginManifest;
  readonly handlers: PluginHandlers;
  running: boolean;
}

export class PluginRegistry implements PluginControl {
  private readonly entries = new Map<string, PluginEntry>();
  /** Command name → owning plugin id. */
  private readonly commandOwners = new Map<string, string>();
  private readonly table: DataTable;
  private grantsApplied = false;

  constructor(
    private readonly control: AccessControl,
    stateIO: StateIO,
  ) {
    this.table = createDataTable(stateIO, PLUGIN_TABLE, 'plugin_id', 'string').addKey('running', 'boolean');
  }

  /**
   * Register a plugin and the accesses its commands are gated by. Every
   * command needs a handler. Manifest, handler, name and parameter
   * checks all run before the first access is registered, so a rejected
   * plugin leaves no access behind.
   */
  register(manifest: PluginManifest, handlers: PluginHandlers): void {
    const validation = validateManifest(manifest);
    if (!validation.ok) {
      const messages = validation.errors.map((e) => e.message).join('; ');
      throw new PluginError(`plugin "${manifest.plugin_id}" is invalid: ${messages}`);
    }
    if (this.entries.has(manifest.plugin_id)) {
      throw new PluginError(`plugin "${manifest.plugin_id}" is already registered`);
    }
    if (this.grantsApplied) {
      throw new PluginError(`plugin "${manifest.plugin_id}" registered after grants were applied`);
    }

    for (const command of manifest.commands) {
      if (handlers[command.name] === undefined) {
        throw new PluginError(`plugin "${manifest.plugin_id}" has no handler for command "${command.name}"`);
      }
      const owner = this.commandOwners.get(command.name);
      if (owner !== undefined) {
        throw new PluginError(`command "${command.name}" is already provided by plugin "${owner}"`);
      }
    }
    const tags = new Set(manifest.commands.map((c) => c.access));
    for (const tag of tags) {
      if (this.control.getPermission(tag) !== undefined) {
        throw new PluginError(`access "${tag}" is already registered`);
      }
    }

    // Every parameter list is built before the first access is registered.
    const drafts = new Map<string, Permission>();
    for (const command of manifest.commands) {
      if (drafts.has(command.access)) {
        continue;
      }
      const draft = new Permission(command.access);
      try {
        for (const spec of command.params) {
          draft.addParam(buildParameter(spec));
        }
      } catch (err) {
        if (err instanceof RegistrationError) {
          throw new PluginError(`plugin "${manifest.plugin_id}", command "${command.name}": ${err.message}`);
        }
        throw err;
      }
      drafts.set(command.access, draft);
    }

    for (const draft of drafts.values()) {
      const permission = this.control.register(draft.tag);
      for (const param of draft.params) {
        permission.addParam(param);
      }
    }

    for (const command of manifest.commands) {
      this.commandOwners.set(command.name, manifest.plugin_id);
    }
    this.entries.set(manifest.plugin_id, { manifest, handlers, running: true });
  }

  /**
   * Grant each plugin access to the groups its commands name. A grant
   * reaches the group and every group or user cloned from it that holds
   * no grant of its own for the access; explicit denies still dominate.
   */
  applyGrants(): void {
    if (this.grantsApplied) {
      throw new PluginError('plugin grants were already applied');
    }
    const principals = [...this.control.listGroups(), ...this.control.listUsers()];

    for (const { manifest } of this.entries.values()) {
      for (const command of manifest.commands) {
        const permission = this.permissionFor(command);
        for (const groupName of command.grant) {
          const group = this.control.getGroup(groupName);
          if (group === undefined) {
            throw new PluginError(
              `plugin "${manifest.plugin_id}" grants "${command.access}" to unknown group "${groupName}"`,
            );
          }
          for (const principal of principals) {
            if (descendsFrom(principal, group) && principal.grantFor(permission) === undefined) {
              principal.allowBlanket(permission);
            }
          }
        }
      }
    }
    this.grantsApplied = true;
  }

  /** Restore which plugins were stopped in an earlier session. */
  applyPersistedState(): void {
    for (const [pluginId, row] of this.table.getAll()) {
      const entry = typeof pluginId === 'string' ? this.entries.get(pluginId) : undefined;
      if (entry !== undefined && row['running'] === false) {
        entry.running = false;
      }
    }
  }

  start(pluginId: string): void {
    this.setRunning(pluginId, true);
  }

  stop(pluginId: string): void {
    this.setRunning(pluginId, false);
  }

  list(): ReadonlyArray<PluginStatus> {
    return [...this.entries.values()].map(status);
  }

  /** Find a plugin by id or display name, ignoring case. */
  find(name: string): PluginStatus | undefined {
    const wanted = name.trim().toLowerCase();
    for (const entry of this.entries.values()) {
      if (entry.manifest.plugin_id === wanted || entry.manifest.name.toLowerCase() === wanted) {
        return status(entry);
      }
    }
    return undefined;
  }

  /** Look up a command of a running plugin. */
  resolveCommand(name: string): ResolvedCommand | undefined {
    const pluginId = this.commandOwners.get(name);
    const entry = pluginId === undefined ? undefined : this.entries.get(pluginId);
    if (entry === undefined || !entry.running) {
      return undefined;
    }
    const command = entry.manifest.commands.find((c) => c.name === name);
    const handler = entry.handlers[name];
    if (command === undefined || handler === undefined) {
      return undefined;
    }
    return { plugin: entry.manifest, command, permission: this.permissionFor(command), handler };
  }

  /** Commands of every running plugin, in registration order. */
  commands(): ReadonlyArray<ResolvedCommand> {
    const resolved: ResolvedCommand[] = [];
    for (const name of this.commandOwners.keys()) {
      const command = this.resolveCommand(name);
      if (command !== undefined) {
        resolved.push(command);
      }
    }
    return resolved;
  }

  // -------------------------------------------------------------------------
  // Internal
  // -------------------------------------------------------------------------

  private setRunning(pluginId: string, running: boolean): void {
    const entry = this.entries.get(pluginId);
    if (entry === undefined) {
      throw new PluginError(`plugin "${pluginId}" is not registered`);
    }
    entry.running = running;
    this.table.insert(pluginId, { running });
  }

  private permissionFor(command: PluginCommand): Permission {
    const permission = this.control.getPermission(command.access);
    if (permission === undefined) {
      throw new PluginError(`access "${command.access}" of command "${command.name}" is not registered`);
    }
    return permission;
  }
}

function status(entry: PluginEntry): PluginStatus {
  return { manifest: entry.manifest, running: entry.running };
}

function descendsFrom(principal: Principal, group: Principal): boolean {
  for (let p: Principal | undefined = principal; p !== undefined; p = p.parent) {
    if (p === group) {
      return true;
    }
  }
  return false;
}
