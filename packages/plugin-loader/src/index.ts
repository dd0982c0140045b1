/**
 * @ordinance/plugin-loader
 *
 * Plugin manifests, manifest validation, and the plugin registry that turns
 * running plugins into a gated command table.
 */

export { PluginError } from './errors.js';
export { PLUGIN_TABLE, PluginRegistry } from './registry.js';
export type { ResolvedCommand } from './registry.js';
export { validateManifest } from './validator.js';
export type { ManifestError, ManifestValidation } from './validator.js';
export type {
  CommandContext,
  CommandHandler,
  PluginCommand,
  PluginControl,
  PluginHandlers,
  PluginManifest,
  PluginStatus,
} from './types.js';
