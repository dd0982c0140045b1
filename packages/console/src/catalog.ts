/**
 * catalog.ts — first-party plugins loaded by every console runtime.
 */

import { FUN_HANDLERS, FUN_MANIFEST } from '@ordinance/plugin-fun';
import { PLUGIN_MANAGEMENT_HANDLERS, PLUGIN_MANAGEMENT_MANIFEST } from '@ordinance/plugin-management';
import type { PluginHandlers, PluginManifest } from '@ordinance/plugin-loader';

export interface CatalogEntry {
  readonly manifest: PluginManifest;
  readonly handlers: PluginHandlers;
}

export const FIRST_PARTY_PLUGINS: ReadonlyArray<CatalogEntry> = [
  { manifest: PLUGIN_MANAGEMENT_MANIFEST, handlers: PLUGIN_MANAGEMENT_HANDLERS },
  { manifest: FUN_MANIFEST, handlers: FUN_HANDLERS },
];
