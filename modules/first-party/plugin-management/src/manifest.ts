/**
 * Ordinance First-Party Plugin Management — Manifest
 *
 * plugin_list takes no arguments; plugin_start and plugin_stop take the
 * plugin's name as the rest of the line, so names with spaces need no quotes.
 * All three are granted to `admin`.
 */

import type { PluginManifest } from '@ordinance/plugin-loader';

export const PLUGIN_MANAGEMENT_ID = 'plugin-management';

export const PLUGIN_MANAGEMENT_MANIFEST: PluginManifest = {
  plugin_id: PLUGIN_MANAGEMENT_ID,
  name: 'Plugin Management',
  description: 'Lets you manage your plugins',
  author: 'Ordinance',
  version: '0.1.0',
  commands: [
    {
      name: 'plugin_list',
      access: 'plugin_list',
      grant: ['admin'],
      params: [],
      summary: 'list plugins and whether they are running',
    },
    {
      name: 'plugin_start',
      access: 'plugin_start',
      grant: ['admin'],
      params: [{ type: 'string', rest: true }],
      summary: 'start a stopped plugin',
    },
    {
      name: 'plugin_stop',
      access: 'plugin_stop',
      grant: ['admin'],
      params: [{ type: 'string', rest: true }],
      summary: 'stop a running plugin',
    },
  ],
};
