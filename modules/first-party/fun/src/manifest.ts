/**
 * Ordinance First-Party Fun Plugin — Manifest
 */

import type { PluginManifest } from '@ordinance/plugin-loader';

export const FUN_MANIFEST: PluginManifest = {
  plugin_id: 'fun',
  name: 'Fun',
  description: 'Commands for trying out access rules',
  author: 'Ordinance',
  version: '0.1.0',
  commands: [
    {
      name: 'slap',
      access: 'slap',
      grant: ['admin'],
      params: [
        { type: 'number', min: 0, max: 100 },
        { type: 'number', min: 0, max: 10, minRepeats: 0, default: 1 },
      ],
      summary: 'slap for <damage> damage, [times] times',
    },
    {
      name: 'say',
      access: 'say',
      grant: ['admin'],
      params: [{ type: 'string', rest: true }],
      summary: 'say the rest of the line',
    },
  ],
};
