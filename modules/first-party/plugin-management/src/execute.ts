/**
 * Ordinance First-Party Plugin Management — Command Handlers
 *
 * Plugins are looked up by id or display name, ignoring case.
 */

import type { ParamValue } from '@ordinance/kernel';
import type { CommandContext, CommandHandler, PluginHandlers, PluginStatus } from '@ordinance/plugin-loader';
import { PLUGIN_MANAGEMENT_ID } from './manifest.js';

export const pluginList: CommandHandler = (ctx) => {
  for (const { manifest, running } of ctx.plugins.list()) {
    ctx.output(
      `${manifest.name} - ${manifest.description} by ${manifest.author} (${running ? 'running' : 'stopped'})`,
    );
  }
};

export const pluginStart: CommandHandler = (ctx, name) => {
  const found = lookup(ctx, name);
  if (found === undefined) {
    return;
  }
  ctx.plugins.start(found.manifest.plugin_id);
  ctx.output(`${found.manifest.name} started`);
};

export const pluginStop: CommandHandler = (ctx, name) => {
  const found = lookup(ctx, name);
  if (found === undefined) {
    return;
  }
  // Stopping this plugin would also remove plugin_start, with no way back.
  if (found.manifest.plugin_id === PLUGIN_MANAGEMENT_ID) {
    ctx.output(`${found.manifest.name} cannot be stopped`);
    return;
  }
  ctx.plugins.stop(found.manifest.plugin_id);
  ctx.output(`${found.manifest.name} stopped`);
};

export const PLUGIN_MANAGEMENT_HANDLERS: PluginHandlers = {
  plugin_list: pluginList,
  plugin_start: pluginStart,
  plugin_stop: pluginStop,
};

function lookup(ctx: CommandContext, name: ParamValue | undefined): PluginStatus | undefined {
  const wanted = String(name ?? '');
  const status = ctx.plugins.find(wanted);
  if (status === undefined) {
    ctx.output(`${wanted.toLowerCase()} not found`);
  }
  return status;
}
