/**
 * Ordinance First-Party Fun Plugin — Command Handlers
 */

import type { CommandHandler, PluginHandlers } from '@ordinance/plugin-loader';

export const slap: CommandHandler = (ctx, damage, times) => {
  ctx.output(`${ctx.alias} slaps ${String(times)} time(s) for ${String(damage)} damage`);
};

export const say: CommandHandler = (ctx, text) => {
  ctx.output(`${ctx.alias}: ${String(text)}`);
};

export const FUN_HANDLERS: PluginHandlers = { slap, say };
