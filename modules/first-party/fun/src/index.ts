/**
 * @ordinance/plugin-fun
 *
 * First-party demo plugin: slap and say.
 */

export { FUN_MANIFEST } from './manifest.js';
export { FUN_HANDLERS, say, slap } from './execute.js';
