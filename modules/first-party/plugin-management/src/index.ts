/**
 * @ordinance/plugin-management
 *
 * First-party plugin exposing plugin_list, plugin_start and plugin_stop.
 */

export { PLUGIN_MANAGEMENT_ID, PLUGIN_MANAGEMENT_MANIFEST } from './manifest.js';
export { PLUGIN_MANAGEMENT_HANDLERS, pluginList, pluginStart, pluginStop } from './execute.js';
