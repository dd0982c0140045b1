/**
 * Ordinance Plugin Loader — Errors
 */

/** A plugin that cannot be registered, started or stopped as asked. */
export class PluginError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PluginError';
  }
}
