/**
 * @ordinance/console
 *
 * The `ordinance` command-line interface and interactive shell, and the
 * runtime assembly and command router they share.
 */

export { FIRST_PARTY_PLUGINS } from './catalog.js';
export type { CatalogEntry } from './catalog.js';
export { RulesFileError, assembleRuntime, buildRuntime } from './runtime.js';
export type { AssembleOptions, BuildRuntimeOptions, ConsoleRuntime, Runtime } from './runtime.js';
export { CommandRouter, formatDenial } from './router.js';
export type { DispatchOutcome, RouterIO } from './router.js';
export { program } from './commands/index.js';
export { launchShell } from './tui/shell.js';
export type { ShellOptions } from './tui/shell.js';
export { describeStatus, recentDecisions } from './tui/output/status.js';
export type { RenderStatusOptions, StatusReport } from './tui/output/status.js';
