/**
 * shared.ts — helpers used by every subcommand: the global --home option and
 * the error boundary.
 */

import type { Command } from 'commander';
import { buildRuntime } from '../runtime.js';
import type { ConsoleRuntime } from '../runtime.js';
import { t } from '../tui/theme.js';

export interface GlobalOptions {
  readonly home?: string;
}

export function homeOption(command: Command): string | undefined {
  return command.optsWithGlobals<GlobalOptions>().home;
}

export function runtimeFor(command: Command): ConsoleRuntime {
  return buildRuntime({ home: homeOption(command) });
}

/**
 * Wrap an action so that any error is printed in red and the process exits
 * non-zero, instead of commander's stack trace.
 */
export function guarded<A extends unknown[]>(
  action: (...args: A) => void | Promise<void>,
): (...args: A) => Promise<void> {
  return async (...args: A) => {
    try {
      await action(...args);
    } catch (err) {
      console.error(t.red(err instanceof Error ? err.message : String(err)));
      process.exitCode = 1;
    }
  };
}
