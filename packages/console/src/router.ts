/**
 * router.ts — route one console line to a plugin command through the gate.
 *
 * The router is the command boundary: denials, unknown commands and handler
 * errors are reported on `io.err` and returned as outcomes, never thrown.
 */

import { parseArgs } from '@ordinance/kernel';
import type { Condition } from '@ordinance/kernel';
import type { Runtime } from './runtime.js';

export interface RouterIO {
  readonly out: (line: string) => void;
  readonly err: (line: string) => void;
}

export type DispatchOutcome =
  | { readonly kind: 'empty' }
  | { readonly kind: 'unknown'; readonly command: string }
  | { readonly kind: 'denied'; readonly command: string; readonly condition: Condition }
  | { readonly kind: 'ran'; readonly command: string }
  | { readonly kind: 'failed'; readonly command: string; readonly message: string };

export class CommandRouter {
  constructor(
    private readonly runtime: Pick<Runtime, 'gate' | 'plugins'>,
    private readonly io: RouterIO,
  ) {}

  async dispatch(alias: string, line: string): Promise<DispatchOutcome> {
    const { argv, mismatchedQuote } = parseArgs(line);
    const [command, ...args] = argv;
    if (command === undefined) {
      return { kind: 'empty' };
    }
    if (mismatchedQuote) {
      this.io.err('warning: mismatched quote, the rest of the line was read as one argument');
    }

    const resolved = this.runtime.plugins.resolveCommand(command);
    if (resolved === undefined) {
      this.io.err(`unknown command: ${command}`);
      return { kind: 'unknown', command };
    }

    try {
      const { result } = await this.runtime.gate.gate(
        { alias, command, permission: resolved.permission, args },
        (ctx) =>
          resolved.handler(
            {
              alias: ctx.alias,
              principal: ctx.principal,
              output: (text) => this.io.out(text),
              plugins: this.runtime.plugins,
            },
            ...ctx.args,
          ),
      );
      if (!result.ok) {
        this.io.err(formatDenial(command, result.condition));
        return { kind: 'denied', command, condition: result.condition };
      }
      return { kind: 'ran', command };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.io.err(`Command "${command}" failed: ${message}`);
      return { kind: 'failed', command, message };
    }
  }
}

/**
 * `Command "slap", argument #1: specified number 101 is above your allowed maximum of 100`,
 * or without the argument part when the denial is not about a parameter.
 */
export function formatDenial(command: string, condition: Condition): string {
  const index = condition.parameterIndex;
  return index === undefined
    ? `Command "${command}": ${condition.message}`
    : `Command "${command}", argument #${index}: ${condition.message}`;
}
