/**
 * Ordinance Kernel — Command Gate
 *
 * The CommandGate is the enforcement boundary between a typed console command
 * and its handler. No handler runs without passing through the gate, and no
 * decision goes unlogged.
 *
 * Gate contract:
 * - Resolves the alias and evaluates access
 * - Runs the handler only when access is allowed
 * - Records exactly one DecisionLogEntry, regardless of the outcome and of
 *   whether the handler throws
 * - Returns the access result and any handler output
 */

import type { AccessControl } from '../access-control.js';
import type { ParamValue, RawArg } from '../parameters/index.js';
import type { Permission } from '../permissions/permission.js';
import type { Principal } from '../principals/principal.js';
import { DecisionLogger } from '../logging/decision-log.js';
import type { LogSink } from '../logging/log-sink.js';
import type { DecisionLogEntry } from '../logging/types.js';
import type { AccessResult } from './evaluator.js';

/** What a handler receives once access has been allowed. */
export interface GateContext {
  readonly alias: string;
  readonly principal: Principal;
  readonly args: ReadonlyArray<ParamValue>;
}

export type GateHandler<T> = (context: GateContext) => T | Promise<T>;

export interface GateRequest {
  readonly alias: string;
  /** Command name as typed; may differ from the permission tag. */
  readonly command: string;
  readonly permission: Permission;
  readonly args: ReadonlyArray<RawArg>;
}

export interface GateOutcome<T> {
  readonly result: AccessResult;
  /** Handler output; present only when access was allowed and a handler ran. */
  readonly output?: T;
}

export interface CommandGateOptions {
  readonly sink?: LogSink;
  /** Hash of the declaration set in force, recorded with every entry. */
  readonly declarationsHash?: string;
  readonly clock?: () => string;
}

export class CommandGate {
  readonly logger: DecisionLogger;
  private readonly declarationsHash: string | null;
  private readonly clock: () => string;

  constructor(
    private readonly control: AccessControl,
    options: CommandGateOptions = {},
  ) {
    this.logger = new DecisionLogger(options.sink);
    this.declarationsHash = options.declarationsHash ?? null;
    this.clock = options.clock ?? (() => new Date().toISOString());
  }

  async gate<T>(request: GateRequest, handler?: GateHandler<T>): Promise<GateOutcome<T>> {
    const principal = this.control.resolvePrincipal(request.alias);
    const result = this.control.checkAccess(principal ?? request.alias, request.permission, ...request.args);

    let error: string | null = null;
    try {
      if (result.ok && principal !== undefined && handler !== undefined) {
        try {
          const output = await handler({ alias: request.alias, principal, args: result.args });
          return { result, output };
        } catch (err) {
          error = err instanceof Error ? err.message : String(err);
          throw err;
        }
      }
      return { result };
    } finally {
      // Recorded on every path, including a throwing handler.
      this.logger.record(this.entry(request, principal, result, error));
    }
  }

  private entry(
    request: GateRequest,
    principal: Principal | undefined,
    result: AccessResult,
    error: string | null,
  ): DecisionLogEntry {
    return {
      alias: request.alias,
      principal: principal?.name ?? null,
      command: request.command,
      access: request.permission.tag,
      args: [...request.args],
      allowed: result.ok,
      condition: result.ok ? null : result.condition.toJSON(),
      error,
      declarations_hash: this.declarationsHash,
      timestamp: this.clock(),
    };
  }
}
