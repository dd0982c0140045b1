/**
 * Ordinance Kernel — Decision Log Types
 *
 * Every gated command produces exactly one DecisionLogEntry, whether it was
 * allowed or denied and whether or not its handler succeeded.
 */

import type { ConditionJSON } from '../conditions/condition.js';
import type { RawArg } from '../parameters/index.js';

/**
 * A structured log entry for a single gated command.
 *
 * Field names are snake_case because entries are written verbatim as JSONL.
 */
export interface DecisionLogEntry {
  /** Alias the command was issued as. */
  readonly alias: string;
  /** Name of the principal the alias resolved to, or null when unbound. */
  readonly principal: string | null;
  /** Command name as typed. */
  readonly command: string;
  /** Tag of the permission the command is gated by. */
  readonly access: string;
  /** Raw arguments as received. */
  readonly args: ReadonlyArray<RawArg>;
  readonly allowed: boolean;
  /** The denial reason; null when allowed. */
  readonly condition: ConditionJSON | null;
  /** Message of an error thrown by the handler, or null. */
  readonly error: string | null;
  /** Hash of the declaration set in force, or null when none was loaded. */
  readonly declarations_hash: string | null;
  /** ISO 8601 time of the decision. */
  readonly timestamp: string;
}
