/**
 * Ordinance Kernel — Log Sink Interface
 *
 * Defines the injection point for decision log persistence.
 *
 * The kernel owns the contract (this interface) and the DecisionLogger class.
 * Concrete implementations live in the runtime host layer and are injected
 * at construction time. The kernel never writes to disk itself.
 */

import type { DecisionLogEntry } from './types.js';

/**
 * A sink that receives and persists decision log entries.
 *
 * append() is synchronous: the entry is durable before the gate returns.
 * Implementations must not silently discard entries.
 */
export interface LogSink {
  append(entry: DecisionLogEntry): void;
}
