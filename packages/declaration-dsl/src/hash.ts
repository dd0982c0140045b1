/**
 * Ordinance Declaration DSL — Canonical Hashing
 *
 * The decision log records which declaration set was in force for every
 * gated command. The hash is computed over the structured statements, not the
 * source text, so comments, blank lines and spacing do not affect it.
 */

import { createHash } from 'node:crypto';
import type { Declaration } from './types.js';

/**
 * Produces a canonical JSON string with deterministic key ordering.
 *
 * Object keys are sorted recursively; `undefined` object members are omitted
 * the same way `JSON.stringify` omits them.
 */
export function canonicalize(value: unknown): string {
  if (value === null || value === undefined) {
    return 'null';
  }
  if (typeof value === 'boolean' || typeof value === 'number' || typeof value === 'string') {
    return JSON.stringify(value);
  }
  if (Array.isArray(value)) {
    return '[' + value.map(canonicalize).join(',') + ']';
  }
  if (typeof value !== 'object') {
    return 'null';
  }
  const pairs = Object.entries(value)
    .filter(([, v]) => v !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([k, v]) => `${JSON.stringify(k)}:${canonicalize(v)}`);
  return '{' + pairs.join(',') + '}';
}

/**
 * SHA-256 (hex) of the declaration set. Source line numbers are excluded so
 * that moving a statement down a line does not change the hash; statement
 * order is significant.
 */
export function hashDeclarations(declarations: ReadonlyArray<Declaration>): string {
  const body = declarations.map(({ line: _line, ...statement }) => statement);
  return createHash('sha256').update(canonicalize(body), 'utf8').digest('hex');
}
