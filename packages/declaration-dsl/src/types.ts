/**
 * Ordinance Declaration DSL — Core Type Definitions
 *
 * The permission graph is never stored. It is rebuilt at process start by
 * replaying a declaration file, one statement per line. This module defines
 * the structured form of those statements and the parse result types.
 *
 * These types are the base layer of the Ordinance type system. The kernel
 * depends on this package; this package has no internal Ordinance dependencies.
 */

// ---------------------------------------------------------------------------
// Parameter specifications
// ---------------------------------------------------------------------------

/** Native value types a parameter slot can produce. */
export type ParamType = 'number' | 'string';

/**
 * Structured description of one positional parameter.
 *
 * Produced by `param` statements and by plugin manifests. Unset fields take
 * the kernel's defaults (one required occurrence, unbounded range).
 */
export interface ParamSpec {
  readonly type: ParamType;
  readonly min?: number;
  readonly max?: number;
  /** Decimal places to round parsed numbers to (round half up). */
  readonly roundTo?: number;
  readonly minRepeats?: number;
  readonly maxRepeats?: number;
  readonly default?: number | string;
  /** Capture every remaining token, space-joined, into this slot. */
  readonly rest?: boolean;
}

/** Bound overrides accepted by `restrict` statements (numeric slots only). */
export interface BoundsSpec {
  readonly min?: number;
  readonly max?: number;
  readonly roundTo?: number;
}

// ---------------------------------------------------------------------------
// Statements
// ---------------------------------------------------------------------------

/** `group:<name>` or `user:<alias>`. */
export type TargetRef =
  | { readonly kind: 'group'; readonly name: string }
  | { readonly kind: 'user'; readonly alias: string };

/**
 * One declaration statement. `line` is the 1-based source line, carried so
 * that application errors can point back at the file.
 */
export type Declaration =
  | { readonly kind: 'group'; readonly line: number; readonly name: string; readonly parent: string }
  | {
      readonly kind: 'user';
      readonly line: number;
      readonly aliases: ReadonlyArray<string>;
      readonly group: string;
    }
  | {
      readonly kind: 'access';
      readonly line: number;
      readonly tag: string;
      readonly grant: ReadonlyArray<string>;
    }
  | { readonly kind: 'param'; readonly line: number; readonly tag: string; readonly param: ParamSpec }
  | { readonly kind: 'allow'; readonly line: number; readonly target: TargetRef; readonly tag: string }
  | {
      readonly kind: 'restrict';
      readonly line: number;
      readonly target: TargetRef;
      readonly tag: string;
      readonly index: number;
      readonly bounds: BoundsSpec;
    }
  | { readonly kind: 'deny'; readonly line: number; readonly target: TargetRef; readonly tag: string };

export type DeclarationKind = Declaration['kind'];

// ---------------------------------------------------------------------------
// Parse results
// ---------------------------------------------------------------------------

export interface ParseError {
  readonly line: number;
  readonly message: string;
  /** The offending source line, comments stripped. */
  readonly source: string;
}

/**
 * Result of parsing a declaration file. Parse failures are never partial:
 * a single bad line means no declarations are returned.
 */
export type ParseResult =
  | { readonly ok: true; readonly declarations: ReadonlyArray<Declaration> }
  | { readonly ok: false; readonly errors: ReadonlyArray<ParseError> };

/** Result of splitting a console line into arguments. */
export interface ArgsParseResult {
  readonly argv: ReadonlyArray<string>;
  /** True when the line ended inside a double-quoted span. */
  readonly mismatchedQuote: boolean;
}
