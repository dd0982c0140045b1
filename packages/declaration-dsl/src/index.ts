/**
 * @ordinance/declaration-dsl
 *
 * Ordinance Declaration DSL — tokenizer, parser, hashing and type definitions.
 *
 * This package is the base layer of the Ordinance type system. It defines:
 * - The structured declaration statements that rebuild a permission graph
 * - The console argument tokenizer (double-quoted spans)
 * - Decimal parsing and round-half-up rounding shared with the kernel
 * - Canonical hashing of a declaration set
 *
 * This package has no internal Ordinance dependencies.
 */

// Types
export type {
  ArgsParseResult,
  BoundsSpec,
  Declaration,
  DeclarationKind,
  ParamSpec,
  ParamType,
  ParseError,
  ParseResult,
  TargetRef,
} from './types.js';

// Functions
export { canonicalize, hashDeclarations } from './hash.js';
export { parseDecimal, roundHalfUp } from './numbers.js';
export { parseDeclarations, parseStatement } from './parser.js';
export { parseArgs, stripComment } from './tokenizer.js';
