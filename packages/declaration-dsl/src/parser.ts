/**
 * Ordinance Declaration DSL — Parser
 *
 * Parses declaration source text into structured statements.
 *
 * Grammar (one statement per line, `#` starts a comment):
 *
 *   group <name> extends <parent>
 *   user <alias> [<alias>...] in <group>
 *   access <tag> [grant <group> [<group>...]]
 *   param <tag> number [min=<n>] [max=<n>] [round=<p>] [min_repeats=<n>] [max_repeats=<n>] [default=<n>] [rest]
 *   param <tag> string [min_repeats=<n>] [max_repeats=<n>] [default=<text>] [rest]
 *   allow <target> <tag>
 *   restrict <target> <tag> <index> [min=<n>] [max=<n>] [round=<p>]
 *   deny <target> <tag>
 *
 * where <target> is `group:<name>` or `user:<alias>`.
 *
 * The parser is syntactic only. Whether a referenced group, user or tag
 * exists is decided when the statements are applied to an access context.
 */

import { parseDecimal } from './numbers.js';
import { parseArgs, stripComment } from './tokenizer.js';
import type {
  BoundsSpec,
  Declaration,
  ParamSpec,
  ParseError,
  ParseResult,
  TargetRef,
} from './types.js';

type LineResult =
  | { readonly ok: true; readonly declaration: Declaration }
  | { readonly ok: false; readonly error: string };

type OptionsResult<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: string };

const NAME = /^[A-Za-z0-9_.\-]+$/;

/**
 * Parse a complete declaration file.
 *
 * Every line is parsed even after a failure so that all errors are reported
 * together; if any line fails, no declarations are returned.
 */
export function parseDeclarations(source: string): ParseResult {
  const declarations: Declaration[] = [];
  const errors: ParseError[] = [];

  const lines = source.split(/\r?\n/);
  lines.forEach((rawLine, offset) => {
    const line = offset + 1;
    const text = stripComment(rawLine).trim();
    if (text === '') {
      return;
    }

    const result = parseStatement(text, line);
    if (result.ok) {
      declarations.push(result.declaration);
    } else {
      errors.push({ line, message: result.error, source: text });
    }
  });

  if (errors.length > 0) {
    return { ok: false, errors };
  }
  return { ok: true, declarations };
}

/**
 * Parse a single statement (no comment, not blank).
 *
 * @internal exported for tests
 */
export function parseStatement(text: string, line: number): LineResult {
  const { argv, mismatchedQuote } = parseArgs(text);
  if (mismatchedQuote) {
    return { ok: false, error: 'Unterminated quote' };
  }

  const [keyword = '', ...rest] = argv;
  switch (keyword.toLowerCase()) {
    case 'group':
      return parseGroup(rest, line);
    case 'user':
      return parseUser(rest, line);
    case 'access':
      return parseAccess(rest, line);
    case 'param':
      return parseParam(rest, line);
    case 'allow':
    case 'deny':
      return parseGrant(keyword.toLowerCase() === 'allow' ? 'allow' : 'deny', rest, line);
    case 'restrict':
      return parseRestrict(rest, line);
    default:
      return {
        ok: false,
        error:
          `Unknown statement ${JSON.stringify(keyword)}. ` +
          'Expected one of: group, user, access, param, allow, restrict, deny',
      };
  }
}

// ---------------------------------------------------------------------------
// Statements
// ---------------------------------------------------------------------------

function parseGroup(args: ReadonlyArray<string>, line: number): LineResult {
  const [name, extendsWord, parent] = args;
  if (args.length !== 3 || extendsWord !== 'extends' || name === undefined || parent === undefined) {
    return { ok: false, error: 'Expected: group <name> extends <parent>' };
  }
  const bad = firstBadName([name, parent]);
  if (bad !== undefined) {
    return { ok: false, error: invalidName(bad) };
  }
  return { ok: true, declaration: { kind: 'group', line, name, parent } };
}

function parseUser(args: ReadonlyArray<string>, line: number): LineResult {
  const inAt = args.lastIndexOf('in');
  const group = args[inAt + 1];
  if (inAt < 1 || inAt !== args.length - 2 || group === undefined) {
    return { ok: false, error: 'Expected: user <alias> [<alias>...] in <group>' };
  }
  const aliases = args.slice(0, inAt);
  if (aliases.some((alias) => alias === '')) {
    return { ok: false, error: 'Aliases must not be empty' };
  }
  if (new Set(aliases).size !== aliases.length) {
    return { ok: false, error: 'Aliases must be distinct' };
  }
  if (!NAME.test(group)) {
    return { ok: false, error: invalidName(group) };
  }
  return { ok: true, declaration: { kind: 'user', line, aliases, group } };
}

function parseAccess(args: ReadonlyArray<string>, line: number): LineResult {
  const [tag, grantWord, ...groups] = args;
  if (tag === undefined) {
    return { ok: false, error: 'Expected: access <tag> [grant <group> [<group>...]]' };
  }
  if (grantWord === undefined) {
    return NAME.test(tag)
      ? { ok: true, declaration: { kind: 'access', line, tag, grant: [] } }
      : { ok: false, error: invalidName(tag) };
  }
  if (grantWord !== 'grant' || groups.length === 0) {
    return { ok: false, error: 'Expected: access <tag> [grant <group> [<group>...]]' };
  }
  const bad = firstBadName([tag, ...groups]);
  if (bad !== undefined) {
    return { ok: false, error: invalidName(bad) };
  }
  return { ok: true, declaration: { kind: 'access', line, tag, grant: groups } };
}

function parseParam(args: ReadonlyArray<string>, line: number): LineResult {
  const [tag, type, ...options] = args;
  if (tag === undefined || (type !== 'number' && type !== 'string')) {
    return { ok: false, error: 'Expected: param <tag> number|string [options...]' };
  }
  if (!NAME.test(tag)) {
    return { ok: false, error: invalidName(tag) };
  }
  const parsed = parseParamOptions(type, options);
  if (!parsed.ok) {
    return parsed;
  }
  return { ok: true, declaration: { kind: 'param', line, tag, param: parsed.value } };
}

function parseGrant(kind: 'allow' | 'deny', args: ReadonlyArray<string>, line: number): LineResult {
  const [rawTarget, tag] = args;
  if (args.length !== 2 || rawTarget === undefined || tag === undefined) {
    return { ok: false, error: `Expected: ${kind} <group:name|user:alias> <tag>` };
  }
  const target = parseTarget(rawTarget);
  if (target === undefined) {
    return { ok: false, error: invalidTarget(rawTarget) };
  }
  if (!NAME.test(tag)) {
    return { ok: false, error: invalidName(tag) };
  }
  return { ok: true, declaration: { kind, line, target, tag } };
}

function parseRestrict(args: ReadonlyArray<string>, line: number): LineResult {
  const [rawTarget, tag, rawIndex, ...options] = args;
  if (rawTarget === undefined || tag === undefined || rawIndex === undefined) {
    return {
      ok: false,
      error: 'Expected: restrict <group:name|user:alias> <tag> <index> [min=<n>] [max=<n>] [round=<p>]',
    };
  }
  const target = parseTarget(rawTarget);
  if (target === undefined) {
    return { ok: false, error: invalidTarget(rawTarget) };
  }
  if (!NAME.test(tag)) {
    return { ok: false, error: invalidName(tag) };
  }
  const index = parseCount(rawIndex);
  if (index === undefined || index < 1) {
    return { ok: false, error: `Parameter index must be a positive integer, got ${JSON.stringify(rawIndex)}` };
  }
  if (options.length === 0) {
    return { ok: false, error: 'restrict requires at least one of min=, max=, round=' };
  }

  const bounds: { min?: number; max?: number; roundTo?: number } = {};
  for (const option of options) {
    const pair = splitOption(option);
    if (pair === undefined) {
      return { ok: false, error: `Invalid option ${JSON.stringify(option)}. Expected key=value` };
    }
    const [key, value] = pair;
    switch (key) {
      case 'min':
      case 'max': {
        const n = parseDecimal(value);
        if (n === undefined) {
          return { ok: false, error: `${key} must be a number, got ${JSON.stringify(value)}` };
        }
        bounds[key] = n;
        break;
      }
      case 'round': {
        const places = parseCount(value);
        if (places === undefined) {
          return { ok: false, error: `round must be a non-negative integer, got ${JSON.stringify(value)}` };
        }
        bounds.roundTo = places;
        break;
      }
      default:
        return { ok: false, error: `Unknown restrict option ${JSON.stringify(key)}` };
    }
  }
  const done: BoundsSpec = bounds;
  return { ok: true, declaration: { kind: 'restrict', line, target, tag, index, bounds: done } };
}

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

function parseParamOptions(
  type: 'number' | 'string',
  options: ReadonlyArray<string>,
): OptionsResult<ParamSpec> {
  const spec: {
    type: 'number' | 'string';
    min?: number;
    max?: number;
    roundTo?: number;
    minRepeats?: number;
    maxRepeats?: number;
    default?: number | string;
    rest?: boolean;
  } = { type };

  for (const option of options) {
    if (option === 'rest') {
      spec.rest = true;
      continue;
    }
    const pair = splitOption(option);
    if (pair === undefined) {
      return { ok: false, error: `Invalid option ${JSON.stringify(option)}. Expected key=value or rest` };
    }
    const [key, value] = pair;

    switch (key) {
      case 'min':
      case 'max': {
        if (type !== 'number') {
          return { ok: false, error: `${key}= applies to number parameters only` };
        }
        const n = parseDecimal(value);
        if (n === undefined) {
          return { ok: false, error: `${key} must be a number, got ${JSON.stringify(value)}` };
        }
        spec[key] = n;
        break;
      }
      case 'round': {
        if (type !== 'number') {
          return { ok: false, error: 'round= applies to number parameters only' };
        }
        const places = parseCount(value);
        if (places === undefined) {
          return { ok: false, error: `round must be a non-negative integer, got ${JSON.stringify(value)}` };
        }
        spec.roundTo = places;
        break;
      }
      case 'min_repeats':
      case 'max_repeats': {
        const count = parseCount(value);
        if (count === undefined) {
          return { ok: false, error: `${key} must be a non-negative integer, got ${JSON.stringify(value)}` };
        }
        if (key === 'min_repeats') {
          spec.minRepeats = count;
        } else {
          spec.maxRepeats = count;
        }
        break;
      }
      case 'default': {
        if (type === 'number') {
          const n = parseDecimal(value);
          if (n === undefined) {
            return { ok: false, error: `default must be a number, got ${JSON.stringify(value)}` };
          }
          spec.default = n;
        } else {
          spec.default = value;
        }
        break;
      }
      default:
        return { ok: false, error: `Unknown param option ${JSON.stringify(key)}` };
    }
  }

  if (spec.rest === true && spec.maxRepeats !== undefined && spec.maxRepeats > 1) {
    return { ok: false, error: 'rest and max_repeats > 1 cannot be combined' };
  }
  return { ok: true, value: spec };
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function splitOption(option: string): [string, string] | undefined {
  const eq = option.indexOf('=');
  if (eq <= 0) {
    return undefined;
  }
  return [option.slice(0, eq), option.slice(eq + 1)];
}

function parseCount(text: string): number | undefined {
  return /^\d+$/.test(text) ? Number(text) : undefined;
}

function parseTarget(text: string): TargetRef | undefined {
  const colon = text.indexOf(':');
  if (colon <= 0) {
    return undefined;
  }
  const scope = text.slice(0, colon);
  const name = text.slice(colon + 1);
  if (name === '') {
    return undefined;
  }
  if (scope === 'group') {
    return NAME.test(name) ? { kind: 'group', name } : undefined;
  }
  if (scope === 'user') {
    return { kind: 'user', alias: name };
  }
  return undefined;
}

function firstBadName(names: ReadonlyArray<string>): string | undefined {
  return names.find((name) => !NAME.test(name));
}

function invalidName(name: string): string {
  return `Invalid name ${JSON.stringify(name)}. Names use letters, digits, '_', '.', '-'`;
}

function invalidTarget(text: string): string {
  return `Invalid target ${JSON.stringify(text)}. Expected group:<name> or user:<alias>`;
}
