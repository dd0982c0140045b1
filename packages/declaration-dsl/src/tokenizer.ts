/**
 * Ordinance Declaration DSL — Argument Tokenizer
 *
 * Splits a line on whitespace while keeping double-quoted spans together.
 * Used for both declaration statements and console command lines.
 */

import type { ArgsParseResult } from './types.js';

/**
 * Split a line into arguments.
 *
 * - Outside quotes, text is split on runs of whitespace and empty words are
 *   dropped.
 * - Inside quotes, the span is kept verbatim (not trimmed), including an
 *   empty span `""`.
 * - An unterminated quote groups the rest of the line into one argument and
 *   sets `mismatchedQuote`.
 *
 * @example
 * parseArgs('say "hello  there" now')
 * // { argv: ['say', 'hello  there', 'now'], mismatchedQuote: false }
 */
export function parseArgs(line: string): ArgsParseResult {
  const argv: string[] = [];
  let inQuote = false;
  let cursor = 0;

  for (;;) {
    const quote = line.indexOf('"', cursor);
    const chunk = line.slice(cursor, quote === -1 ? line.length : quote);

    if (inQuote) {
      argv.push(chunk);
    } else {
      argv.push(...splitWords(chunk));
    }

    if (quote === -1) {
      break;
    }
    inQuote = !inQuote;
    cursor = quote + 1;
  }

  return { argv, mismatchedQuote: inQuote };
}

/**
 * Remove a trailing `#` comment. A `#` inside a quoted span is literal.
 */
export function stripComment(line: string): string {
  let inQuote = false;
  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (ch === '"') {
      inQuote = !inQuote;
    } else if (ch === '#' && !inQuote) {
      return line.slice(0, i);
    }
  }
  return line;
}

function splitWords(chunk: string): string[] {
  return chunk.split(/\s+/).filter((word) => word.length > 0);
}
