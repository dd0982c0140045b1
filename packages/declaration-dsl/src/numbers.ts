/**
 * Decimal text handling shared by the declaration parser and the kernel's
 * numeric parameters, so that `max=100` in a declaration file and `100`
 * typed at the console are read by the same rule.
 */

const DECIMAL = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;

/**
 * Parse decimal text (`12`, `-3.5`, `.25`, `1e3`). Surrounding whitespace is
 * ignored. Returns undefined for anything else, including `''`, `0x10`,
 * `Infinity` and `NaN`.
 */
export function parseDecimal(text: string): number | undefined {
  const trimmed = text.trim();
  if (!DECIMAL.test(trimmed)) {
    return undefined;
  }
  const value = Number(trimmed);
  return Number.isFinite(value) ? value : undefined;
}

/**
 * Round half up to `places` decimal places: `floor(x * 10^places + 0.5) / 10^places`.
 *
 * The same rule is used for parsing and for display, so a value shown to an
 * operator parses back to itself.
 *
 * @example
 * roundHalfUp(1.25, 1)   // 1.3
 * roundHalfUp(-2.5, 0)   // -2
 */
export function roundHalfUp(value: number, places: number): number {
  const factor = 10 ** places;
  return Math.floor(value * factor + 0.5) / factor;
}
