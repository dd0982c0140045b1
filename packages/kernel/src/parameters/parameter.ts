/**
 * Ordinance Kernel — Parameter Base
 *
 * A Parameter is the parse-and-validate rule for one positional argument of
 * a Permission. Variants share the repetition, default and rest-of-line
 * settings defined here and add their own type conversion and constraints.
 *
 * Builder setters mutate and return the same instance. They are called while
 * a permission graph is being declared, never during evaluation.
 */

import { Condition, ConditionKind } from '../conditions/condition.js';
import { InvariantViolationError, RegistrationError } from '../errors.js';
import type { Principal } from '../principals/principal.js';

/** A value a parameter can produce. */
export type ParamValue = number | string;

/** A raw argument as received from a caller: console text or a native value. */
export type RawArg = string | number;

export type ParamParseResult<T extends ParamValue> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly condition: Condition };

export type ValidityResult = { readonly ok: true } | { readonly ok: false; readonly condition: Condition };

export abstract class Parameter<T extends ParamValue> {
  abstract readonly kind: 'number' | 'string';

  protected _minRepeats = 1;
  protected _maxRepeats = 1;
  protected _takesRestOfLine = false;

  protected constructor(protected _default: T) {}

  get minRepeats(): number {
    return this._minRepeats;
  }

  get maxRepeats(): number {
    return this._maxRepeats;
  }

  get takesRestOfLine(): boolean {
    return this._takesRestOfLine;
  }

  get defaultValue(): T {
    return this._default;
  }

  // -------------------------------------------------------------------------
  // Builder
  // -------------------------------------------------------------------------

  setDefault(value: T): this {
    this._default = this.checkDefault(value);
    return this;
  }

  /**
   * Minimum number of occurrences. `0` makes the slot optional. Must not
   * exceed `maxRepeats`, so raise `maxRepeats` first.
   */
  setMinRepeats(count: number): this {
    if (!Number.isInteger(count) || count < 0) {
      throw new RegistrationError(`minRepeats must be a non-negative integer, got ${count}`);
    }
    if (count > this._maxRepeats) {
      throw new RegistrationError(`minRepeats ${count} exceeds maxRepeats ${this._maxRepeats}`);
    }
    this._minRepeats = count;
    return this;
  }

  setMaxRepeats(count: number): this {
    if (!Number.isInteger(count) || count < 1) {
      throw new RegistrationError(`maxRepeats must be a positive integer, got ${count}`);
    }
    if (count < this._minRepeats) {
      throw new RegistrationError(`maxRepeats ${count} is below minRepeats ${this._minRepeats}`);
    }
    if (count > 1 && this._takesRestOfLine) {
      throw new RegistrationError('a parameter that takes the rest of the line cannot repeat');
    }
    this._maxRepeats = count;
    return this;
  }

  setTakesRestOfLine(flag = true): this {
    if (flag && this._maxRepeats > 1) {
      throw new RegistrationError('a repeating parameter cannot take the rest of the line');
    }
    this._takesRestOfLine = flag;
    return this;
  }

  // -------------------------------------------------------------------------
  // Evaluation
  // -------------------------------------------------------------------------

  /**
   * Convert a raw argument to this parameter's native type.
   *
   * An absent argument fails with MissingRequiredParam when the slot is
   * required and yields the default value otherwise.
   */
  parse(principal: Principal, raw: RawArg | undefined): ParamParseResult<T> {
    if (raw === undefined) {
      if (this._minRepeats > 0) {
        return { ok: false, condition: Condition.make(ConditionKind.MissingRequiredParam) };
      }
      return { ok: true, value: this._default };
    }
    return this.convert(principal, raw);
  }

  /**
   * Check a parsed value against this parameter's constraints.
   *
   * The value must already be of this variant's native type; anything else
   * means the permission graph mixes parameter variants at one position and
   * is thrown as an InvariantViolationError.
   */
  isValid(principal: Principal, value: ParamValue): ValidityResult {
    if (!this.accepts(value)) {
      throw new InvariantViolationError(
        `${this.kind} parameter received a ${typeof value} value ${JSON.stringify(value)}`,
      );
    }
    return this.check(principal, value);
  }

  /** Usage text for help output, e.g. `<number 0..100>` or `[string]...`. */
  usage(): string {
    const inner = this.describe();
    const wrapped = this._minRepeats === 0 ? `[${inner}]` : `<${inner}>`;
    return this._maxRepeats > 1 || this._takesRestOfLine ? `${wrapped}...` : wrapped;
  }

  /** Canonical text for a value. Parsing the text gives the value back. */
  abstract format(value: T): string;

  /** Independent copy of every setting. */
  abstract clone(): Parameter<T>;

  protected abstract accepts(value: ParamValue): value is T;
  protected abstract convert(principal: Principal, raw: RawArg): ParamParseResult<T>;
  protected abstract check(principal: Principal, value: T): ValidityResult;
  protected abstract describe(): string;

  protected checkDefault(value: T): T {
    return value;
  }

  /** Copy the shared settings onto `target`. Used by variant `clone()`. */
  protected copySettingsTo(target: Parameter<T>): void {
    target._default = this._default;
    target._minRepeats = this._minRepeats;
    target._maxRepeats = this._maxRepeats;
    target._takesRestOfLine = this._takesRestOfLine;
  }
}
