/**
 * Ordinance Kernel — Numeric Parameter
 */

import { parseDecimal, roundHalfUp } from '@ordinance/declaration-dsl';
import { Condition, ConditionKind } from '../conditions/condition.js';
import { RegistrationError } from '../errors.js';
import type { Principal } from '../principals/principal.js';
import { Parameter } from './parameter.js';
import type { ParamParseResult, ParamValue, RawArg, ValidityResult } from './parameter.js';

/**
 * A decimal number within an inclusive `[min, max]` range, optionally
 * rounded half up to `roundTo` decimal places when parsed.
 *
 * Text is read with the same decimal rule as declaration files, so `"50"`
 * and `50` parse to the same value.
 */
export class NumericParameter extends Parameter<number> {
  readonly kind = 'number' as const;

  private _min = Number.NEGATIVE_INFINITY;
  private _max = Number.POSITIVE_INFINITY;
  private _roundTo: number | undefined;

  constructor() {
    super(0);
  }

  get min(): number {
    return this._min;
  }

  get max(): number {
    return this._max;
  }

  get roundTo(): number | undefined {
    return this._roundTo;
  }

  setMin(min: number): this {
    this._min = checkBound('min', min);
    return this;
  }

  setMax(max: number): this {
    this._max = checkBound('max', max);
    return this;
  }

  setRoundTo(places: number): this {
    if (!Number.isInteger(places) || places < 0) {
      throw new RegistrationError(`roundTo must be a non-negative integer, got ${places}`);
    }
    this._roundTo = places;
    return this;
  }

  format(value: number): string {
    return String(value);
  }

  clone(): NumericParameter {
    const copy = new NumericParameter();
    this.copySettingsTo(copy);
    copy._min = this._min;
    copy._max = this._max;
    copy._roundTo = this._roundTo;
    return copy;
  }

  protected accepts(value: ParamValue): value is number {
    return typeof value === 'number';
  }

  protected convert(_principal: Principal, raw: RawArg): ParamParseResult<number> {
    const value = typeof raw === 'number' ? (Number.isFinite(raw) ? raw : undefined) : parseDecimal(raw);
    if (value === undefined) {
      return { ok: false, condition: Condition.make(ConditionKind.InvalidNumber, String(raw)) };
    }
    return { ok: true, value: this._roundTo === undefined ? value : roundHalfUp(value, this._roundTo) };
  }

  protected check(_principal: Principal, value: number): ValidityResult {
    if (value < this._min) {
      return { ok: false, condition: Condition.make(ConditionKind.TooLow, this.format(value), this.format(this._min)) };
    }
    if (value > this._max) {
      return { ok: false, condition: Condition.make(ConditionKind.TooHigh, this.format(value), this.format(this._max)) };
    }
    return { ok: true };
  }

  protected describe(): string {
    const lo = Number.isFinite(this._min) ? this.format(this._min) : '';
    const hi = Number.isFinite(this._max) ? this.format(this._max) : '';
    return lo === '' && hi === '' ? 'number' : `number ${lo}..${hi}`;
  }

  protected override checkDefault(value: number): number {
    if (!Number.isFinite(value)) {
      throw new RegistrationError(`default must be a finite number, got ${value}`);
    }
    return value;
  }
}

function checkBound(name: 'min' | 'max', value: number): number {
  if (Number.isNaN(value)) {
    throw new RegistrationError(`${name} must be a number`);
  }
  return value;
}
