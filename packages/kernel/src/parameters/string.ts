/**
 * Ordinance Kernel — String Parameter
 */

import { Condition, ConditionKind } from '../conditions/condition.js';
import { RegistrationError } from '../errors.js';
import type { Principal } from '../principals/principal.js';
import { Parameter } from './parameter.js';
import type { ParamParseResult, ParamValue, RawArg, ValidityResult } from './parameter.js';

/** Line breaks and NUL cannot appear in a single console argument. */
const FORBIDDEN = /[\r\n\0]/;

/**
 * Free text. A native number is accepted and becomes its decimal text.
 * There is no constraint beyond the shared repetition settings.
 */
export class StringParameter extends Parameter<string> {
  readonly kind = 'string' as const;

  constructor() {
    super('');
  }

  format(value: string): string {
    return value;
  }

  clone(): StringParameter {
    const copy = new StringParameter();
    this.copySettingsTo(copy);
    return copy;
  }

  protected accepts(value: ParamValue): value is string {
    return typeof value === 'string';
  }

  protected convert(_principal: Principal, raw: RawArg): ParamParseResult<string> {
    const text = typeof raw === 'number' ? String(raw) : raw;
    if (FORBIDDEN.test(text)) {
      return { ok: false, condition: Condition.make(ConditionKind.InvalidString, text) };
    }
    return { ok: true, value: text };
  }

  protected check(_principal: Principal, _value: string): ValidityResult {
    return { ok: true };
  }

  protected describe(): string {
    return 'string';
  }

  protected override checkDefault(value: string): string {
    if (FORBIDDEN.test(value)) {
      throw new RegistrationError('default must not contain line breaks');
    }
    return value;
  }
}
