/**
 * Ordinance Kernel — Parameter Construction
 *
 * Builds a Parameter from a structured ParamSpec, as written in a
 * declaration file or a plugin manifest.
 */

import type { ParamSpec } from '@ordinance/declaration-dsl';
import { RegistrationError } from '../errors.js';
import type { AnyParameter } from './index.js';
import { NumericParameter } from './numeric.js';
import { StringParameter } from './string.js';

export function buildParameter(spec: ParamSpec): AnyParameter {
  const param = spec.type === 'number' ? buildNumeric(spec) : buildString(spec);

  // maxRepeats first: minRepeats may not exceed it.
  if (spec.maxRepeats !== undefined) param.setMaxRepeats(spec.maxRepeats);
  if (spec.minRepeats !== undefined) param.setMinRepeats(spec.minRepeats);
  if (spec.rest === true) param.setTakesRestOfLine();
  return param;
}

function buildNumeric(spec: ParamSpec): NumericParameter {
  const param = new NumericParameter();
  if (spec.min !== undefined) param.setMin(spec.min);
  if (spec.max !== undefined) param.setMax(spec.max);
  if (spec.roundTo !== undefined) param.setRoundTo(spec.roundTo);
  if (spec.default !== undefined) {
    if (typeof spec.default !== 'number') {
      throw new RegistrationError(`number parameter default must be a number, got ${JSON.stringify(spec.default)}`);
    }
    param.setDefault(spec.default);
  }
  return param;
}

function buildString(spec: ParamSpec): StringParameter {
  if (spec.min !== undefined || spec.max !== undefined || spec.roundTo !== undefined) {
    throw new RegistrationError('min, max and roundTo apply to number parameters only');
  }
  const param = new StringParameter();
  if (spec.default !== undefined) {
    param.setDefault(String(spec.default));
  }
  return param;
}
