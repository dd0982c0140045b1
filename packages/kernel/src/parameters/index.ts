export { Parameter } from './parameter.js';
export type { ParamParseResult, ParamValue, RawArg, ValidityResult } from './parameter.js';
export { NumericParameter } from './numeric.js';
export { StringParameter } from './string.js';

import type { NumericParameter } from './numeric.js';
import type { StringParameter } from './string.js';

/** Closed set of parameter variants. */
export type AnyParameter = NumericParameter | StringParameter;
export { buildParameter } from './build.js';
