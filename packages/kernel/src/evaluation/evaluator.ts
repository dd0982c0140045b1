/**
 * Ordinance Kernel — Access Evaluator
 *
 * Decides whether a principal may invoke a permission with a list of raw
 * arguments, and if so returns the parsed arguments.
 *
 * Evaluation order (the first failure wins):
 * 1. Deny or no grant: AccessDenied at NoAccess, no parameter index.
 * 2. For each argument slot, 1-based:
 *    a. pick the active parameter (repeating the last one where allowed,
 *       otherwise TooManyParams)
 *    b. parse the raw argument against it
 *    c. validate against the registered parameter (level Parameters)
 *    d. validate against the principal's override, if any (level UserParameters)
 *
 * Evaluation is synchronous and pure apart from sealing the permission on
 * first use.
 */

import { Condition, ConditionKind, DeniedLevel } from '../conditions/condition.js';
import { InvariantViolationError } from '../errors.js';
import type { AnyParameter, ParamValue, RawArg } from '../parameters/index.js';
import type { Permission } from '../permissions/permission.js';
import { BLANKET_ALLOW } from '../principals/principal.js';
import type { Principal } from '../principals/principal.js';

export type AccessResult =
  | { readonly ok: true; readonly args: ReadonlyArray<ParamValue> }
  | { readonly ok: false; readonly condition: Condition };

export function evaluateAccess(
  principal: Principal,
  permission: Permission,
  rawArgs: ReadonlyArray<RawArg>,
): AccessResult {
  const registered = permission.source ?? permission;
  const grant = principal.grantFor(registered);

  if (grant === undefined || principal.isDenied(registered)) {
    return deny(Condition.make(ConditionKind.AccessDenied), DeniedLevel.NoAccess);
  }

  registered.seal();

  const defaults = registered.params;
  const last = defaults[defaults.length - 1];
  const override = grant === BLANKET_ALLOW ? undefined : grant;

  const slots = Math.max(rawArgs.length, defaults.length + Math.max(0, (last?.minRepeats ?? 1) - 1));
  const args: ParamValue[] = [];

  for (let i = 1; i <= slots; i++) {
    let position: number;
    let raw = rawArgs[i - 1];

    if (i <= defaults.length) {
      position = i;
    } else if (last !== undefined && 1 + i - defaults.length <= last.maxRepeats) {
      position = defaults.length;
    } else {
      return deny(Condition.make(ConditionKind.TooManyParams), DeniedLevel.Parameters, i);
    }

    const active = paramAt(defaults, position);
    if (active.takesRestOfLine && rawArgs.length > i) {
      raw = rawArgs.slice(i - 1).map(String).join(' ');
    }

    const parsed = active.parse(principal, raw);
    if (!parsed.ok) {
      return deny(parsed.condition, DeniedLevel.Parameters, i);
    }

    const valid = active.isValid(principal, parsed.value);
    if (!valid.ok) {
      return deny(valid.condition, DeniedLevel.Parameters, i);
    }

    if (override !== undefined) {
      const personal = paramAt(override.params, position).isValid(principal, parsed.value);
      if (!personal.ok) {
        return deny(personal.condition, DeniedLevel.UserParameters, i);
      }
    }

    args.push(parsed.value);
    if (active.takesRestOfLine) {
      break;
    }
  }

  return { ok: true, args };
}

function paramAt(params: ReadonlyArray<AnyParameter>, position: number): AnyParameter {
  const param = params[position - 1];
  if (param === undefined) {
    throw new InvariantViolationError(`no parameter at position ${position}`);
  }
  return param;
}

function deny(condition: Condition, level: DeniedLevel, index?: number): AccessResult {
  condition.withLevel(level);
  if (index !== undefined) {
    condition.withParameterIndex(index);
  }
  return { ok: false, condition };
}
