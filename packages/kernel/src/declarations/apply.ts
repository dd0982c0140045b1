/**
 * Ordinance Kernel — Declaration Replay
 *
 * Rebuilds a permission graph by replaying parsed declaration statements, in
 * order, against an AccessControl. Names must be declared before they are
 * referenced: a group before its children and users, an access before its
 * params, grants and restrictions.
 */

import type { Declaration, TargetRef } from '@ordinance/declaration-dsl';
import type { AccessControl } from '../access-control.js';
import { DeclarationError, RegistrationError } from '../errors.js';
import { buildParameter } from '../parameters/index.js';
import type { Permission } from '../permissions/permission.js';
import { BLANKET_ALLOW } from '../principals/principal.js';
import type { Principal } from '../principals/principal.js';

/**
 * Apply every statement. Stops at the first statement that cannot be
 * applied, throwing a DeclarationError carrying its line; statements before
 * it remain applied.
 */
export function applyDeclarations(control: AccessControl, declarations: ReadonlyArray<Declaration>): void {
  for (const declaration of declarations) {
    try {
      applyOne(control, declaration);
    } catch (err) {
      if (err instanceof RegistrationError) {
        throw new DeclarationError(declaration.line, err.message);
      }
      throw err;
    }
  }
}

function applyOne(control: AccessControl, declaration: Declaration): void {
  const { line } = declaration;

  switch (declaration.kind) {
    case 'group': {
      group(control, declaration.parent, line).createClonedGroup(declaration.name);
      return;
    }
    case 'user': {
      group(control, declaration.group, line).createClonedUser(...declaration.aliases);
      return;
    }
    case 'access': {
      const groups = declaration.grant.map((name) => group(control, name, line));
      control.register(declaration.tag, ...groups);
      return;
    }
    case 'param': {
      permission(control, declaration.tag, line).addParam(buildParameter(declaration.param));
      return;
    }
    case 'allow': {
      target(control, declaration.target, line).allowBlanket(permission(control, declaration.tag, line));
      return;
    }
    case 'deny': {
      target(control, declaration.target, line).deny(permission(control, declaration.tag, line));
      return;
    }
    case 'restrict': {
      const principal = target(control, declaration.target, line);
      const registered = permission(control, declaration.tag, line);
      const grant = principal.grantFor(registered);
      const override = grant === undefined || grant === BLANKET_ALLOW ? principal.allow(registered) : grant;

      const param = override.modifyParam(declaration.index);
      if (param === undefined) {
        throw new DeclarationError(
          line,
          `access "${declaration.tag}" has no parameter ${declaration.index} (it has ${registered.params.length})`,
        );
      }
      if (param.kind !== 'number') {
        throw new DeclarationError(line, `parameter ${declaration.index} of "${declaration.tag}" is not a number`);
      }
      const { min, max, roundTo } = declaration.bounds;
      if (min !== undefined) param.setMin(min);
      if (max !== undefined) param.setMax(max);
      if (roundTo !== undefined) param.setRoundTo(roundTo);
      return;
    }
  }
}

function group(control: AccessControl, name: string, line: number): Principal {
  const found = control.getGroup(name);
  if (found === undefined) {
    throw new DeclarationError(line, `unknown group "${name}"`);
  }
  return found;
}

function permission(control: AccessControl, tag: string, line: number): Permission {
  const found = control.getPermission(tag);
  if (found === undefined) {
    throw new DeclarationError(line, `unknown access "${tag}"`);
  }
  return found;
}

function target(control: AccessControl, ref: TargetRef, line: number): Principal {
  if (ref.kind === 'group') {
    return group(control, ref.name, line);
  }
  const user = control.resolvePrincipal(ref.alias);
  if (user === undefined) {
    throw new DeclarationError(line, `unknown user "${ref.alias}"`);
  }
  return user;
}
