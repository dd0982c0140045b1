/**
 * Ordinance Kernel — Principals
 *
 * A Principal is a node in the permission hierarchy: a named group, or a user
 * bound to one or more external aliases. Every principal except the root is
 * created by cloning its parent.
 *
 * Cloning copies the parent's allow and deny state at creation time. Later
 * changes to the parent do not reach children that already exist, and a
 * child's changes never reach its parent or siblings.
 */

import { RegistrationError } from '../errors.js';
import { evaluateAccess } from '../evaluation/evaluator.js';
import type { AccessResult } from '../evaluation/evaluator.js';
import type { RawArg } from '../parameters/index.js';
import type { Permission } from '../permissions/permission.js';

/** Grant with no principal-specific override: the permission's own rules apply. */
export const BLANKET_ALLOW: unique symbol = Symbol('ordinance.blanket-allow');

/** What a principal holds for a permission: a blanket grant or its own override. */
export type Grant = typeof BLANKET_ALLOW | Permission;

export type PrincipalKind = 'group' | 'user';

/**
 * Name bookkeeping owned by the access context. Principals report new groups
 * and aliases here; duplicates are rejected by the directory.
 */
export interface PrincipalDirectory {
  addGroup(group: Principal): void;
  /** Bind every alias to `user`, or none of them if any is taken or repeated. */
  bindAliases(aliases: ReadonlyArray<string>, user: Principal): void;
}

export class Principal {
  private readonly _allow: Map<Permission, Grant>;
  private readonly _deny: Set<Permission>;

  constructor(
    private readonly directory: PrincipalDirectory,
    readonly name: string,
    readonly kind: PrincipalKind,
    readonly parent?: Principal,
    readonly aliases: ReadonlyArray<string> = [],
  ) {
    this._allow = new Map();
    this._deny = new Set(parent?._deny);
    if (parent !== undefined) {
      for (const [permission, grant] of parent._allow) {
        this._allow.set(permission, grant === BLANKET_ALLOW ? grant : grant.clone());
      }
    }
  }

  /** Create and register a child group. Group names are unique per access context. */
  createClonedGroup(name: string): Principal {
    const group = new Principal(this.directory, name, 'group', this);
    this.directory.addGroup(group);
    return group;
  }

  /**
   * Create a child user bound to `aliases`. At least one alias is required;
   * the first becomes the user's name.
   */
  createClonedUser(...aliases: string[]): Principal {
    const [first] = aliases;
    if (first === undefined) {
      throw new RegistrationError('a user needs at least one alias');
    }
    const user = new Principal(this.directory, first, 'user', this, [...aliases]);
    this.directory.bindAliases(aliases, user);
    return user;
  }

  /**
   * Install a personal override of `permission` and return it.
   *
   * The override is a fresh clone of the registered permission. Without
   * further tightening through modifyParam() it behaves like a blanket grant.
   * Creating an override seals the registered permission's parameter list.
   */
  allow(permission: Permission): Permission {
    const registered = permission.source ?? permission;
    registered.seal();
    const override = registered.clone();
    this._allow.set(registered, override);
    return override;
  }

  /** Grant `permission` with no override. */
  allowBlanket(permission: Permission): void {
    this._allow.set(permission.source ?? permission, BLANKET_ALLOW);
  }

  /** Explicitly deny `permission`. A deny dominates every allow. */
  deny(permission: Permission): void {
    this._deny.add(permission.source ?? permission);
  }

  grantFor(permission: Permission): Grant | undefined {
    return this._allow.get(permission.source ?? permission);
  }

  isDenied(permission: Permission): boolean {
    return this._deny.has(permission.source ?? permission);
  }

  /** Registered permissions this principal holds a grant for and is not denied. */
  granted(): ReadonlyArray<Permission> {
    return [...this._allow.keys()].filter((permission) => !this._deny.has(permission));
  }

  checkAccess(permission: Permission, ...rawArgs: RawArg[]): AccessResult {
    return evaluateAccess(this, permission, rawArgs);
  }
}
