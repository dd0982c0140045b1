/**
 * Ordinance Kernel — Access Control Context
 *
 * An AccessControl owns one permission graph: the root group, every group
 * and user cloned from it, the registered permissions, and the group-name
 * and alias tables. Instances are fully isolated from each other.
 *
 * The graph is declared once at boot (through register() and the principal
 * builders, or by replaying a declaration file) and is read-mostly after
 * that. Nothing here is asynchronous and nothing is locked; a host that
 * reconfigures while serving requests must synchronize externally.
 */

import { Condition, ConditionKind, DeniedLevel } from './conditions/condition.js';
import { RegistrationError } from './errors.js';
import type { AccessResult } from './evaluation/evaluator.js';
import type { RawArg } from './parameters/index.js';
import { Permission } from './permissions/permission.js';
import { Principal } from './principals/principal.js';
import type { PrincipalDirectory } from './principals/principal.js';

export interface AccessControlOptions {
  /** Name of the root group. Default `user`. */
  readonly rootGroup?: string;
}

export class AccessControl {
  readonly root: Principal;

  private readonly permissions = new Map<string, Permission>();
  private readonly groups = new Map<string, Principal>();
  private readonly aliases = new Map<string, Principal>();

  constructor(options: AccessControlOptions = {}) {
    const directory: PrincipalDirectory = {
      addGroup: (group) => {
        if (this.groups.has(group.name)) {
          throw new RegistrationError(`group "${group.name}" already exists`);
        }
        this.groups.set(group.name, group);
      },
      bindAliases: (aliases, user) => {
        const seen = new Set<string>();
        for (const alias of aliases) {
          const existing = this.aliases.get(alias);
          if (existing !== undefined) {
            throw new RegistrationError(`alias "${alias}" is already bound to "${existing.name}"`);
          }
          if (seen.has(alias)) {
            throw new RegistrationError(`alias "${alias}" is listed twice`);
          }
          seen.add(alias);
        }
        for (const alias of aliases) {
          this.aliases.set(alias, user);
        }
      },
    };
    this.root = new Principal(directory, options.rootGroup ?? 'user', 'group');
    directory.addGroup(this.root);
  }

  /**
   * Register a new permission and grant it, without override, to each of
   * `groups`. Tags are unique per context.
   */
  register(tag: string, ...groups: Principal[]): Permission {
    if (this.permissions.has(tag)) {
      throw new RegistrationError(`access "${tag}" is already registered`);
    }
    const permission = new Permission(tag);
    this.permissions.set(tag, permission);
    for (const group of groups) {
      group.allowBlanket(permission);
    }
    return permission;
  }

  getPermission(tag: string): Permission | undefined {
    return this.permissions.get(tag);
  }

  getGroup(name: string): Principal | undefined {
    return this.groups.get(name);
  }

  resolvePrincipal(alias: string): Principal | undefined {
    return this.aliases.get(alias);
  }

  listPermissions(): ReadonlyArray<Permission> {
    return [...this.permissions.values()];
  }

  listGroups(): ReadonlyArray<Principal> {
    return [...this.groups.values()];
  }

  /** Every user, once per user even when bound to several aliases. */
  listUsers(): ReadonlyArray<Principal> {
    return [...new Set(this.aliases.values())];
  }

  /**
   * Evaluate access for a principal or an alias. An alias bound to no user
   * is denied at NoAccess, the same as a principal without a grant.
   */
  checkAccess(principal: Principal | string, permission: Permission, ...rawArgs: RawArg[]): AccessResult {
    const resolved = typeof principal === 'string' ? this.resolvePrincipal(principal) : principal;
    if (resolved === undefined) {
      return {
        ok: false,
        condition: Condition.make(ConditionKind.AccessDenied).withLevel(DeniedLevel.NoAccess),
      };
    }
    return resolved.checkAccess(permission, ...rawArgs);
  }
}
