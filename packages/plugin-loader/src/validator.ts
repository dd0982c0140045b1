/**
 * Ordinance Plugin Loader — Manifest Validator
 *
 * Structural checks on a plugin manifest before any of it reaches the
 * AccessControl. Parameter ordering and bounds are checked later by the
 * kernel as each parameter is added.
 */

import { canonicalize } from '@ordinance/declaration-dsl';
import type { PluginManifest } from './types.js';

export interface ManifestError {
  readonly message: string;
  /** Command the error belongs to, when it is not manifest-wide. */
  readonly command?: string;
}

export type ManifestValidation =
  | { readonly ok: true }
  | { readonly ok: false; readonly errors: ReadonlyArray<ManifestError> };

const PLUGIN_ID = /^[a-z0-9][a-z0-9_-]*$/;
const VERSION = /^\d+\.\d+\.\d+(?:[-+][0-9A-Za-z.-]+)?$/;
// Same alphabet as names in declaration files, so rules can refer to them.
const NAME = /^[A-Za-z0-9_.\-]+$/;

export function validateManifest(manifest: PluginManifest): ManifestValidation {
  const errors: ManifestError[] = [];

  if (!PLUGIN_ID.test(manifest.plugin_id)) {
    errors.push({ message: `plugin_id "${manifest.plugin_id}" must be lowercase letters, digits, "_" or "-"` });
  }
  for (const field of ['name', 'description', 'author'] as const) {
    if (manifest[field].trim() === '') {
      errors.push({ message: `${field} must not be empty` });
    }
  }
  if (!VERSION.test(manifest.version)) {
    errors.push({ message: `version "${manifest.version}" is not a semantic version` });
  }
  if (manifest.commands.length === 0) {
    errors.push({ message: 'a plugin must declare at least one command' });
  }

  const names = new Set<string>();
  const paramsByAccess = new Map<string, string>();
  for (const command of manifest.commands) {
    if (!NAME.test(command.name)) {
      errors.push({ message: `invalid command name "${command.name}"`, command: command.name });
    }
    if (names.has(command.name)) {
      errors.push({ message: `command "${command.name}" is declared twice`, command: command.name });
    }
    names.add(command.name);

    if (!NAME.test(command.access)) {
      errors.push({ message: `invalid access tag "${command.access}"`, command: command.name });
    }
    for (const group of command.grant) {
      if (!NAME.test(group)) {
        errors.push({ message: `invalid group name "${group}"`, command: command.name });
      }
    }

    const params = canonicalize(command.params);
    const previous = paramsByAccess.get(command.access);
    if (previous !== undefined && previous !== params) {
      errors.push({
        message: `commands sharing access "${command.access}" must declare the same params`,
        command: command.name,
      });
    }
    paramsByAccess.set(command.access, params);
  }

  return errors.length === 0 ? { ok: true } : { ok: false, errors };
}
