/**
 * Ordinance Kernel — Error Types
 *
 * Expected denials are never thrown: they are returned as Condition values.
 * The errors below mark programmer or operator mistakes: a broken internal
 * state, an illegal registration, or a declaration that cannot be applied.
 */

/**
 * An internal state that should be unreachable was reached.
 *
 * If this surfaces at runtime it indicates a bug in the kernel or in the
 * code that built the permission graph, not a problem with caller input.
 */
export class InvariantViolationError extends Error {
  constructor(message: string) {
    super(`Invariant violation: ${message}`);
    this.name = 'InvariantViolationError';
  }
}

/**
 * A registration call was rejected: duplicate tag, group name or alias,
 * an illegal parameter builder value, a parameter added after a repeating
 * or rest-of-line parameter, or a change to a sealed permission.
 */
export class RegistrationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RegistrationError';
  }
}

/**
 * A parsed declaration statement could not be applied to an access context.
 * `line` is the 1-based source line of the statement.
 */
export class DeclarationError extends Error {
  constructor(
    readonly line: number,
    message: string,
  ) {
    super(`line ${line}: ${message}`);
    this.name = 'DeclarationError';
  }
}
