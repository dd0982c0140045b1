/**
 * Ordinance Kernel — Conditions
 *
 * A Condition is a structured denial reason. Evaluation failures are ordinary
 * return values carrying a Condition, never exceptions.
 *
 * The level distinguishes three situations that callers explain differently:
 * - NoAccess: the principal holds no grant, or an explicit deny applies
 * - Parameters: an argument breaks the command's own declared rules
 * - UserParameters: an argument is within the command's rules but outside
 *   the principal's personal restriction
 */

import { InvariantViolationError } from '../errors.js';

export enum ConditionKind {
  AccessDenied = 'AccessDenied',
  MissingRequiredParam = 'MissingRequiredParam',
  TooManyParams = 'TooManyParams',
  InvalidNumber = 'InvalidNumber',
  InvalidString = 'InvalidString',
  TooLow = 'TooLow',
  TooHigh = 'TooHigh',
}

export enum DeniedLevel {
  NoAccess = 'NoAccess',
  Parameters = 'Parameters',
  UserParameters = 'UserParameters',
}

/** Message templates. `{n}` is replaced by the n-th format argument. */
const TEMPLATES: Readonly<Record<ConditionKind, string>> = {
  [ConditionKind.AccessDenied]: 'access denied',
  [ConditionKind.MissingRequiredParam]: 'argument is required and was left unspecified',
  [ConditionKind.TooManyParams]: 'too many arguments specified',
  [ConditionKind.InvalidNumber]: 'invalid number "{0}" specified',
  [ConditionKind.InvalidString]: 'invalid string "{0}" specified',
  [ConditionKind.TooLow]: 'specified number {0} is below your allowed minimum of {1}',
  [ConditionKind.TooHigh]: 'specified number {0} is above your allowed maximum of {1}',
};

export type FormatArg = string | number;

/** Serialized form, as written to the decision log. */
export interface ConditionJSON {
  readonly kind: ConditionKind;
  readonly level: DeniedLevel | null;
  readonly parameterIndex: number | null;
  readonly message: string;
}

export class Condition {
  private _level: DeniedLevel | undefined;
  private _parameterIndex: number | undefined;

  private constructor(
    readonly kind: ConditionKind,
    readonly message: string,
  ) {}

  /**
   * Build a condition of `kind`, rendering its message from the template.
   * Missing format arguments render as empty text; extra ones are ignored.
   */
  static make(kind: ConditionKind, ...formatArgs: ReadonlyArray<FormatArg>): Condition {
    const message = TEMPLATES[kind].replace(/\{(\d+)\}/g, (_match, digits: string) => {
      const arg = formatArgs[Number(digits)];
      return arg === undefined ? '' : String(arg);
    });
    return new Condition(kind, message);
  }

  get level(): DeniedLevel | undefined {
    return this._level;
  }

  get parameterIndex(): number | undefined {
    return this._parameterIndex;
  }

  /** Assign the denial level. May be called once per instance. */
  withLevel(level: DeniedLevel): this {
    if (this._level !== undefined) {
      throw new InvariantViolationError(`condition ${this.kind} already has level ${this._level}`);
    }
    this._level = level;
    return this;
  }

  /** Assign the 1-based offending parameter index. May be called once per instance. */
  withParameterIndex(index: number): this {
    if (!Number.isInteger(index) || index < 1) {
      throw new InvariantViolationError(`parameter index must be a positive integer, got ${index}`);
    }
    if (this._parameterIndex !== undefined) {
      throw new InvariantViolationError(
        `condition ${this.kind} already has parameter index ${this._parameterIndex}`,
      );
    }
    this._parameterIndex = index;
    return this;
  }

  is(kind: ConditionKind): boolean {
    return this.kind === kind;
  }

  toJSON(): ConditionJSON {
    return {
      kind: this.kind,
      level: this._level ?? null,
      parameterIndex: this._parameterIndex ?? null,
      message: this.message,
    };
  }
}
