/**
 * Ordinance Kernel — Permission
 *
 * A Permission ("access") names a capability and owns its ordered parameter
 * list. Parameter order defines positional argument mapping.
 *
 * There are two kinds of Permission object:
 * - the registered permission, created by AccessControl.register() and
 *   shared by reference with every principal that holds a blanket grant
 * - an override, a clone owned by one principal whose parameters may be
 *   tightened through modifyParam()
 *
 * Lookup during evaluation always goes through the object reference, never
 * through the tag.
 */

import { RegistrationError } from '../errors.js';
import type { AnyParameter } from '../parameters/index.js';

export class Permission {
  private readonly _params: AnyParameter[] = [];
  private _sealed = false;

  constructor(
    readonly tag: string,
    /** The registered permission this object was cloned from, if it is an override. */
    readonly source?: Permission,
  ) {}

  get params(): ReadonlyArray<AnyParameter> {
    return this._params;
  }

  /**
   * True once the permission has been evaluated or a principal has taken an
   * override of it; the parameter list is fixed from then on.
   */
  get sealed(): boolean {
    return this._sealed;
  }

  /** True when this object is a principal's override rather than the registered permission. */
  get isOverride(): boolean {
    return this.source !== undefined;
  }

  /**
   * Append a parameter.
   *
   * Only the last parameter may repeat or take the rest of the line, so
   * nothing can follow one that does.
   */
  addParam(parameter: AnyParameter): this {
    if (this._sealed) {
      throw new RegistrationError(`access "${this.tag}" is already in use; its parameters are fixed`);
    }
    const last = this._params[this._params.length - 1];
    if (last !== undefined && (last.maxRepeats > 1 || last.takesRestOfLine)) {
      throw new RegistrationError(
        `access "${this.tag}": parameter ${this._params.length} repeats or takes the rest of the line ` +
          'and must be the last parameter',
      );
    }
    this._params.push(parameter);
    return this;
  }

  /**
   * Replace the parameter at the 1-based `index` with a clone and return the
   * clone for tightening. Only this permission's own list changes.
   */
  modifyParam(index: number): AnyParameter | undefined {
    const current = this._params[index - 1];
    if (current === undefined || !Number.isInteger(index)) {
      return undefined;
    }
    const copy = current.clone();
    this._params[index - 1] = copy;
    return copy;
  }

  /** New permission with the same tag and independent copies of every parameter. */
  clone(): Permission {
    const copy = new Permission(this.tag, this.source ?? this);
    for (const param of this._params) {
      copy._params.push(param.clone());
    }
    return copy;
  }

  /** Usage text, e.g. `slap <number 0..100> [number 0..10]`. */
  usage(): string {
    return [this.tag, ...this._params.map((p) => p.usage())].join(' ');
  }

  /** @internal called on first evaluation and when an override is taken */
  seal(): void {
    this._sealed = true;
  }
}
