/**
 * Shared permission-graph fixtures for kernel tests.
 */

import { AccessControl, NumericParameter, StringParameter } from '../src/index.js';
import type { AccessResult, Condition, Permission } from '../src/index.js';

/** Tighten the numeric parameter at `index` of an override. */
export function numericAt(override: Permission, index: number): NumericParameter {
  const param = override.modifyParam(index);
  if (param === undefined || param.kind !== 'number') {
    throw new Error(`no numeric parameter at ${index}`);
  }
  return param;
}

/** The denial condition of a result, failing the test if access was allowed. */
export function denied(result: AccessResult): Condition {
  if (result.ok) {
    throw new Error(`expected a denial, got args ${JSON.stringify(result.args)}`);
  }
  return result.condition;
}

/**
 * - group `admin` extends the root group `user`
 * - `slap` takes one number 0..100 and is granted to admin
 * - `say` takes the rest of the line and is granted to admin
 * - user1 and user3 are admins; user3's slap is restricted to -50..50
 * - user2 belongs to the root group and holds no grants
 */
export function buildWorld() {
  const control = new AccessControl();
  const admin = control.root.createClonedGroup('admin');

  const slap = control.register('slap', admin);
  slap.addParam(new NumericParameter().setMin(0).setMax(100));

  const say = control.register('say', admin);
  say.addParam(new StringParameter().setTakesRestOfLine());

  const user1 = admin.createClonedUser('user1');
  const user2 = control.root.createClonedUser('user2');
  const user3 = admin.createClonedUser('user3');
  numericAt(user3.allow(slap), 1).setMin(-50).setMax(50);

  return { control, admin, slap, say, user1, user2, user3 };
}
