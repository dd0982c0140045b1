/**
 * Ordinance Kernel — Evaluator Tests
 *
 * evaluator/deny-precedence: a deny dominates every grant and argument
 * evaluator/required-args: missing required arguments fail at the first gap
 * evaluator/range-tiering: command bounds fail at Parameters, personal bounds at UserParameters
 * evaluator/round-trip: numeric text and native numbers evaluate identically
 * evaluator/repetition: the last parameter repeats up to maxRepeats
 * evaluator/scenarios: slap and say end to end
 *
 * Tests are pure: no I/O, no clock dependency, no state shared between tests.
 */

import { describe, it, expect } from 'vitest';
import {
  AccessControl,
  ConditionKind,
  DeniedLevel,
  NumericParameter,
  RegistrationError,
  StringParameter,
} from '../src/index.js';
import { buildWorld, denied, numericAt } from './fixtures.js';

// ---------------------------------------------------------------------------
// evaluator/scenarios
// ---------------------------------------------------------------------------

describe('evaluator: scenarios', () => {
  it('allows slap within the command range', () => {
    const { slap, user1 } = buildWorld();
    expect(user1.checkAccess(slap, '50')).toEqual({ ok: true, args: [50] });
  });

  it('denies slap above the command range at Parameters', () => {
    const { slap, user1 } = buildWorld();
    const condition = denied(user1.checkAccess(slap, '101'));
    expect(condition.kind).toBe(ConditionKind.TooHigh);
    expect(condition.level).toBe(DeniedLevel.Parameters);
    expect(condition.parameterIndex).toBe(1);
    expect(condition.message).toBe('specified number 101 is above your allowed maximum of 100');
  });

  it('denies slap above a personal restriction at UserParameters', () => {
    const { slap, user3 } = buildWorld();
    const condition = denied(user3.checkAccess(slap, 51));
    expect(condition.kind).toBe(ConditionKind.TooHigh);
    expect(condition.level).toBe(DeniedLevel.UserParameters);
    expect(condition.parameterIndex).toBe(1);
    expect(condition.message).toBe('specified number 51 is above your allowed maximum of 50');
  });

  it('denies a principal with no grant at NoAccess without an index', () => {
    const { slap, user2 } = buildWorld();
    const condition = denied(user2.checkAccess(slap, 6));
    expect(condition.kind).toBe(ConditionKind.AccessDenied);
    expect(condition.level).toBe(DeniedLevel.NoAccess);
    expect(condition.parameterIndex).toBeUndefined();
  });

  it('fills an omitted optional slot with its default', () => {
    const control = new AccessControl();
    const admin = control.root.createClonedGroup('admin');
    const slap = control.register('slap', admin);
    slap.addParam(new NumericParameter().setMin(0).setMax(100));
    slap.addParam(new NumericParameter().setMin(0).setMax(10).setMinRepeats(0).setDefault(1));
    const user1 = admin.createClonedUser('user1');

    expect(user1.checkAccess(slap, '10')).toEqual({ ok: true, args: [10, 1] });
    expect(user1.checkAccess(slap, '10', '4')).toEqual({ ok: true, args: [10, 4] });

    const tooMany = denied(user1.checkAccess(slap, '10', '4', '4'));
    expect(tooMany.kind).toBe(ConditionKind.TooManyParams);
    expect(tooMany.level).toBe(DeniedLevel.Parameters);
    expect(tooMany.parameterIndex).toBe(3);
  });

  it('joins the rest of the line into one argument', () => {
    const { say, user1 } = buildWorld();
    expect(user1.checkAccess(say, 'hello', 'world')).toEqual({ ok: true, args: ['hello world'] });
    expect(user1.checkAccess(say, 'one')).toEqual({ ok: true, args: ['one'] });
    expect(user1.checkAccess(say, 'volume', 11)).toEqual({ ok: true, args: ['volume 11'] });
  });

  it('requires at least one word for a required rest-of-line parameter', () => {
    const { say, user1 } = buildWorld();
    const condition = denied(user1.checkAccess(say));
    expect(condition.kind).toBe(ConditionKind.MissingRequiredParam);
    expect(condition.parameterIndex).toBe(1);
  });

  it('accepts no arguments for a parameterless permission and rejects any', () => {
    const control = new AccessControl();
    const ping = control.register('ping', control.root);
    const user = control.root.createClonedUser('someone');
    expect(user.checkAccess(ping)).toEqual({ ok: true, args: [] });

    const condition = denied(user.checkAccess(ping, 'x'));
    expect(condition.kind).toBe(ConditionKind.TooManyParams);
    expect(condition.parameterIndex).toBe(1);
  });
});

// ---------------------------------------------------------------------------
// evaluator/deny-precedence
// ---------------------------------------------------------------------------

describe('evaluator: deny precedence', () => {
  it('denies regardless of argument validity', () => {
    const { slap, user1 } = buildWorld();
    user1.deny(slap);
    for (const args of [['50'], ['101'], ['abc'], [], ['1', '2', '3']]) {
      const condition = denied(user1.checkAccess(slap, ...args));
      expect(condition.kind).toBe(ConditionKind.AccessDenied);
      expect(condition.level).toBe(DeniedLevel.NoAccess);
      expect(condition.parameterIndex).toBeUndefined();
    }
  });

  it('dominates an override granted after the deny', () => {
    const { slap, user1 } = buildWorld();
    user1.deny(slap);
    user1.allow(slap);
    expect(denied(user1.checkAccess(slap, '5')).kind).toBe(ConditionKind.AccessDenied);
  });

  it('is inherited by principals cloned after it', () => {
    const { control, admin, slap } = buildWorld();
    const muted = admin.createClonedGroup('muted');
    muted.deny(slap);
    const user = muted.createClonedUser('quiet');
    expect(denied(control.checkAccess('quiet', slap, '5')).kind).toBe(ConditionKind.AccessDenied);
    expect(user.isDenied(slap)).toBe(true);
  });
});

// ---------------------------------------------------------------------------
// evaluator/required-args
// ---------------------------------------------------------------------------

describe('evaluator: required arguments', () => {
  it('fails at the first missing index', () => {
    const control = new AccessControl();
    const give = control.register('give', control.root);
    give.addParam(new NumericParameter()).addParam(new NumericParameter()).addParam(new StringParameter());
    const user = control.root.createClonedUser('giver');

    for (const [args, index] of [
      [[], 1],
      [['1'], 2],
      [['1', '2'], 3],
    ] as const) {
      const condition = denied(user.checkAccess(give, ...args));
      expect(condition.kind).toBe(ConditionKind.MissingRequiredParam);
      expect(condition.level).toBe(DeniedLevel.Parameters);
      expect(condition.parameterIndex).toBe(index);
    }
    expect(user.checkAccess(give, '1', '2', 'x')).toEqual({ ok: true, args: [1, 2, 'x'] });
  });

  it('reports a parse failure at its own index', () => {
    const { control, slap } = buildWorld();
    const condition = denied(control.checkAccess('user1', slap, 'lots'));
    expect(condition.kind).toBe(ConditionKind.InvalidNumber);
    expect(condition.level).toBe(DeniedLevel.Parameters);
    expect(condition.parameterIndex).toBe(1);
  });
});

// ---------------------------------------------------------------------------
// evaluator/range-tiering
// ---------------------------------------------------------------------------

describe('evaluator: range tiering', () => {
  it('checks the command range before the personal range', () => {
    const { slap, user3 } = buildWorld();

    const outside = denied(user3.checkAccess(slap, '101'));
    expect(outside.kind).toBe(ConditionKind.TooHigh);
    expect(outside.level).toBe(DeniedLevel.Parameters);

    const belowCommand = denied(user3.checkAccess(slap, '-10'));
    expect(belowCommand.kind).toBe(ConditionKind.TooLow);
    expect(belowCommand.level).toBe(DeniedLevel.Parameters);
    expect(belowCommand.message).toBe('specified number -10 is below your allowed minimum of 0');

    const personal = denied(user3.checkAccess(slap, '75'));
    expect(personal.level).toBe(DeniedLevel.UserParameters);

    expect(user3.checkAccess(slap, '50')).toEqual({ ok: true, args: [50] });
  });

  it('fails the low side of a narrowed range at UserParameters', () => {
    const { control, admin, slap } = buildWorld();
    const trainee = admin.createClonedUser('trainee');
    numericAt(trainee.allow(slap), 1).setMin(20).setMax(80);

    const low = denied(control.checkAccess(trainee, slap, 10));
    expect(low.kind).toBe(ConditionKind.TooLow);
    expect(low.level).toBe(DeniedLevel.UserParameters);
    expect(low.message).toBe('specified number 10 is below your allowed minimum of 20');

    const high = denied(control.checkAccess(trainee, slap, 81));
    expect(high.level).toBe(DeniedLevel.UserParameters);

    expect(control.checkAccess(trainee, slap, 20)).toEqual({ ok: true, args: [20] });
  });

  it('behaves like a blanket grant when an override is not tightened', () => {
    const { slap, admin } = buildWorld();
    const plain = admin.createClonedUser('plain');
    plain.allow(slap);
    expect(plain.checkAccess(slap, '100')).toEqual({ ok: true, args: [100] });
    expect(denied(plain.checkAccess(slap, '101')).level).toBe(DeniedLevel.Parameters);
  });
});

// ---------------------------------------------------------------------------
// evaluator/round-trip
// ---------------------------------------------------------------------------

describe('evaluator: numeric round trip', () => {
  it('evaluates text and native numbers identically', () => {
    const { slap, user1 } = buildWorld();
    for (const value of [0, 1, 42, 99.5, 100]) {
      expect(user1.checkAccess(slap, String(value))).toEqual(user1.checkAccess(slap, value));
      expect(user1.checkAccess(slap, String(value))).toEqual({ ok: true, args: [value] });
    }
  });
});

// ---------------------------------------------------------------------------
// evaluator/repetition
// ---------------------------------------------------------------------------

describe('evaluator: repetition', () => {
  function buildHeal(minRepeats: number) {
    const control = new AccessControl();
    const heal = control.register('heal', control.root);
    heal.addParam(new NumericParameter().setMin(1).setMaxRepeats(3).setMinRepeats(minRepeats));
    const medic = control.root.createClonedUser('medic');
    return { heal, medic };
  }

  it('accepts between minRepeats and maxRepeats trailing arguments', () => {
    const { heal, medic } = buildHeal(1);
    expect(medic.checkAccess(heal, '1')).toEqual({ ok: true, args: [1] });
    expect(medic.checkAccess(heal, '1', '2')).toEqual({ ok: true, args: [1, 2] });
    expect(medic.checkAccess(heal, '1', '2', '3')).toEqual({ ok: true, args: [1, 2, 3] });
  });

  it('rejects the argument after maxRepeats with TooManyParams', () => {
    const { heal, medic } = buildHeal(1);
    const condition = denied(medic.checkAccess(heal, '1', '2', '3', '4'));
    expect(condition.kind).toBe(ConditionKind.TooManyParams);
    expect(condition.level).toBe(DeniedLevel.Parameters);
    expect(condition.parameterIndex).toBe(4);
  });

  it('requires minRepeats occurrences', () => {
    const { heal, medic } = buildHeal(2);
    const condition = denied(medic.checkAccess(heal, '1'));
    expect(condition.kind).toBe(ConditionKind.MissingRequiredParam);
    expect(condition.parameterIndex).toBe(2);
    expect(medic.checkAccess(heal, '1', '2')).toEqual({ ok: true, args: [1, 2] });
  });

  it('validates every repeated occurrence', () => {
    const { heal, medic } = buildHeal(1);
    const condition = denied(medic.checkAccess(heal, '1', '0'));
    expect(condition.kind).toBe(ConditionKind.TooLow);
    expect(condition.parameterIndex).toBe(2);
  });

  it('checks repeated occurrences against the override of the last parameter', () => {
    const control = new AccessControl();
    const heal = control.register('heal');
    heal.addParam(new NumericParameter().setMin(1).setMax(100).setMaxRepeats(3));
    const nurse = control.root.createClonedUser('nurse');
    numericAt(nurse.allow(heal), 1).setMax(10);

    const condition = denied(nurse.checkAccess(heal, '5', '50'));
    expect(condition.kind).toBe(ConditionKind.TooHigh);
    expect(condition.level).toBe(DeniedLevel.UserParameters);
    expect(condition.parameterIndex).toBe(2);
  });
});

// ---------------------------------------------------------------------------
// evaluator/sealing
// ---------------------------------------------------------------------------

describe('evaluator: sealing', () => {
  it('fixes the parameter list after the first evaluation', () => {
    const control = new AccessControl();
    const kick = control.register('kick', control.root);
    const user = control.root.createClonedUser('kicker');
    expect(kick.sealed).toBe(false);
    user.checkAccess(kick);
    expect(kick.sealed).toBe(true);
    expect(() => kick.addParam(new StringParameter())).toThrow(RegistrationError);
  });

  it('fixes the parameter list once an override is taken', () => {
    const control = new AccessControl();
    const kick = control.register('kick');
    control.root.allow(kick);
    expect(() => kick.addParam(new StringParameter())).toThrow(RegistrationError);
  });
});
