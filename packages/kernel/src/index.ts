/**
 * @ordinance/kernel
 *
 * Ordinance access kernel: conditions, parameters, permissions, principals,
 * the access evaluator, the command gate and the decision logger.
 *
 * This package is side-effect free. It contains no imports of node:fs,
 * node:child_process, node:net, fetch, or any other I/O API. Decision log
 * persistence is injected through the LogSink interface; the concrete sink
 * lives in @ordinance/runtime-host.
 */

// Conditions
export { Condition, ConditionKind, DeniedLevel } from './conditions/condition.js';
export type { ConditionJSON, FormatArg } from './conditions/condition.js';

// Errors
export { DeclarationError, InvariantViolationError, RegistrationError } from './errors.js';

// Parameters
export { Parameter, NumericParameter, StringParameter, buildParameter } from './parameters/index.js';
export type { AnyParameter, ParamParseResult, ParamValue, RawArg, ValidityResult } from './parameters/index.js';

// Permissions and principals
export { Permission } from './permissions/permission.js';
export { BLANKET_ALLOW, Principal } from './principals/principal.js';
export type { Grant, PrincipalDirectory, PrincipalKind } from './principals/principal.js';
export { AccessControl } from './access-control.js';
export type { AccessControlOptions } from './access-control.js';

// Evaluation
export { evaluateAccess } from './evaluation/evaluator.js';
export type { AccessResult } from './evaluation/evaluator.js';
export { CommandGate } from './evaluation/gate.js';
export type { CommandGateOptions, GateContext, GateHandler, GateOutcome, GateRequest } from './evaluation/gate.js';

// Declarations
export { applyDeclarations } from './declarations/apply.js';

// Decision log (sink implementation lives in runtime-host)
export { DecisionLogger } from './logging/decision-log.js';
export type { LogSink } from './logging/log-sink.js';
export type { DecisionLogEntry } from './logging/types.js';

// Re-export the declaration language so consumers of @ordinance/kernel do
// not need a direct dependency on declaration-dsl.
export { hashDeclarations, parseArgs, parseDeclarations } from '@ordinance/declaration-dsl';
export type { Declaration, ParamSpec, ParseError, ParseResult } from '@ordinance/declaration-dsl';
