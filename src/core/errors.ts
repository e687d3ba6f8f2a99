import type { ErrorDetail } from '../schema/results.js';
import type { ParameterType } from '../schema/parameter.js';
import type { OperationType } from '../schema/operation.js';

// ── Base ─────────────────────────────────────────────────────

export abstract class RoutineError extends Error {
  abstract readonly kind: string;

  toDetail(): ErrorDetail {
    return { kind: this.kind, message: this.message };
  }
}

// ── Static validation ────────────────────────────────────────

export type ValidationIssueCode =
  | 'unused_parameter'
  | 'undefined_placeholder'
  | 'duplicate_parameter'
  | 'name_conflict';

export interface ValidationLocation {
  operationIndex?: number | undefined;
  field?: string | undefined;
}

export abstract class ValidationError extends RoutineError {
  abstract readonly code: ValidationIssueCode;
  readonly location: ValidationLocation;

  constructor(message: string, location: ValidationLocation = {}) {
    super(message);
    this.location = location;
  }
}

export class UnusedParameterError extends ValidationError {
  readonly kind = 'UnusedParameterError';
  readonly code = 'unused_parameter';
  readonly parameter: string;

  constructor(parameter: string) {
    super(`Parameter "${parameter}" is declared but never referenced`);
    this.name = 'UnusedParameterError';
    this.parameter = parameter;
  }
}

export class UndefinedPlaceholderError extends ValidationError {
  readonly kind = 'UndefinedPlaceholderError';
  readonly code = 'undefined_placeholder';
  readonly placeholder: string;

  constructor(placeholder: string, location: ValidationLocation, reason?: string) {
    super(
      `Placeholder "{{${placeholder}}}" in ${describeLocation(location)} ` +
        (reason ?? 'does not name a declared parameter or builtin'),
      location,
    );
    this.name = 'UndefinedPlaceholderError';
    this.placeholder = placeholder;
  }
}

export class DuplicateParameterError extends ValidationError {
  readonly kind = 'DuplicateParameterError';
  readonly code = 'duplicate_parameter';
  readonly parameter: string;

  constructor(parameter: string) {
    super(`Parameter "${parameter}" is declared more than once`);
    this.name = 'DuplicateParameterError';
    this.parameter = parameter;
  }
}

export class NameConflictError extends ValidationError {
  readonly kind = 'NameConflictError';
  readonly code = 'name_conflict';
  readonly key: string;

  constructor(key: string, location: ValidationLocation) {
    super(
      `storeAs key "${key}" in ${describeLocation(location)} shadows a declared parameter`,
      location,
    );
    this.name = 'NameConflictError';
    this.key = key;
  }
}

/** Thrown when a routine with a non-empty validation report is offered for acceptance. */
export class RoutineValidationError extends RoutineError {
  readonly kind = 'RoutineValidationError';
  readonly exitCode = 2;
  readonly issues: readonly ValidationError[];

  constructor(routineName: string, issues: readonly ValidationError[]) {
    super(
      `Routine "${routineName}" failed validation with ${String(issues.length)} issue(s):\n` +
        issues.map((i) => `  - ${i.message}`).join('\n'),
    );
    this.name = 'RoutineValidationError';
    this.issues = issues;
  }
}

// ── Interpolation ────────────────────────────────────────────

export class CoercionError extends RoutineError {
  readonly kind = 'CoercionError';
  readonly parameter: string;
  readonly declaredType: ParameterType;
  readonly rawValue: unknown;

  constructor(parameter: string, declaredType: ParameterType, rawValue: unknown) {
    super(
      `Cannot coerce value ${JSON.stringify(rawValue)} of parameter "${parameter}" to ${declaredType}`,
    );
    this.name = 'CoercionError';
    this.parameter = parameter;
    this.declaredType = declaredType;
    this.rawValue = rawValue;
  }
}

export class MissingValueError extends RoutineError {
  readonly kind = 'MissingValueError';
  readonly valueName: string;

  constructor(valueName: string, reason = 'has no value in the execution context') {
    super(`"${valueName}" ${reason}`);
    this.name = 'MissingValueError';
    this.valueName = valueName;
  }
}

// ── Execution ────────────────────────────────────────────────

export class ScriptValidationError extends RoutineError {
  readonly kind = 'ScriptValidationError';
  readonly violations: readonly string[];

  constructor(violations: readonly string[]) {
    super(`Script rejected: ${violations.join('; ')}`);
    this.name = 'ScriptValidationError';
    this.violations = violations;
  }
}

export class CollaboratorError extends RoutineError {
  readonly kind = 'CollaboratorError';
  readonly operation: OperationType;
  readonly detail: string | undefined;

  constructor(operation: OperationType, message: string, cause?: unknown) {
    super(`${operation} failed: ${message}`, cause !== undefined ? { cause } : undefined);
    this.name = 'CollaboratorError';
    this.operation = operation;
    this.detail = cause !== undefined ? describeCause(cause) : undefined;
  }

  override toDetail(): ErrorDetail {
    return this.detail !== undefined
      ? { kind: this.kind, message: this.message, detail: this.detail }
      : { kind: this.kind, message: this.message };
  }
}

export class RunCancelledError extends RoutineError {
  readonly kind = 'RunCancelledError';

  constructor(reason = 'Run cancelled before the operation started') {
    super(reason);
    this.name = 'RunCancelledError';
  }
}

// ── Helpers ──────────────────────────────────────────────────

/** Normalize anything thrown into a routine error detail. */
export function toErrorDetail(err: unknown): ErrorDetail {
  if (err instanceof RoutineError) return err.toDetail();
  if (err instanceof Error) return { kind: err.name, message: err.message };
  return { kind: 'Error', message: String(err) };
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.stack ?? `${cause.name}: ${cause.message}`;
  }
  return typeof cause === 'string' ? cause : JSON.stringify(cause) ?? String(cause);
}

function describeLocation(location: ValidationLocation): string {
  if (location.operationIndex === undefined) return 'routine';
  const field = location.field !== undefined ? `.${location.field}` : '';
  return `operations[${String(location.operationIndex)}]${field}`;
}
