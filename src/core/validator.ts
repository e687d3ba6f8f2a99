import type { Routine } from '../schema/routine.js';
import { routineSchema } from '../schema/routine.js';
import type { ParameterTypeMap } from '../schema/parameter.js';
import { buildTypeMap } from '../schema/parameter.js';
import { operationFields, producedKey } from '../schema/operation.js';
import type { JsonValue } from '../schema/parameter.js';
import type { BuiltinRegistry } from '../placeholders/grammar.js';
import {
  DEFAULT_BUILTINS,
  classifyPlaceholder,
  extractPlaceholders,
} from '../placeholders/grammar.js';
import {
  DuplicateParameterError,
  NameConflictError,
  RoutineValidationError,
  UndefinedPlaceholderError,
  UnusedParameterError,
} from './errors.js';
import type { ValidationError } from './errors.js';

// ── Public types ─────────────────────────────────────────────

export interface ValidationReport {
  readonly valid: boolean;
  readonly issues: readonly ValidationError[];
}

// ── Placeholder walk ─────────────────────────────────────────

interface FoundPlaceholder {
  raw: string;
  operationIndex: number;
  field: string;
}

function collectStrings(value: JsonValue, path: string, out: Array<[string, string]>): void {
  if (typeof value === 'string') {
    out.push([path, value]);
  } else if (Array.isArray(value)) {
    value.forEach((item, i) => collectStrings(item, `${path}[${String(i)}]`, out));
  } else if (value !== null && typeof value === 'object') {
    for (const [key, child] of Object.entries(value)) {
      collectStrings(child, `${path}.${key}`, out);
    }
  }
}

function placeholdersIn(routine: Routine, operationIndex: number): FoundPlaceholder[] {
  const op = routine.operations[operationIndex];
  if (op === undefined) return [];

  const found: FoundPlaceholder[] = [];
  for (const field of operationFields(op)) {
    const strings: Array<[string, string]> = [];
    collectStrings(field.value, field.name, strings);
    for (const [path, text] of strings) {
      for (const placeholder of extractPlaceholders(text)) {
        found.push({ raw: placeholder.raw, operationIndex, field: path });
      }
    }
  }
  return found;
}

// ── Validator ────────────────────────────────────────────────

/**
 * Static, value-independent coverage check. Reports every finding:
 * declared parameters nobody references, placeholders that name neither a
 * parameter, an earlier produced value nor a builtin, duplicate parameter
 * names and storeAs keys shadowing parameters.
 */
export function validateRoutine(
  routine: Routine,
  builtins: BuiltinRegistry = DEFAULT_BUILTINS,
): ValidationReport {
  const issues: ValidationError[] = [];

  const declared = new Set<string>();
  const reportedDuplicates = new Set<string>();
  for (const parameter of routine.parameters) {
    if (declared.has(parameter.name) && !reportedDuplicates.has(parameter.name)) {
      issues.push(new DuplicateParameterError(parameter.name));
      reportedDuplicates.add(parameter.name);
    }
    declared.add(parameter.name);
  }

  const laterKeys = new Set<string>();
  routine.operations.forEach((op) => {
    const key = producedKey(op);
    if (key !== undefined) laterKeys.add(key);
  });

  const referenced = new Set<string>();
  const produced = new Set<string>();

  routine.operations.forEach((op, operationIndex) => {
    for (const found of placeholdersIn(routine, operationIndex)) {
      const cls = classifyPlaceholder(found.raw, {
        parameters: declared,
        produced,
        builtins,
      });
      const location = { operationIndex: found.operationIndex, field: found.field };

      if (cls === 'parameter') {
        referenced.add(found.raw);
      } else if (cls === 'unrecognized') {
        issues.push(
          new UndefinedPlaceholderError(
            found.raw,
            location,
            laterKeys.has(found.raw)
              ? 'is referenced before the operation that produces it'
              : undefined,
          ),
        );
      }
    }

    const key = producedKey(op);
    if (key !== undefined) {
      if (declared.has(key)) {
        issues.push(new NameConflictError(key, { operationIndex, field: 'storeAs' }));
      }
      produced.add(key);
    }
  });

  for (const name of declared) {
    if (!referenced.has(name)) issues.push(new UnusedParameterError(name));
  }

  return { valid: issues.length === 0, issues };
}

// ── Acceptance ───────────────────────────────────────────────

/**
 * A routine that parsed and passed validation. Only accepted routines
 * reach the executor; one may be executed any number of times.
 */
export class AcceptedRoutine {
  readonly typeMap: ParameterTypeMap;
  readonly producedKeys: ReadonlySet<string>;

  private constructor(readonly routine: Routine) {
    this.typeMap = buildTypeMap(routine.parameters);
    const keys = new Set<string>();
    for (const op of routine.operations) {
      const key = producedKey(op);
      if (key !== undefined) keys.add(key);
    }
    this.producedKeys = keys;
  }

  get name(): string {
    return this.routine.name;
  }

  /** Parse and validate. Throws ZodError or RoutineValidationError. */
  static accept(
    input: unknown,
    builtins: BuiltinRegistry = DEFAULT_BUILTINS,
  ): AcceptedRoutine {
    const routine = routineSchema.parse(input);
    const report = validateRoutine(routine, builtins);
    if (!report.valid) {
      throw new RoutineValidationError(routine.name, report.issues);
    }
    return new AcceptedRoutine(routine);
  }
}

export function acceptRoutine(
  input: unknown,
  builtins: BuiltinRegistry = DEFAULT_BUILTINS,
): AcceptedRoutine {
  return AcceptedRoutine.accept(input, builtins);
}
