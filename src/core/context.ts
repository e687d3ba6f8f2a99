import type {
  JsonValue,
  ParameterTypeMap,
  ParameterValue,
  ParameterValues,
} from '../schema/parameter.js';
import type { TraceEntry } from '../schema/results.js';
import type { ValueScope } from '../placeholders/interpolate.js';
import type { AcceptedRoutine } from './validator.js';
import { MissingValueError } from './errors.js';

/**
 * Per-run mutable state. Parameter values are fixed at creation; produced
 * values and the trace only grow. Never shared between runs.
 */
export class ExecutionContext implements ValueScope {
  readonly parameterValues: ReadonlyMap<string, ParameterValue>;
  readonly typeMap: ParameterTypeMap;
  readonly producedKeys: ReadonlySet<string>;
  /** Supplied names that the routine does not declare. */
  readonly ignoredNames: readonly string[];

  private readonly produced = new Map<string, JsonValue>();
  private readonly entries: TraceEntry[] = [];

  constructor(accepted: AcceptedRoutine, supplied: ParameterValues) {
    const values = new Map<string, ParameterValue>();

    for (const parameter of accepted.routine.parameters) {
      // Own keys only: names like `toString` must not resolve through the prototype.
      const own = Object.hasOwn(supplied, parameter.name) ? supplied[parameter.name] : undefined;
      const value = own ?? parameter.default;
      if (value !== undefined) {
        values.set(parameter.name, value);
      } else if (parameter.required) {
        throw new MissingValueError(parameter.name, 'is a required parameter but no value was supplied');
      }
    }

    this.parameterValues = values;
    this.typeMap = accepted.typeMap;
    this.producedKeys = accepted.producedKeys;
    this.ignoredNames = Object.keys(supplied).filter((name) => !accepted.typeMap.has(name));
  }

  get producedValues(): ReadonlyMap<string, JsonValue> {
    return this.produced;
  }

  get trace(): readonly TraceEntry[] {
    return this.entries;
  }

  recordProduced(key: string, value: JsonValue): void {
    this.produced.set(key, value);
  }

  appendTrace(entry: TraceEntry): void {
    this.entries.push(entry);
  }

  /** Produced values as a plain object, for reports. */
  producedSnapshot(): Record<string, JsonValue> {
    return Object.fromEntries(this.produced);
  }
}

export function createExecutionContext(
  accepted: AcceptedRoutine,
  supplied: ParameterValues = {},
): ExecutionContext {
  return new ExecutionContext(accepted, supplied);
}
