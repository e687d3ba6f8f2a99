import type {
  JsonValue,
  ParameterType,
  ParameterTypeMap,
  ParameterValue,
} from '../schema/parameter.js';
import { MissingValueError } from '../core/errors.js';
import { coerce, coerceToString } from './coercion.js';
import { segmentSource, tokenize, wholePlaceholder } from './grammar.js';

// ── Value scope ──────────────────────────────────────────────

/** Everything the interpolators may read. Parameters win over produced keys. */
export interface ValueScope {
  readonly parameterValues: ReadonlyMap<string, ParameterValue>;
  readonly typeMap: ParameterTypeMap;
  readonly producedValues: ReadonlyMap<string, JsonValue>;
  /** Keys the routine stores at some point; referencing one before it is recorded is an error. */
  readonly producedKeys: ReadonlySet<string>;
}

type Resolution =
  | { source: 'parameter'; name: string; value: ParameterValue; type: ParameterType }
  | { source: 'produced'; name: string; value: JsonValue };

/** Look a placeholder up. `undefined` means it is not ours to resolve. */
function resolve(raw: string, scope: ValueScope): Resolution | undefined {
  const type = scope.typeMap.get(raw);
  if (type !== undefined) {
    const value = scope.parameterValues.get(raw);
    if (value === undefined) throw new MissingValueError(raw);
    return { source: 'parameter', name: raw, value, type };
  }

  if (scope.producedValues.has(raw) || scope.producedKeys.has(raw)) {
    const value = scope.producedValues.get(raw);
    if (value === undefined) {
      throw new MissingValueError(raw, 'was not produced by an earlier operation');
    }
    return { source: 'produced', name: raw, value };
  }

  return undefined;
}

export function producedToString(value: JsonValue): string {
  return typeof value === 'string' ? value : JSON.stringify(value);
}

function renderText(resolution: Resolution): string {
  return resolution.source === 'parameter'
    ? coerceToString(resolution.value)
    : producedToString(resolution.value);
}

function substitute(
  text: string,
  scope: ValueScope,
  render: (resolution: Resolution) => string,
): string {
  const segments = tokenize(text);
  if (!segments.some((s) => s.kind === 'placeholder')) return text;

  return segments
    .map((segment) => {
      if (segment.kind === 'text') return segment.text;
      const resolution = resolve(segment.raw, scope);
      return resolution === undefined ? segmentSource(segment) : render(resolution);
    })
    .join('');
}

// ── String interpolator ──────────────────────────────────────

/**
 * Interpolate a flat text field. Parameter values are rendered as text
 * without type checks; builtin and unrecognized placeholders stay verbatim.
 */
export function interpolateString(text: string, scope: ValueScope): string {
  return substitute(text, scope, renderText);
}

// ── Structured interpolator ──────────────────────────────────

function interpolateLeaf(leaf: string, scope: ValueScope): JsonValue {
  const whole = wholePlaceholder(leaf);
  if (whole !== undefined) {
    const resolution = resolve(whole, scope);
    if (resolution?.source === 'parameter') {
      return coerce(resolution.name, resolution.value, resolution.type);
    }
    if (resolution?.source === 'produced') {
      return resolution.value;
    }
    return leaf;
  }

  return substitute(leaf, scope, renderText);
}

/**
 * Rewrite a JSON-like tree. Map keys are never touched. A leaf that is
 * exactly one placeholder takes the parameter's declared type; any other
 * leaf with placeholders stays a string built from the raw values.
 */
export function interpolateStructured(tree: JsonValue, scope: ValueScope): JsonValue {
  if (typeof tree === 'string') return interpolateLeaf(tree, scope);
  if (Array.isArray(tree)) return tree.map((item) => interpolateStructured(item, scope));
  if (tree !== null && typeof tree === 'object') return interpolateRecord(tree, scope);
  return tree;
}

export function interpolateRecord(
  record: { readonly [key: string]: JsonValue },
  scope: ValueScope,
): Record<string, JsonValue> {
  const out: Record<string, JsonValue> = {};
  for (const [key, value] of Object.entries(record)) {
    out[key] = interpolateStructured(value, scope);
  }
  return out;
}
