import type { ParameterType, ParameterValue } from '../schema/parameter.js';
import { CoercionError } from '../core/errors.js';

export type TypedValue = string | number | boolean;

const INTEGER_PATTERN = /^[+-]?\d+$/;
const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Convert a caller-supplied value to its declared type, for a structured
 * (type-preserving) destination.
 */
export function coerce(
  name: string,
  raw: ParameterValue,
  type: ParameterType,
): TypedValue {
  switch (type) {
    case 'string':
    case 'date':
      return String(raw);

    case 'integer': {
      if (typeof raw === 'number') {
        if (Number.isSafeInteger(raw)) return raw;
        throw new CoercionError(name, type, raw);
      }
      const text = typeof raw === 'string' ? raw.trim() : '';
      if (!INTEGER_PATTERN.test(text)) throw new CoercionError(name, type, raw);
      const value = Number.parseInt(text, 10);
      if (!Number.isSafeInteger(value)) throw new CoercionError(name, type, raw);
      return value;
    }

    case 'number': {
      if (typeof raw === 'number') {
        if (Number.isFinite(raw)) return raw;
        throw new CoercionError(name, type, raw);
      }
      const text = typeof raw === 'string' ? raw.trim() : '';
      if (!DECIMAL_PATTERN.test(text)) throw new CoercionError(name, type, raw);
      const value = Number(text);
      if (!Number.isFinite(value)) throw new CoercionError(name, type, raw);
      return value;
    }

    case 'boolean': {
      if (typeof raw === 'boolean') return raw;
      const text = typeof raw === 'string' ? raw.trim().toLowerCase() : '';
      if (text === 'true') return true;
      if (text === 'false') return false;
      throw new CoercionError(name, type, raw);
    }
  }
}

/**
 * String-context coercion: the raw value's text form, whatever the declared
 * type. Substring destinations have no typed slot to validate against.
 */
export function coerceToString(raw: ParameterValue): string {
  return String(raw);
}
