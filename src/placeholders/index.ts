/**
 * Placeholder module.
 * Pure functions: `{{name}}` grammar, type coercion, string and
 * structured interpolation. No IO.
 */

export {
  tokenize,
  extractPlaceholders,
  wholePlaceholder,
  segmentSource,
  classifyPlaceholder,
  createBuiltinRegistry,
  isBuiltin,
  DEFAULT_BUILTINS,
} from './grammar.js';
export type {
  Segment,
  TextSegment,
  PlaceholderSegment,
  PlaceholderClass,
  BuiltinRegistry,
  ClassificationScope,
  NameLookup,
} from './grammar.js';
export { coerce, coerceToString } from './coercion.js';
export type { TypedValue } from './coercion.js';
export {
  interpolateString,
  interpolateStructured,
  interpolateRecord,
  producedToString,
} from './interpolate.js';
export type { ValueScope } from './interpolate.js';
