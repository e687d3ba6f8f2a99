import { BUILTINS } from '../config/defaults.js';
import type { BuiltinsConfig } from '../schema/config.js';

// ── Segments ─────────────────────────────────────────────────

export interface TextSegment {
  kind: 'text';
  text: string;
  start: number;
  end: number;
}

export interface PlaceholderSegment {
  kind: 'placeholder';
  /** Text between the braces, untrimmed. */
  raw: string;
  /** The full `{{raw}}` source. */
  source: string;
  start: number;
  end: number;
}

export type Segment = TextSegment | PlaceholderSegment;

// Anything that is not a brace, between double braces. Unbalanced or
// nested braces never match and stay literal text.
const PLACEHOLDER_PATTERN = /\{\{([^{}]+)\}\}/g;

/**
 * Split a string into literal and placeholder segments.
 * Joining every segment's source text yields the input exactly.
 */
export function tokenize(text: string): Segment[] {
  const segments: Segment[] = [];
  let cursor = 0;

  for (const match of text.matchAll(PLACEHOLDER_PATTERN)) {
    const start = match.index ?? cursor;
    const raw = match[1];
    if (raw === undefined) continue;

    if (start > cursor) {
      segments.push({ kind: 'text', text: text.slice(cursor, start), start: cursor, end: start });
    }
    const end = start + match[0].length;
    segments.push({ kind: 'placeholder', raw, source: match[0], start, end });
    cursor = end;
  }

  if (cursor < text.length) {
    segments.push({ kind: 'text', text: text.slice(cursor), start: cursor, end: text.length });
  }

  return segments;
}

export function extractPlaceholders(text: string): PlaceholderSegment[] {
  return tokenize(text).filter((s): s is PlaceholderSegment => s.kind === 'placeholder');
}

/** If `text` is exactly one placeholder with nothing around it, return its raw name. */
export function wholePlaceholder(text: string): string | undefined {
  const segments = tokenize(text);
  const only = segments[0];
  if (segments.length !== 1 || only === undefined || only.kind !== 'placeholder') {
    return undefined;
  }
  return only.raw;
}

export function segmentSource(segment: Segment): string {
  return segment.kind === 'text' ? segment.text : segment.source;
}

// ── Builtin registry ─────────────────────────────────────────

export interface BuiltinRegistry {
  readonly namespaces: ReadonlySet<string>;
  readonly names: ReadonlySet<string>;
}

export function createBuiltinRegistry(config?: BuiltinsConfig): BuiltinRegistry {
  return {
    namespaces: new Set<string>(config?.namespaces ?? BUILTINS.NAMESPACES),
    names: new Set<string>(config?.names ?? BUILTINS.NAMES),
  };
}

export const DEFAULT_BUILTINS: BuiltinRegistry = createBuiltinRegistry();

export function isBuiltin(raw: string, registry: BuiltinRegistry): boolean {
  if (registry.names.has(raw)) return true;

  const colon = raw.indexOf(':');
  if (colon <= 0 || colon === raw.length - 1) return false;
  return registry.namespaces.has(raw.slice(0, colon));
}

// ── Classification ───────────────────────────────────────────

export type PlaceholderClass = 'parameter' | 'produced' | 'builtin' | 'unrecognized';

export interface NameLookup {
  has(name: string): boolean;
}

export interface ClassificationScope {
  parameters: NameLookup;
  produced: NameLookup;
  builtins: BuiltinRegistry;
}

/**
 * Classify a placeholder's raw text. Total and exclusive, checked in
 * order: declared parameter, produced key, builtin, unrecognized.
 */
export function classifyPlaceholder(raw: string, scope: ClassificationScope): PlaceholderClass {
  if (scope.parameters.has(raw)) return 'parameter';
  if (scope.produced.has(raw)) return 'produced';
  if (isBuiltin(raw, scope.builtins)) return 'builtin';
  return 'unrecognized';
}
