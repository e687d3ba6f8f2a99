import { z } from 'zod';

import { LIMITS, SCRIPT_DENYLIST } from '../config/defaults.js';
import type { DenylistEntry } from '../schema/config.js';

// ── Denylist ─────────────────────────────────────────────────

export interface CompiledDenylistEntry {
  regex: RegExp;
  description: string;
}

export type ScriptDenylist = readonly CompiledDenylistEntry[];

/** Compile denylist patterns. Throws on an invalid regular expression. */
export function compileDenylist(
  entries: readonly DenylistEntry[] = SCRIPT_DENYLIST,
  extra: readonly DenylistEntry[] = [],
): ScriptDenylist {
  return [...entries, ...extra].map((entry) => ({
    regex: new RegExp(entry.pattern),
    description: entry.description,
  }));
}

export const DEFAULT_DENYLIST: ScriptDenylist = compileDenylist();

// ── Structure ────────────────────────────────────────────────
// A single self-invoking function, optionally async, optionally with a
// trailing semicolon. Nothing may precede or follow it.

export const IIFE_PATTERN =
  /^\(\s*(?:async\s+)?(?:function\s*[\w$]*\s*\([^)]*\)\s*\{[\s\S]*\}|\([^)]*\)\s*=>\s*\{[\s\S]*\}|[\w$]+\s*=>\s*\{[\s\S]*\})\s*\)\s*\(\s*\)\s*;?$/;

const INVOCATION_PATTERN = /^\s*\(\s*\)\s*;?$/;

const CLOSERS = new Map([
  ['(', ')'],
  ['[', ']'],
  ['{', '}'],
]);

// A `/` after one of these starts a regular expression literal, not a division.
const REGEX_PRECEDERS = '(,=:[!&|?{};+-*%<>~^';
const REGEX_KEYWORDS = new Set([
  'return', 'typeof', 'instanceof', 'in', 'of', 'new', 'delete', 'void',
  'throw', 'case', 'do', 'else', 'yield', 'await',
]);

/**
 * True when the script is one wrapped function and one call: the
 * parenthesis opening the script closes right before the final `()`, and
 * nothing sits beside the function inside it.
 */
export function isSingleIife(code: string): boolean {
  if (!IIFE_PATTERN.test(code)) return false;
  const close = wrapperEnd(code);
  return close !== -1 && INVOCATION_PATTERN.test(code.slice(close + 1));
}

/**
 * Index of the bracket closing the script's first one, skipping strings,
 * comments and regular expression literals. -1 when brackets do not pair
 * up or a `,` or `;` appears directly inside the wrapper.
 */
function wrapperEnd(code: string): number {
  const expected: string[] = [];
  let previous = '';

  for (let i = 0; i < code.length; i++) {
    const ch = code.charAt(i);
    const next = code.charAt(i + 1);

    if (ch === '"' || ch === "'" || ch === '`') {
      i = skipQuoted(code, i, ch);
      previous = ch;
      continue;
    }
    if (ch === '/' && next === '/') {
      const end = code.indexOf('\n', i);
      if (end === -1) return -1;
      i = end;
      continue;
    }
    if (ch === '/' && next === '*') {
      const end = code.indexOf('*/', i + 2);
      if (end === -1) return -1;
      i = end + 1;
      continue;
    }
    if (ch === '/' && startsRegex(code, i, previous)) {
      i = skipRegex(code, i);
      previous = '/';
      continue;
    }

    const closer = CLOSERS.get(ch);
    if (closer !== undefined) {
      expected.push(closer);
    } else if (ch === ')' || ch === ']' || ch === '}') {
      if (expected.pop() !== ch) return -1;
      if (expected.length === 0) return i;
    } else if ((ch === ',' || ch === ';') && expected.length === 1) {
      return -1;
    }

    if (!/\s/.test(ch)) previous = ch;
  }
  return -1;
}

function startsRegex(code: string, index: number, previous: string): boolean {
  if (previous === '') return false;
  if (REGEX_PRECEDERS.includes(previous)) return true;
  const word = /[\w$]+\s*$/.exec(code.slice(0, index))?.[0];
  return word !== undefined && REGEX_KEYWORDS.has(word.trim());
}

/** Index of the quote ending the literal opened at `start`. */
function skipQuoted(code: string, start: number, quote: string): number {
  for (let i = start + 1; i < code.length; i++) {
    const ch = code.charAt(i);
    if (ch === '\\') i++;
    else if (ch === quote) return i;
  }
  return code.length;
}

function skipRegex(code: string, start: number): number {
  let inClass = false;
  for (let i = start + 1; i < code.length; i++) {
    const ch = code.charAt(i);
    if (ch === '\\') i++;
    else if (ch === '[') inClass = true;
    else if (ch === ']') inClass = false;
    else if (ch === '/' && !inClass) return i;
    else if (ch === '\n') return code.length;
  }
  return code.length;
}

export interface ScriptCheck {
  errors: string[];
  warnings: string[];
}

export function validateScript(
  source: string,
  denylist: ScriptDenylist = DEFAULT_DENYLIST,
): ScriptCheck {
  const code = source.trim();
  if (code.length === 0) {
    return { errors: ['Script cannot be empty'], warnings: [] };
  }

  const errors: string[] = [];
  const warnings: string[] = [];

  if (!isSingleIife(code)) {
    errors.push(
      'Script must be a single IIFE, e.g. (function() { ... })() or (async () => { ... })()',
    );
  }

  for (const entry of denylist) {
    if (entry.regex.test(code)) {
      errors.push(`Blocked pattern: ${entry.description}`);
    }
  }

  const body = code.slice(code.indexOf('{') + 1, code.lastIndexOf('}'));
  const longLines = body
    .split('\n')
    .filter((line) => line.length > LIMITS.MAX_SCRIPT_LINE_LENGTH).length;
  if (longLines > 0) {
    warnings.push(
      `${String(longLines)} line(s) exceed ${String(LIMITS.MAX_SCRIPT_LINE_LENGTH)} characters`,
    );
  }

  return { errors, warnings };
}

// ── Evaluation wrapper ───────────────────────────────────────

/**
 * Wrap a validated IIFE so the page returns a result envelope: the value,
 * captured console.log lines and any error. With a storage key the key is
 * cleared first, then a defined result is written to `sessionStorage[key]`
 * as JSON.
 */
export function generateEvaluateWrapper(iife: string, storageKey?: string): string {
  const code = iife.trim().replace(/;+\s*$/, '');

  const key = storageKey !== undefined ? JSON.stringify(storageKey) : undefined;

  const clear =
    key !== undefined
      ? [
          '  try {',
          `    window.sessionStorage.removeItem(${key});`,
          '  } catch(e) {',
          "    __storageError = 'SessionStorage Error: ' + String(e);",
          '  }',
        ]
      : [];

  const storage =
    key !== undefined
      ? [
          '    if (__result !== undefined) {',
          '      try {',
          `        window.sessionStorage.setItem(${key}, JSON.stringify(__result));`,
          '      } catch(e) {',
          "        __storageError = 'SessionStorage Error: ' + String(e);",
          '      }',
          '    }',
        ]
      : [];

  return [
    '(async () => {',
    '  const __consoleLogs = [];',
    '  const __originalConsoleLog = console.log;',
    '  let __executionError = null;',
    '  let __storageError = null;',
    '  let __result;',
    '  console.log = (...args) => {',
    '    __consoleLogs.push({',
    '      timestamp: Date.now(),',
    "      message: args.map((a) => typeof a === 'object' ? JSON.stringify(a) : String(a)).join(' '),",
    '    });',
    '    __originalConsoleLog.apply(console, args);',
    '  };',
    ...clear,
    '  try {',
    `    __result = await Promise.resolve(${code});`,
    ...storage,
    '  } catch(e) {',
    '    __executionError = String(e);',
    '  } finally {',
    '    console.log = __originalConsoleLog;',
    '  }',
    '  return {',
    '    result: __result,',
    '    console_logs: __consoleLogs,',
    '    storage_error: __storageError,',
    '    execution_error: __executionError,',
    '  };',
    '})()',
  ].join('\n');
}

// ── Result envelope ──────────────────────────────────────────

export const scriptEnvelopeSchema = z.object({
  result: z.unknown(),
  console_logs: z
    .array(z.object({ timestamp: z.number(), message: z.string() }))
    .default([]),
  storage_error: z.string().nullable().default(null),
  execution_error: z.string().nullable().default(null),
});

export type ScriptEnvelope = z.infer<typeof scriptEnvelopeSchema>;

export function parseScriptEnvelope(data: unknown): ScriptEnvelope {
  return scriptEnvelopeSchema.parse(data);
}
