/**
 * Default configuration values.
 * Timeouts, builtins and the denylist are overridable via config file.
 */

export const TIMEOUTS = {
  NAVIGATION_TIMEOUT: 15_000,
  ACTION_TIMEOUT: 8_000,
  SCRIPT_TIMEOUT: 10_000,
} as const;

export const LIMITS = {
  MAX_SCRIPT_TIMEOUT_MS: 60_000,
  MAX_SCRIPT_LINE_LENGTH: 200,
  MAX_TRACE_DETAIL_CHARS: 2_000,
} as const;

// ── Builtin placeholders ────────────────────────────────────
// Resolved inside the page (or by a later stage), never by the engine.

export const BUILTINS = {
  NAMESPACES: [
    'sessionStorage',
    'localStorage',
    'cookie',
    'meta',
    'windowProperty',
  ],
  NAMES: ['uuid', 'epoch_milliseconds'],
} as const;

// ── Script safety ───────────────────────────────────────────

export const SCRIPT_DENYLIST = [
  { pattern: '\\beval\\s*\\(', description: 'eval()' },
  { pattern: '\\bFunction\\s*\\(', description: 'Function constructor' },
  { pattern: '(?<![\\w$])fetch\\s*\\(', description: 'fetch()' },
  { pattern: '\\bXMLHttpRequest\\b', description: 'XMLHttpRequest' },
  { pattern: '\\bWebSocket\\b', description: 'WebSocket' },
  { pattern: '\\bEventSource\\b', description: 'EventSource' },
  { pattern: '\\bsendBeacon\\b', description: 'navigator.sendBeacon' },
  { pattern: '\\baddEventListener\\b', description: 'addEventListener' },
  { pattern: '\\bMutationObserver\\b', description: 'MutationObserver' },
  { pattern: '\\bIntersectionObserver\\b', description: 'IntersectionObserver' },
  { pattern: '\\bwindow\\.close\\s*\\(', description: 'window.close()' },
  { pattern: '\\bimportScripts\\s*\\(', description: 'importScripts()' },
] as const;
