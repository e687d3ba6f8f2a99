import { createContext, runInContext } from 'node:vm';

import { vi } from 'vitest';

import type { BrowserControl, HttpClient, HttpRequest } from '../../src/browser/collaborators.js';
import type { ParameterType, ParameterValue } from '../../src/schema/parameter.js';
import type { JsonValue } from '../../src/schema/parameter.js';
import type { ValueScope } from '../../src/placeholders/interpolate.js';

// ── Value scopes ─────────────────────────────────────────────

export function makeScope(
  parameters: Record<string, [ParameterType, ParameterValue]>,
  produced: Record<string, JsonValue> = {},
  producedKeys: string[] = Object.keys(produced),
): ValueScope {
  const entries = Object.entries(parameters);
  return {
    parameterValues: new Map(entries.map(([name, [, value]]) => [name, value])),
    typeMap: new Map(entries.map(([name, [type]]) => [name, type])),
    producedValues: new Map(Object.entries(produced)),
    producedKeys: new Set(producedKeys),
  };
}

// ── Collaborator fakes ───────────────────────────────────────

export function okEnvelope(result: JsonValue | undefined = undefined): Record<string, unknown> {
  return { result, console_logs: [], storage_error: null, execution_error: null };
}

export function mockBrowser(overrides: Partial<BrowserControl> = {}): BrowserControl {
  return {
    navigate: vi.fn((_url: string) => Promise.resolve()),
    click: vi.fn((_selector: string) => Promise.resolve()),
    type: vi.fn((_selector: string, _text: string) => Promise.resolve()),
    scroll: vi.fn((_selector: string) => Promise.resolve()),
    extractHtml: vi.fn((_selector: string) => Promise.resolve('<p>hello</p>')),
    evaluateScript: vi.fn((_source: string, _timeoutMs: number) =>
      Promise.resolve<unknown>(okEnvelope()),
    ),
    readSessionStorage: vi.fn((_key: string) => Promise.resolve<string | null>(null)),
    ...overrides,
  };
}

export function mockHttp(overrides: Partial<HttpClient> = {}): HttpClient {
  return {
    send: vi.fn((_req: HttpRequest) =>
      Promise.resolve({
        status: 200,
        headers: { 'content-type': 'application/json' },
        body: '{"ok":true}',
      }),
    ),
    download: vi.fn((_req: HttpRequest, filename: string) => Promise.resolve(`downloads/${filename}`)),
    ...overrides,
  };
}

// ── In-process page ──────────────────────────────────────────

export interface FakePage {
  browser: BrowserControl;
  /** The tab's sessionStorage, kept across runs like a real tab. */
  storage: Map<string, string>;
}

/**
 * A browser whose evaluateScript really runs the wrapped source in a
 * vm context. `globals` become page globals the scripts can read.
 */
export function fakePage(globals: Record<string, unknown> = {}): FakePage {
  const storage = new Map<string, string>();
  const sessionStorage = {
    getItem: (key: string) => storage.get(key) ?? null,
    setItem: (key: string, value: string) => {
      storage.set(key, value);
    },
    removeItem: (key: string) => {
      storage.delete(key);
    },
  };
  const page = createContext({
    ...globals,
    window: { sessionStorage },
    console: { log: () => undefined },
  });

  const browser = mockBrowser({
    evaluateScript: vi.fn((source: string) => {
      const envelope: unknown = runInContext(source, page);
      return Promise.resolve(envelope);
    }),
    readSessionStorage: vi.fn((key: string) => Promise.resolve(storage.get(key) ?? null)),
  });
  return { browser, storage };
}
