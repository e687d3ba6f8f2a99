import { describe, expect, test, vi } from 'vitest';

import { RoutineExecutor, decodeResponseBody } from '../../../src/core/executor.js';
import { AcceptedRoutine } from '../../../src/core/validator.js';
import { HttpStatusError } from '../../../src/browser/collaborators.js';
import type { BrowserControl, HttpClient } from '../../../src/browser/collaborators.js';
import { countSucceeded } from '../../../src/schema/results.js';
import { fakePage, mockBrowser, mockHttp, okEnvelope } from '../helpers.js';

// ── Helpers ──────────────────────────────────────────────────

function executor(browser: BrowserControl, http: HttpClient = mockHttp()): RoutineExecutor {
  return new RoutineExecutor({ browser, http, quiet: true });
}

const SEARCH = AcceptedRoutine.accept({
  name: 'order',
  parameters: [
    { name: 'query', type: 'string' },
    { name: 'qty', type: 'integer' },
  ],
  operations: [
    { type: 'navigate', url: 'https://shop.example.test/search?q={{query}}' },
    { type: 'type', selector: '#qty', text: '{{qty}}' },
    {
      type: 'fetch',
      endpoint: {
        url: 'https://api.example.test/orders',
        method: 'POST',
        body: { qty: '{{qty}}', sku: 'sku-{{query}}' },
      },
      storeAs: 'order',
    },
  ],
});

// ── Tests ────────────────────────────────────────────────────

describe('RoutineExecutor', () => {
  describe('successful runs', () => {
    test('executes every operation in order with interpolated fields', async () => {
      const browser = mockBrowser();
      const http = mockHttp();

      const report = await executor(browser, http).run(SEARCH, { query: 'boots', qty: '2' });

      expect(report.status).toBe('Completed');
      expect(report.operations).toEqual(['Succeeded', 'Succeeded', 'Succeeded']);
      expect(report.trace.map((e) => [e.index, e.status])).toEqual([
        [0, 'Succeeded'],
        [1, 'Succeeded'],
        [2, 'Succeeded'],
      ]);
      expect(browser.navigate).toHaveBeenCalledWith('https://shop.example.test/search?q=boots');
      expect(browser.type).toHaveBeenCalledWith('#qty', '2');
      expect(http.send).toHaveBeenCalledWith({
        method: 'POST',
        url: 'https://api.example.test/orders',
        headers: {},
        body: { qty: 2, sku: 'sku-boots' },
      });
      expect(report.producedValues).toEqual({ order: { ok: true } });
      expect(report.trace[2]?.producedKey).toBe('order');
      expect(report.error).toBeUndefined();
    });

    test('runs the same accepted routine repeatedly with independent state', async () => {
      const run = executor(mockBrowser());
      const first = await run.run(SEARCH, { query: 'boots', qty: 1 });
      const second = await run.run(SEARCH, { query: 'hats', qty: 3 });

      expect(first.runId).not.toBe(second.runId);
      expect(first.trace).toHaveLength(3);
      expect(second.trace).toHaveLength(3);
    });

    test('passes builtin placeholders through to the collaborator', async () => {
      const accepted = AcceptedRoutine.accept({
        name: 'builtin',
        operations: [
          {
            type: 'fetch',
            endpoint: {
              url: 'https://api.example.test/me',
              headers: { authorization: 'Bearer {{sessionStorage:token}}' },
            },
          },
        ],
      });
      const http = mockHttp();

      await executor(mockBrowser(), http).run(accepted);

      expect(http.send).toHaveBeenCalledWith({
        method: 'GET',
        url: 'https://api.example.test/me',
        headers: { authorization: 'Bearer {{sessionStorage:token}}' },
      });
    });

    test('stores extracted html and downloaded paths', async () => {
      const accepted = AcceptedRoutine.accept({
        name: 'collect',
        parameters: [{ name: 'id', type: 'string' }],
        operations: [
          { type: 'extract_html', selector: '#invoice', storeAs: 'invoiceHtml' },
          {
            type: 'download',
            endpoint: { url: 'https://files.example.test/{{id}}' },
            filename: 'invoice-{{id}}.pdf',
            storeAs: 'invoicePath',
          },
        ],
      });
      const http = mockHttp();

      const report = await executor(mockBrowser(), http).run(accepted, { id: '77' });

      expect(http.download).toHaveBeenCalledWith(
        { method: 'GET', url: 'https://files.example.test/77', headers: {} },
        'invoice-77.pdf',
      );
      expect(report.producedValues).toEqual({
        invoiceHtml: '<p>hello</p>',
        invoicePath: 'downloads/invoice-77.pdf',
      });
    });
  });

  test('ignores inherited properties of the supplied values', async () => {
    const accepted = AcceptedRoutine.accept({
      name: 'inherited',
      parameters: [{ name: 'toString', type: 'string', required: false, default: 'abc' }],
      operations: [{ type: 'navigate', url: 'https://x.test/{{toString}}' }],
    });
    const browser = mockBrowser();

    const report = await executor(browser).run(accepted, {});

    expect(report.status).toBe('Completed');
    expect(browser.navigate).toHaveBeenCalledWith('https://x.test/abc');
  });

  describe('evaluate_script', () => {
    const PRODUCER = AcceptedRoutine.accept({
      name: 'token',
      operations: [
        {
          type: 'evaluate_script',
          script: '(() => { return document.cookie.length; })()',
          storeAs: 'token',
        },
        { type: 'navigate', url: 'https://example.test/?t={{token}}' },
      ],
    });

    test('reads the stored result back and makes it available to later operations', async () => {
      const browser = mockBrowser({
        evaluateScript: vi.fn(() => Promise.resolve<unknown>(okEnvelope('abc'))),
        readSessionStorage: vi.fn(() => Promise.resolve<string | null>('"abc"')),
      });

      const report = await executor(browser).run(PRODUCER);

      expect(report.status).toBe('Completed');
      expect(browser.readSessionStorage).toHaveBeenCalledWith('token');
      expect(browser.navigate).toHaveBeenCalledWith('https://example.test/?t=abc');
      expect(report.producedValues).toEqual({ token: 'abc' });
    });

    test('sends the wrapped script with its declared timeout', async () => {
      const browser = mockBrowser({
        readSessionStorage: vi.fn(() => Promise.resolve<string | null>('1')),
      });

      await executor(browser).run(PRODUCER);

      const [source, timeoutMs] = vi.mocked(browser.evaluateScript).mock.calls[0] ?? [];
      expect(timeoutMs).toBe(10_000);
      expect(source).toContain('window.sessionStorage.setItem("token", JSON.stringify(__result));');
    });

    test('keeps structured results as JSON', async () => {
      const browser = mockBrowser({
        readSessionStorage: vi.fn(() => Promise.resolve<string | null>('{"ids":[1,2]}')),
      });

      const report = await executor(browser).run(PRODUCER);

      expect(report.producedValues).toEqual({ token: { ids: [1, 2] } });
    });

    test('fails when the script left no value for a later reference', async () => {
      const browser = mockBrowser();

      const report = await executor(browser).run(PRODUCER);

      expect(report.status).toBe('Failed');
      expect(report.operations).toEqual(['Succeeded', 'Failed']);
      expect(report.trace[0]?.producedKey).toBeUndefined();
      expect(report.error).toEqual({
        kind: 'MissingValueError',
        message: '"token" was not produced by an earlier operation',
      });
      expect(browser.navigate).not.toHaveBeenCalled();
    });

    test('does not pick up a value stored by an earlier run', async () => {
      const pending: string[] = ['from-run-1'];
      const { browser, storage } = fakePage({ pending });
      const accepted = AcceptedRoutine.accept({
        name: 'token',
        operations: [
          {
            type: 'evaluate_script',
            script: '(() => { return pending.shift(); })()',
            storeAs: 'tok',
          },
          { type: 'navigate', url: 'https://x.test/?t={{tok}}' },
        ],
      });
      const runner = executor(browser);

      const first = await runner.run(accepted);
      expect(first.status).toBe('Completed');
      expect(first.producedValues).toEqual({ tok: 'from-run-1' });
      expect(browser.navigate).toHaveBeenCalledWith('https://x.test/?t=from-run-1');

      const second = await runner.run(accepted);
      expect(second.status).toBe('Failed');
      expect(second.producedValues).toEqual({});
      expect(second.error).toEqual({
        kind: 'MissingValueError',
        message: '"tok" was not produced by an earlier operation',
      });
      expect(storage.has('tok')).toBe(false);
      expect(browser.navigate).toHaveBeenCalledTimes(1);
    });

    test('rejects a denylisted script before any browser call', async () => {
      const accepted = AcceptedRoutine.accept({
        name: 'exfil',
        operations: [
          { type: 'evaluate_script', script: '(async () => { await fetch("/steal"); })()' },
          { type: 'click', selector: '#next' },
        ],
      });
      const browser = mockBrowser();

      const report = await executor(browser).run(accepted);

      expect(browser.evaluateScript).not.toHaveBeenCalled();
      expect(report.status).toBe('Failed');
      expect(countSucceeded(report)).toBe(0);
      expect(report.operations).toEqual(['Failed', 'Aborted']);
      expect(report.error).toEqual({
        kind: 'ScriptValidationError',
        message: 'Script rejected: Blocked pattern: fetch()',
      });
    });

    test('keeps the steps completed before a rejected script', async () => {
      const accepted = AcceptedRoutine.accept({
        name: 'late',
        operations: [
          { type: 'navigate', url: 'https://example.test/a' },
          { type: 'navigate', url: 'https://example.test/b' },
          { type: 'evaluate_script', script: 'eval("1")' },
        ],
      });
      const browser = mockBrowser();

      const report = await executor(browser).run(accepted);

      expect(countSucceeded(report)).toBe(2);
      expect(report.trace).toHaveLength(3);
      expect(report.trace[2]?.status).toBe('Failed');
      expect(report.error?.kind).toBe('ScriptValidationError');
      expect(browser.evaluateScript).not.toHaveBeenCalled();
    });

    test('reports a script that throws in the page', async () => {
      const accepted = AcceptedRoutine.accept({
        name: 'throws',
        operations: [{ type: 'evaluate_script', script: '(() => { return foo; })()' }],
      });
      const browser = mockBrowser({
        evaluateScript: vi.fn(() =>
          Promise.resolve<unknown>({
            ...okEnvelope(),
            execution_error: 'ReferenceError: foo is not defined',
          }),
        ),
      });

      const report = await executor(browser).run(accepted);

      expect(report.error).toEqual({
        kind: 'CollaboratorError',
        message: 'evaluate_script failed: Script threw: ReferenceError: foo is not defined',
      });
    });

    test('reports a session storage write failure', async () => {
      const accepted = AcceptedRoutine.accept({
        name: 'quota',
        operations: [
          { type: 'evaluate_script', script: '(() => { return 1; })()', storeAs: 'n' },
        ],
      });
      const browser = mockBrowser({
        evaluateScript: vi.fn(() =>
          Promise.resolve<unknown>({
            ...okEnvelope(1),
            storage_error: 'SessionStorage Error: QuotaExceededError',
          }),
        ),
      });

      const report = await executor(browser).run(accepted);

      expect(report.error?.message).toBe(
        'evaluate_script failed: SessionStorage Error: QuotaExceededError',
      );
      expect(browser.readSessionStorage).not.toHaveBeenCalled();
    });

    test('enforces the script timeout', async () => {
      const accepted = AcceptedRoutine.accept({
        name: 'slow',
        operations: [
          { type: 'evaluate_script', script: '(() => { while (true) {} })()', timeoutMs: 20 },
        ],
      });
      const browser = mockBrowser({
        evaluateScript: vi.fn(() => new Promise<unknown>(() => undefined)),
      });

      const report = await executor(browser).run(accepted);

      expect(report.status).toBe('Failed');
      expect(report.error?.message).toBe(
        'evaluate_script failed: Script evaluation timed out after 20ms',
      );
    });

    test('rejects a malformed result envelope', async () => {
      const accepted = AcceptedRoutine.accept({
        name: 'odd',
        operations: [{ type: 'evaluate_script', script: '(() => { return 1; })()' }],
      });
      const browser = mockBrowser({
        evaluateScript: vi.fn(() => Promise.resolve<unknown>('not an envelope')),
      });

      const report = await executor(browser).run(accepted);

      expect(report.error?.message).toBe(
        'evaluate_script failed: Script returned an unexpected result envelope',
      );
    });
  });

  describe('failures', () => {
    test('stops at the first collaborator failure', async () => {
      const browser = mockBrowser({
        navigate: vi.fn(() => Promise.reject(new Error('net::ERR_NAME_NOT_RESOLVED'))),
      });
      const http = mockHttp();

      const report = await executor(browser, http).run(SEARCH, { query: 'boots', qty: '2' });

      expect(report.status).toBe('Failed');
      expect(report.trace).toHaveLength(1);
      expect(report.operations).toEqual(['Failed', 'Aborted', 'Aborted']);
      expect(browser.type).not.toHaveBeenCalled();
      expect(http.send).not.toHaveBeenCalled();

      const error = report.trace[0]?.error;
      expect(error?.kind).toBe('CollaboratorError');
      expect(error?.message).toBe('navigate failed: net::ERR_NAME_NOT_RESOLVED');
      expect(error?.detail).toMatch(/^Error: net::ERR_NAME_NOT_RESOLVED/);
      expect(report.error?.message).toBe('navigate failed: net::ERR_NAME_NOT_RESOLVED');
    });

    test('wraps HTTP status errors', async () => {
      const http = mockHttp({
        send: vi.fn(() =>
          Promise.reject(new HttpStatusError(404, 'Not Found', 'https://api.example.test/orders')),
        ),
      });

      const report = await executor(mockBrowser(), http).run(SEARCH, { query: 'boots', qty: '2' });

      expect(report.operations).toEqual(['Succeeded', 'Succeeded', 'Failed']);
      expect(report.error?.message).toBe(
        'fetch failed: HTTP 404 Not Found for https://api.example.test/orders',
      );
    });

    test('a coercion failure aborts the operation before its collaborator call', async () => {
      const http = mockHttp();

      const report = await executor(mockBrowser(), http).run(SEARCH, { query: 'boots', qty: '2.5' });

      expect(report.operations).toEqual(['Succeeded', 'Succeeded', 'Failed']);
      expect(report.error?.kind).toBe('CoercionError');
      expect(http.send).not.toHaveBeenCalled();
    });

    test('a missing required parameter fails the run before any operation', async () => {
      const browser = mockBrowser();

      const report = await executor(browser).run(SEARCH, { qty: '2' });

      expect(report.status).toBe('Failed');
      expect(report.trace).toEqual([]);
      expect(report.operations).toEqual(['Aborted', 'Aborted', 'Aborted']);
      expect(report.error?.kind).toBe('MissingValueError');
      expect(browser.navigate).not.toHaveBeenCalled();
    });
  });

  describe('cancellation', () => {
    test('stops between operations once the signal aborts', async () => {
      const controller = new AbortController();
      const browser = mockBrowser({
        navigate: vi.fn(() => {
          controller.abort();
          return Promise.resolve();
        }),
      });

      const report = await executor(browser).run(
        SEARCH,
        { query: 'boots', qty: '2' },
        { signal: controller.signal },
      );

      expect(report.status).toBe('Failed');
      expect(report.operations).toEqual(['Succeeded', 'Aborted', 'Aborted']);
      expect(report.trace).toHaveLength(1);
      expect(report.error?.kind).toBe('RunCancelledError');
      expect(browser.type).not.toHaveBeenCalled();
    });

    test('an already aborted signal runs nothing', async () => {
      const controller = new AbortController();
      controller.abort();
      const browser = mockBrowser();

      const report = await executor(browser).run(
        SEARCH,
        { query: 'boots', qty: '2' },
        { signal: controller.signal },
      );

      expect(report.operations).toEqual(['Aborted', 'Aborted', 'Aborted']);
      expect(report.trace).toEqual([]);
      expect(browser.navigate).not.toHaveBeenCalled();
    });
  });
});

describe('decodeResponseBody', () => {
  test('parses JSON bodies', () => {
    expect(
      decodeResponseBody({
        status: 200,
        headers: { 'Content-Type': 'application/json; charset=utf-8' },
        body: '[1,"a"]',
      }),
    ).toEqual([1, 'a']);
  });

  test('keeps other bodies as text', () => {
    expect(
      decodeResponseBody({ status: 200, headers: { 'content-type': 'text/html' }, body: '<b>x</b>' }),
    ).toBe('<b>x</b>');
    expect(decodeResponseBody({ status: 204, headers: {}, body: '' })).toBe('');
  });

  test('falls back to text when a JSON body does not parse', () => {
    expect(
      decodeResponseBody({
        status: 200,
        headers: { 'content-type': 'application/json' },
        body: '{broken',
      }),
    ).toBe('{broken');
  });
});
