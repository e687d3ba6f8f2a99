import { mkdtemp, readFile, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';
import type { APIRequestContext, APIResponse } from 'playwright';

import { createHttpClient, requestHeaders, stringifyHeaders } from '../../../src/browser/http.js';
import { HttpStatusError } from '../../../src/browser/collaborators.js';

// ── Mock helpers ─────────────────────────────────────────────

function mockResponse(status = 200, statusText = 'OK', text = '{"ok":true}'): APIResponse {
  return {
    status: () => status,
    statusText: () => statusText,
    headers: () => ({ 'content-type': 'application/json' }),
    text: vi.fn(() => Promise.resolve(text)),
    body: vi.fn(() => Promise.resolve(Buffer.from(text))),
  } as unknown as APIResponse;
}

function mockRequest(response: APIResponse = mockResponse()) {
  const fetch = vi.fn((_url: string, _options?: unknown) => Promise.resolve(response));
  return { fetch, context: { fetch } as unknown as APIRequestContext };
}

// ── Tests ────────────────────────────────────────────────────

describe('createHttpClient', () => {
  let downloadDir: string;

  beforeEach(async () => {
    downloadDir = await mkdtemp(path.join(os.tmpdir(), 'routine-http-'));
  });

  afterEach(async () => {
    await rm(downloadDir, { recursive: true, force: true });
  });

  test('sends structured bodies as JSON', async () => {
    const { fetch, context } = mockRequest();
    const client = createHttpClient(context, { downloadDir });

    const response = await client.send({
      method: 'POST',
      url: 'https://api.example.test/items',
      headers: { 'x-count': 5, 'x-skip': null },
      body: { a: 1 },
    });

    expect(fetch).toHaveBeenCalledWith('https://api.example.test/items', {
      method: 'POST',
      headers: { 'x-count': '5', 'content-type': 'application/json' },
      data: '{"a":1}',
      failOnStatusCode: false,
    });
    expect(response).toEqual({
      status: 200,
      headers: { 'content-type': 'application/json' },
      body: '{"ok":true}',
    });
  });

  test('passes the configured timeout', async () => {
    const { fetch, context } = mockRequest();
    const client = createHttpClient(context, { downloadDir, timeoutMs: 500 });

    await client.send({ method: 'GET', url: 'https://api.example.test', headers: {} });

    expect(fetch).toHaveBeenCalledWith('https://api.example.test', {
      method: 'GET',
      headers: {},
      timeout: 500,
      failOnStatusCode: false,
    });
  });

  test('throws HttpStatusError for error statuses', async () => {
    const { context } = mockRequest(mockResponse(503, 'Service Unavailable'));
    const client = createHttpClient(context, { downloadDir });

    await expect(
      client.send({ method: 'GET', url: 'https://api.example.test/down', headers: {} }),
    ).rejects.toThrow(new HttpStatusError(503, 'Service Unavailable', 'https://api.example.test/down'));
  });

  test('saves downloads under the download directory by base name', async () => {
    const { context } = mockRequest(mockResponse(200, 'OK', 'file-bytes'));
    const client = createHttpClient(context, { downloadDir });

    const saved = await client.download(
      { method: 'GET', url: 'https://files.example.test/r', headers: {} },
      '../../outside/report.pdf',
    );

    expect(saved).toBe(path.join(downloadDir, 'report.pdf'));
    expect(await readFile(saved, 'utf-8')).toBe('file-bytes');
  });
});

describe('header encoding', () => {
  test('stringifies non-string values and drops nulls', () => {
    expect(stringifyHeaders({ a: 'x', b: 2, c: true, d: null, e: ['y'] })).toEqual({
      a: 'x',
      b: '2',
      c: 'true',
      e: '["y"]',
    });
  });

  test('keeps a routine-supplied content type', () => {
    expect(
      requestHeaders({
        method: 'POST',
        url: 'https://api.example.test',
        headers: { 'Content-Type': 'application/vnd.custom+json' },
        body: { a: 1 },
      }),
    ).toEqual({ 'Content-Type': 'application/vnd.custom+json' });
  });

  test('does not add a content type for text bodies', () => {
    expect(
      requestHeaders({ method: 'POST', url: 'https://api.example.test', headers: {}, body: 'a=1' }),
    ).toEqual({});
  });
});
