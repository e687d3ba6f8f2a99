import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';

import type { APIRequestContext, APIResponse } from 'playwright';

import type { JsonValue } from '../schema/parameter.js';
import type { HttpClient, HttpRequest, HttpResponse } from './collaborators.js';
import { HttpStatusError } from './collaborators.js';

// ── Public types ─────────────────────────────────────────────

export interface HttpClientConfig {
  downloadDir: string;
  timeoutMs?: number | undefined;
}

// ── Factory ──────────────────────────────────────────────────

/**
 * HTTP client backed by a Playwright request context. Requests made through
 * `BrowserContext.request` share the browser's cookies.
 */
export function createHttpClient(
  request: APIRequestContext,
  config: HttpClientConfig,
): HttpClient {
  async function perform(req: HttpRequest): Promise<APIResponse> {
    const response = await request.fetch(req.url, {
      method: req.method,
      headers: requestHeaders(req),
      ...(req.body !== undefined ? { data: encodeBody(req.body) } : {}),
      ...(config.timeoutMs !== undefined ? { timeout: config.timeoutMs } : {}),
      failOnStatusCode: false,
    });

    if (response.status() >= 400) {
      throw new HttpStatusError(response.status(), response.statusText(), req.url);
    }
    return response;
  }

  return {
    async send(req: HttpRequest): Promise<HttpResponse> {
      const response = await perform(req);
      return {
        status: response.status(),
        headers: response.headers(),
        body: await response.text(),
      };
    },

    async download(req: HttpRequest, filename: string): Promise<string> {
      const response = await perform(req);
      await mkdir(config.downloadDir, { recursive: true });

      // Only the base name is honoured; a routine cannot write outside downloadDir.
      const target = path.join(config.downloadDir, path.basename(filename));
      await writeFile(target, await response.body());
      return target;
    },
  };
}

// ── Encoding ─────────────────────────────────────────────────

export function stringifyHeaders(headers: Record<string, JsonValue>): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    if (value === null) continue;
    out[name] = typeof value === 'string' ? value : JSON.stringify(value);
  }
  return out;
}

/** Structured bodies are sent as JSON unless the routine set its own content type. */
export function requestHeaders(req: HttpRequest): Record<string, string> {
  const headers = stringifyHeaders(req.headers);
  const hasContentType = Object.keys(headers).some((h) => h.toLowerCase() === 'content-type');
  if (req.body !== undefined && typeof req.body !== 'string' && !hasContentType) {
    headers['content-type'] = 'application/json';
  }
  return headers;
}

export function encodeBody(body: JsonValue): string {
  return typeof body === 'string' ? body : JSON.stringify(body);
}
