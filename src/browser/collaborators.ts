import type { HttpMethod } from '../schema/operation.js';
import type { JsonValue } from '../schema/parameter.js';

// ── Browser control surface ──────────────────────────────────

export interface BrowserControl {
  navigate(url: string): Promise<void>;
  click(selector: string): Promise<void>;
  type(selector: string, text: string): Promise<void>;
  scroll(selector: string): Promise<void>;
  extractHtml(selector: string): Promise<string>;
  /** Run script source in the page; resolves with whatever the script evaluates to. */
  evaluateScript(source: string, timeoutMs: number): Promise<unknown>;
  readSessionStorage(key: string): Promise<string | null>;
}

// ── HTTP client ──────────────────────────────────────────────

export interface HttpRequest {
  method: HttpMethod;
  url: string;
  headers: Record<string, JsonValue>;
  body?: JsonValue | undefined;
}

export interface HttpResponse {
  status: number;
  headers: Record<string, string>;
  body: string;
}

export interface HttpClient {
  send(request: HttpRequest): Promise<HttpResponse>;
  /** Fetch and save the response body; resolves with the saved path. */
  download(request: HttpRequest, filename: string): Promise<string>;
}

export class HttpStatusError extends Error {
  readonly status: number;
  readonly url: string;

  constructor(status: number, statusText: string, url: string) {
    super(`HTTP ${String(status)} ${statusText} for ${url}`);
    this.name = 'HttpStatusError';
    this.status = status;
    this.url = url;
  }
}
