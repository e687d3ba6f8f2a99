/**
 * Browser execution module.
 * Collaborator contracts consumed by the executor, plus the default
 * Playwright-backed browser control surface and HTTP client.
 */

export { launchSession, createBrowserControl } from './runner.js';
export type { RunnerConfig, RoutineSession } from './runner.js';
export { createHttpClient, stringifyHeaders, requestHeaders, encodeBody } from './http.js';
export type { HttpClientConfig } from './http.js';
export { HttpStatusError } from './collaborators.js';
export type {
  BrowserControl,
  HttpClient,
  HttpRequest,
  HttpResponse,
} from './collaborators.js';
