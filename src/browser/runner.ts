import { chromium } from 'playwright';
import type { Page } from 'playwright';

import { TIMEOUTS } from '../config/defaults.js';
import { withTimeout } from '../utils/timeout.js';
import type { BrowserControl, HttpClient } from './collaborators.js';
import { createHttpClient } from './http.js';

// ── Public types ─────────────────────────────────────────────

export interface RunnerConfig {
  headless: boolean;
  downloadDir: string;
  navigationTimeoutMs?: number | undefined;
  actionTimeoutMs?: number | undefined;
}

export interface RoutineSession {
  readonly page: Page;
  readonly browser: BrowserControl;
  readonly http: HttpClient;
  close(): Promise<void>;
}

// ── Session launcher ─────────────────────────────────────────

export async function launchSession(config: RunnerConfig): Promise<RoutineSession> {
  const browser = await chromium.launch({ headless: config.headless });
  const context = await browser.newContext({ acceptDownloads: true });
  const page = await context.newPage();

  return {
    page,
    browser: createBrowserControl(page, config),
    http: createHttpClient(context.request, {
      downloadDir: config.downloadDir,
      timeoutMs: config.navigationTimeoutMs,
    }),

    async close(): Promise<void> {
      await browser.close();
    },
  };
}

// ── Browser control ──────────────────────────────────────────

export function createBrowserControl(
  page: Page,
  config: Pick<RunnerConfig, 'navigationTimeoutMs' | 'actionTimeoutMs'>,
): BrowserControl {
  const navigationTimeout = config.navigationTimeoutMs ?? TIMEOUTS.NAVIGATION_TIMEOUT;
  const actionTimeout = config.actionTimeoutMs ?? TIMEOUTS.ACTION_TIMEOUT;

  return {
    async navigate(url: string): Promise<void> {
      await page.goto(url, {
        timeout: navigationTimeout,
        waitUntil: 'domcontentloaded',
      });
    },

    async click(selector: string): Promise<void> {
      await page.locator(selector).first().click({ timeout: actionTimeout });
    },

    async type(selector: string, text: string): Promise<void> {
      await page.locator(selector).first().fill(text, { timeout: actionTimeout });
    },

    async scroll(selector: string): Promise<void> {
      await page
        .locator(selector)
        .first()
        .scrollIntoViewIfNeeded({ timeout: actionTimeout });
    },

    async extractHtml(selector: string): Promise<string> {
      return page.locator(selector).first().innerHTML({ timeout: actionTimeout });
    },

    async evaluateScript(source: string, timeoutMs: number): Promise<unknown> {
      return withTimeout(page.evaluate<unknown>(source), timeoutMs, 'Script evaluation');
    },

    async readSessionStorage(key: string): Promise<string | null> {
      const value = await page.evaluate<unknown>(
        `window.sessionStorage.getItem(${JSON.stringify(key)})`,
      );
      return typeof value === 'string' ? value : null;
    },
  };
}
