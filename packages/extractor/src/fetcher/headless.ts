// Dynamic backend: Playwright render of the listing page
import { chromium, type Browser, type Page } from 'playwright-core';
import type { ErrorCode } from '@autofields/shared';
import type { FetchResult, FetchOptions } from './types';
import { BROWSER_HEADERS, getRandomUserAgent } from './user-agents';
import { toError } from '../utils/errors';
import { dynamicLogger } from '../utils/logger';

export interface HeadlessFetchOptions extends Omit<FetchOptions, 'dispatcher' | 'followRedirects' | 'acceptEncoding'> {
  renderWaitMs?: number;       // Wait after page load (default 2000)
  waitForSelector?: string;    // Wait for specific element
  revealSelectors?: readonly string[];  // Clicked before snapshot (hidden phone button)
  executablePath?: string;     // Chromium binary; Playwright's own build when unset
}

const DEFAULT_TIMEOUT = 30000;
const SELECTOR_TIMEOUT = 10000;
const REVEAL_CLICK_TIMEOUT = 3000;
const REVEAL_SETTLE_MS = 1000;

const LAUNCH_ARGS = [
  '--no-sandbox',
  '--disable-setuid-sandbox',
  '--disable-dev-shm-usage',
  '--disable-gpu',
  '--disable-blink-features=AutomationControlled',
  '--window-size=1920,1080',
];

/**
 * Classify Playwright errors into ErrorCode types
 */
export function classifyError(error: Error): ErrorCode {
  const msg = error.message.toLowerCase();
  if (msg.includes('timeout')) return 'FETCH_TIMEOUT';
  if (msg.includes('net::err_name_not_resolved')) return 'FETCH_DNS';
  if (msg.includes('net::err_cert')) return 'FETCH_TLS';
  if (msg.includes('net::err_connection')) return 'FETCH_CONNECTION';
  return 'RENDER_FAILED';
}

function failure(url: string, startTime: number, errorCode: ErrorCode, errorDetail: string): FetchResult {
  return {
    success: false,
    url,
    finalUrl: url,
    httpStatus: null,
    contentType: null,
    html: null,
    errorCode,
    errorDetail,
    timings: {
      total: Date.now() - startTime,
    },
    headers: {},
  };
}

/**
 * Click each reveal target that is present; a missing or unclickable target is skipped
 */
async function reveal(page: Page, selectors: readonly string[]): Promise<number> {
  let clicked = 0;
  for (const selector of selectors) {
    const target = page.locator(selector).first();
    try {
      if ((await target.count()) === 0) continue;
      await target.click({ timeout: REVEAL_CLICK_TIMEOUT });
      clicked++;
    } catch (error) {
      dynamicLogger.debug(`Reveal target "${selector}" not clickable: ${toError(error).message}`);
    }
  }
  return clicked;
}

/**
 * Render a URL in headless Chromium and snapshot the resulting markup.
 *
 * A browser is launched for every call and closed on every exit path.
 * Never throws: failures are reported through `errorCode` and `errorDetail`.
 */
export async function fetchDynamic(options: HeadlessFetchOptions): Promise<FetchResult> {
  const startTime = Date.now();
  const timeout = options.timeout ?? DEFAULT_TIMEOUT;
  let browser: Browser | null = null;

  try {
    try {
      browser = await chromium.launch({
        headless: true,
        args: LAUNCH_ARGS,
        timeout,
        ...(options.executablePath ? { executablePath: options.executablePath } : {}),
      });
    } catch (error) {
      const err = toError(error);
      dynamicLogger.warn(`Browser launch failed: ${err.message.split('\n')[0]}`);
      return failure(options.url, startTime, 'BROWSER_UNAVAILABLE', err.message);
    }

    const context = await browser.newContext({
      userAgent: options.userAgent ?? getRandomUserAgent(),
      viewport: { width: 1920, height: 1080 },
      locale: 'pt-BR',
      extraHTTPHeaders: { 'Accept-Language': BROWSER_HEADERS['Accept-Language'] ?? 'pt-BR', ...options.headers },
    });
    const page = await context.newPage();

    // Navigate with timeout
    const response = await page.goto(options.url, {
      timeout,
      waitUntil: 'networkidle',
    });

    const status = response?.status() ?? null;
    if (status !== null && status >= 400) {
      return failure(options.url, startTime, status >= 500 ? 'FETCH_HTTP_5XX' : 'FETCH_HTTP_4XX', `HTTP ${status}`);
    }

    // Wait for specific element
    if (options.waitForSelector) {
      try {
        await page.waitForSelector(options.waitForSelector, {
          timeout: Math.min(SELECTOR_TIMEOUT, timeout),
        });
      } catch (error) {
        dynamicLogger.debug(`"${options.waitForSelector}" did not appear: ${toError(error).message}`);
      }
    }

    // Wait for render
    if (options.renderWaitMs) {
      await page.waitForTimeout(options.renderWaitMs);
    }

    if (options.revealSelectors?.length) {
      const clicked = await reveal(page, options.revealSelectors);
      if (clicked > 0) {
        await page.waitForTimeout(REVEAL_SETTLE_MS);
      }
    }

    const html = await page.content();
    const headers = response?.headers() ?? {};

    dynamicLogger.debug(`Rendered ${options.url} (${html.length} chars, ${Date.now() - startTime}ms)`);

    return {
      success: true,
      url: options.url,
      finalUrl: page.url(),
      httpStatus: status,
      contentType: headers['content-type'] ?? null,
      html,
      errorCode: null,
      errorDetail: null,
      timings: {
        total: Date.now() - startTime,
      },
      headers,
    };
  } catch (error) {
    const err = toError(error);
    return failure(options.url, startTime, classifyError(err), err.message);
  } finally {
    if (browser) {
      await browser.close().catch((error: unknown) => {
        dynamicLogger.error('Error closing browser', toError(error));
      });
    }
  }
}
