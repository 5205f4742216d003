// Page acquisition: dynamic render first, plain HTTP on any dynamic failure
import { load, type CheerioAPI } from 'cheerio';
import type { AcquisitionBackend, AcquisitionMode } from '@autofields/shared';
import type { Dispatcher } from 'undici';
import type { FetchResult } from './types';
import { fetchStatic } from './http';
import { fetchDynamic } from './headless';
import { AcquisitionError, type BackendAttempt } from '../errors';
import { loggerSink, type ExtractionEventSink } from '../events';
import { acquireLogger } from '../utils/logger';

export interface AcquireOptions {
  mode?: AcquisitionMode;          // default 'auto'
  dynamicEnabled?: boolean;        // default true; false limits 'auto' to static
  timeoutMs?: number;              // per backend
  renderWaitMs?: number;
  waitForSelector?: string;
  revealSelectors?: readonly string[];
  userAgent?: string;
  executablePath?: string;
  dispatcher?: Dispatcher;         // static backend only
  events?: ExtractionEventSink;
}

export interface AcquiredPage {
  url: string;
  finalUrl: string;
  backend: AcquisitionBackend;
  html: string;
  $: CheerioAPI;
  attempts: readonly BackendAttempt[];
}

/**
 * Backends to try, in order
 */
export function planBackends(mode: AcquisitionMode = 'auto', dynamicEnabled = true): AcquisitionBackend[] {
  if (mode === 'static') return ['static'];
  if (mode === 'dynamic') return ['dynamic'];
  return dynamicEnabled ? ['dynamic', 'static'] : ['static'];
}

function runBackend(backend: AcquisitionBackend, url: string, options: AcquireOptions): Promise<FetchResult> {
  if (backend === 'dynamic') {
    return fetchDynamic({
      url,
      timeout: options.timeoutMs,
      renderWaitMs: options.renderWaitMs,
      waitForSelector: options.waitForSelector,
      revealSelectors: options.revealSelectors,
      userAgent: options.userAgent,
      executablePath: options.executablePath,
    });
  }
  return fetchStatic({
    url,
    timeout: options.timeoutMs,
    userAgent: options.userAgent,
    dispatcher: options.dispatcher,
  });
}

/**
 * Load a listing page and parse it.
 *
 * Backends run one after the other; the first that returns HTML wins.
 * @throws AcquisitionError when every backend failed
 */
export async function acquirePage(url: string, options: AcquireOptions = {}): Promise<AcquiredPage> {
  const events = options.events ?? loggerSink;
  const backends = planBackends(options.mode, options.dynamicEnabled);
  const attempts: BackendAttempt[] = [];

  for (const [index, backend] of backends.entries()) {
    const result = await runBackend(backend, url, options);

    attempts.push({
      backend,
      success: result.success && result.html !== null,
      errorCode: result.errorCode,
      errorDetail: result.errorDetail,
      durationMs: result.timings.total,
    });

    if (result.success && result.html !== null) {
      acquireLogger.info(`Acquired ${url} via ${backend} backend in ${result.timings.total}ms`);
      return {
        url,
        finalUrl: result.finalUrl,
        backend,
        html: result.html,
        $: load(result.html),
        attempts,
      };
    }

    const errorCode = result.errorCode ?? 'UNKNOWN';
    events.emit({
      type: 'backend_failed',
      url,
      backend,
      errorCode,
      ...(result.errorDetail ? { errorDetail: result.errorDetail } : {}),
    });

    const next = backends[index + 1];
    if (next) {
      events.emit({ type: 'backend_fallback', url, from: backend, to: next, reason: errorCode });
    }
  }

  throw new AcquisitionError(url, attempts);
}
