import type { ExtractionReport, FieldSpec } from '@autofields/shared';
import { acquirePage, type AcquireOptions } from './fetcher/acquire';
import { extractFields } from './extraction/extract';
import { AcquisitionError } from './errors';
import { loggerSink } from './events';
import { acquireLogger } from './utils/logger';

export interface RunOptions extends AcquireOptions {
  /** Re-fetch statically when the rendered page resolved no required field (default true) */
  fallbackOnEmptyReport?: boolean;
}

function resolvedRequired(report: ExtractionReport): number {
  return report.results.filter(result => result.required && result.status === 'resolved').length;
}

/**
 * Acquire a page and extract every field from it.
 *
 * When the dynamic backend delivered a page on which no required field resolved
 * (consent wall, skeleton markup), the static backend gets one more try; its report
 * is kept only if it resolved more fields.
 *
 * @throws AcquisitionError when the page could not be loaded at all
 */
export async function runExtraction(
  url: string,
  specs: readonly FieldSpec[],
  options: RunOptions = {}
): Promise<ExtractionReport> {
  const events = options.events ?? loggerSink;
  const page = await acquirePage(url, options);
  const report = extractFields(page.$, specs, { events, url, backend: page.backend });

  const hasRequired = specs.some(spec => spec.required);
  const retry =
    options.fallbackOnEmptyReport !== false &&
    page.backend === 'dynamic' &&
    options.mode !== 'dynamic' &&
    hasRequired &&
    resolvedRequired(report) === 0;

  if (!retry) return report;

  events.emit({ type: 'backend_fallback', url, from: 'dynamic', to: 'static', reason: 'no required field resolved' });

  try {
    const staticPage = await acquirePage(url, { ...options, mode: 'static' });
    const staticReport = extractFields(staticPage.$, specs, { events, url, backend: staticPage.backend });
    return staticReport.resolvedCount > report.resolvedCount ? staticReport : report;
  } catch (error) {
    if (!(error instanceof AcquisitionError)) throw error;
    acquireLogger.warn(`Static retry failed, keeping the rendered page's report: ${error.message}`);
    return report;
  }
}
