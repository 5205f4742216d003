import { getErrorInfo, type AbsenceReason, type AcquisitionBackend, type ErrorCode, type StrategyKind } from '@autofields/shared';
import { acquireLogger, extractLogger, type ExtractorLogger } from './utils/logger';

export type ExtractionEvent =
  | { type: 'field_resolved'; field: string; strategyIndex: number; strategyKind: StrategyKind }
  | { type: 'field_absent'; field: string; required: boolean; reason: AbsenceReason }
  | { type: 'field_error'; field: string; error: Error }
  | { type: 'backend_failed'; url: string; backend: AcquisitionBackend; errorCode: ErrorCode; errorDetail?: string }
  | { type: 'backend_fallback'; url: string; from: AcquisitionBackend; to: AcquisitionBackend; reason: string };

export interface ExtractionEventSink {
  emit(event: ExtractionEvent): void;
}

/**
 * Sink that writes every event through the extractor loggers
 */
export function createLoggerSink(
  extract: ExtractorLogger = extractLogger,
  acquire: ExtractorLogger = acquireLogger
): ExtractionEventSink {
  return {
    emit(event) {
      switch (event.type) {
        case 'field_resolved':
          extract.debug(`${event.field}: resolved by strategy #${event.strategyIndex} (${event.strategyKind})`);
          break;
        case 'field_absent':
          if (event.required) {
            extract.warn(`${event.field}: required field missing (${event.reason})`);
          } else {
            extract.debug(`${event.field}: not available (${event.reason})`);
          }
          break;
        case 'field_error':
          extract.error(`${event.field}: extraction failed`, event.error);
          break;
        case 'backend_failed': {
          const message = `${event.backend} backend failed for ${event.url}: ${event.errorCode}${event.errorDetail ? ` (${event.errorDetail})` : ''}`;
          // Errors that another backend will not fix (DNS, TLS, not HTML) are logged as errors
          const severity = getErrorInfo(event.errorCode)?.severity;
          if (severity === 'error' || severity === 'critical') {
            acquire.error(message);
          } else {
            acquire.warn(message);
          }
          break;
        }
        case 'backend_fallback':
          acquire.info(`Falling back ${event.from} → ${event.to} for ${event.url}: ${event.reason}`);
          break;
      }
    },
  };
}

export const loggerSink: ExtractionEventSink = createLoggerSink();
