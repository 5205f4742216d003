import type { AcquisitionBackend, ErrorCode } from '@autofields/shared';
import { getErrorMessage } from '@autofields/shared';

export interface BackendAttempt {
  backend: AcquisitionBackend;
  success: boolean;
  errorCode: ErrorCode | null;
  errorDetail: string | null;
  durationMs: number;
}

/**
 * Every enabled backend failed to load the page
 */
export class AcquisitionError extends Error {
  readonly code: ErrorCode = 'ACQUISITION_FAILED';

  constructor(
    readonly url: string,
    readonly attempts: readonly BackendAttempt[]
  ) {
    const summary = attempts
      .map(attempt => `${attempt.backend}: ${attempt.errorCode ?? 'UNKNOWN'}${attempt.errorDetail ? ` (${attempt.errorDetail})` : ''}`)
      .join('; ');
    super(`${getErrorMessage('ACQUISITION_FAILED')} ${url} [${summary}]`);
    this.name = 'AcquisitionError';
  }
}
