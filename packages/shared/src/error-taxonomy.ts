/**
 * Error Taxonomy - Human-readable error messages and recommendations
 *
 * Maps internal error codes to user-friendly messages with actionable suggestions.
 */

import type { ErrorCode } from './domain';

export interface ErrorInfo {
  title: string;
  description: string;
  recommendation: string;
  severity: 'info' | 'warning' | 'error' | 'critical';
  retryable: boolean;
}

/**
 * Error taxonomy mapping
 */
export const ERROR_TAXONOMY: Record<ErrorCode, ErrorInfo> = {
  // Acquisition errors
  FETCH_TIMEOUT: {
    title: 'Request Timeout',
    description: 'The listing page took too long to respond.',
    recommendation: 'Increase ACQUIRE_TIMEOUT_MS or try again later.',
    severity: 'warning',
    retryable: true,
  },
  FETCH_DNS: {
    title: 'DNS Error',
    description: 'Could not resolve the listing domain.',
    recommendation: 'Check that the URL is correct.',
    severity: 'error',
    retryable: true,
  },
  FETCH_CONNECTION: {
    title: 'Connection Failed',
    description: 'Could not connect to the listing site.',
    recommendation: 'The site may be down or blocking connections.',
    severity: 'warning',
    retryable: true,
  },
  FETCH_TLS: {
    title: 'SSL/TLS Error',
    description: 'Secure connection could not be established.',
    recommendation: 'The site may have an invalid SSL certificate.',
    severity: 'error',
    retryable: false,
  },
  FETCH_HTTP_4XX: {
    title: 'Client Error',
    description: 'The site returned an error (4xx status).',
    recommendation: 'The ad may have been removed. Check the URL.',
    severity: 'warning',
    retryable: false,
  },
  FETCH_HTTP_5XX: {
    title: 'Server Error',
    description: 'The site is experiencing issues (5xx status).',
    recommendation: 'Try again later.',
    severity: 'warning',
    retryable: true,
  },
  FETCH_NOT_HTML: {
    title: 'Not an HTML Page',
    description: 'The response was not an HTML document.',
    recommendation: 'Check that the URL points to a listing page.',
    severity: 'error',
    retryable: false,
  },
  BROWSER_UNAVAILABLE: {
    title: 'Browser Unavailable',
    description: 'The headless browser could not be launched.',
    recommendation: 'Install a Chromium build for Playwright or run with --mode static.',
    severity: 'warning',
    retryable: false,
  },
  RENDER_FAILED: {
    title: 'Render Failed',
    description: 'The headless browser failed while rendering the page.',
    recommendation: 'The static backend is used as fallback.',
    severity: 'warning',
    retryable: true,
  },
  ACQUISITION_FAILED: {
    title: 'Page Unavailable',
    description: 'Neither the browser nor the plain HTTP fetch could load the page.',
    recommendation: 'Check connectivity and the URL, then retry.',
    severity: 'critical',
    retryable: true,
  },

  // Field errors
  FIELD_ABSENT: {
    title: 'Field Not Found',
    description: 'No locating strategy matched this field.',
    recommendation: 'The listing layout may have changed. Update the strategy catalog.',
    severity: 'warning',
    retryable: false,
  },
  NORMALIZATION_EMPTY: {
    title: 'Empty Value',
    description: 'The field was located but nothing remained after cleanup.',
    recommendation: 'Check the cut patterns configured for this field.',
    severity: 'warning',
    retryable: false,
  },
  EXTRACT_FIELD_ERROR: {
    title: 'Extraction Error',
    description: 'An unexpected error occurred while extracting this field.',
    recommendation: 'Other fields are unaffected. Check the logs for details.',
    severity: 'error',
    retryable: false,
  },

  // Input errors
  INVALID_URL: {
    title: 'Invalid URL',
    description: 'The URL is not a listing on the supported site.',
    recommendation: 'Use a URL such as https://www.olx.com.br/...',
    severity: 'error',
    retryable: false,
  },
  CONFIG_INVALID: {
    title: 'Invalid Configuration',
    description: 'One or more environment variables are invalid.',
    recommendation: 'Fix the listed variables and run again.',
    severity: 'error',
    retryable: false,
  },

  // Unknown
  UNKNOWN: {
    title: 'Unknown Error',
    description: 'An unexpected error occurred.',
    recommendation: 'Check the logs for details.',
    severity: 'warning',
    retryable: true,
  },
};

function isErrorCode(value: string): value is ErrorCode {
  return Object.prototype.hasOwnProperty.call(ERROR_TAXONOMY, value);
}

/**
 * Get error info for an error code
 */
export function getErrorInfo(errorCode: string | null): ErrorInfo | null {
  if (!errorCode) return null;
  if (isErrorCode(errorCode)) return ERROR_TAXONOMY[errorCode];
  return {
    title: 'Unknown Error',
    description: `Error: ${errorCode}`,
    recommendation: 'Check the logs for details.',
    severity: 'warning',
    retryable: true,
  };
}

/**
 * Get user-friendly error message
 */
export function getErrorMessage(errorCode: string | null): string {
  const info = getErrorInfo(errorCode);
  if (!info) return '';
  return `${info.title}: ${info.description}`;
}
