// Static backend: plain HTTP GET using undici
import { request } from 'undici';
import { gunzipSync, inflateSync, brotliDecompressSync } from 'zlib';
import type { ErrorCode } from '@autofields/shared';
import type { FetchResult, FetchOptions } from './types';
import { BROWSER_HEADERS, getRandomUserAgent } from './user-agents';
import { errorCodeOf, toError } from '../utils/errors';
import { staticLogger } from '../utils/logger';

/**
 * Decompress response body based on Content-Encoding header
 */
function decompressBody(buffer: Buffer, encoding: string | null): string {
  const enc = (encoding ?? '').toLowerCase().trim();

  try {
    if (enc === 'gzip' || enc === 'x-gzip') {
      return gunzipSync(buffer).toString('utf-8');
    } else if (enc === 'deflate') {
      return inflateSync(buffer).toString('utf-8');
    } else if (enc === 'br') {
      return brotliDecompressSync(buffer).toString('utf-8');
    }
    return buffer.toString('utf-8');
  } catch (error) {
    staticLogger.debug(`Could not decode ${enc} body, reading it as-is: ${toError(error).message}`);
    return buffer.toString('utf-8');
  }
}

const DEFAULT_TIMEOUT = 15000;
const MAX_REDIRECTS = 5;

const TIMEOUT_CODES = new Set(['UND_ERR_CONNECT_TIMEOUT', 'UND_ERR_HEADERS_TIMEOUT', 'UND_ERR_BODY_TIMEOUT']);
const DNS_CODES = new Set(['ENOTFOUND', 'EAI_AGAIN']);
const CONNECTION_CODES = new Set(['ECONNREFUSED', 'ECONNRESET', 'ETIMEDOUT', 'EPIPE', 'EHOSTUNREACH', 'ENETUNREACH', 'UND_ERR_SOCKET']);
const TLS_CODES = new Set([
  'CERT_HAS_EXPIRED',
  'DEPTH_ZERO_SELF_SIGNED_CERT',
  'SELF_SIGNED_CERT_IN_CHAIN',
  'UNABLE_TO_VERIFY_LEAF_SIGNATURE',
  'ERR_TLS_CERT_ALTNAME_INVALID',
]);

/**
 * Map a thrown request error to an error code and a readable detail
 */
export function classifyRequestError(error: unknown, timeout: number): { code: ErrorCode; detail: string } {
  const err = toError(error);
  const code = errorCodeOf(error);

  if (code && TIMEOUT_CODES.has(code)) {
    return { code: 'FETCH_TIMEOUT', detail: `Request timeout after ${timeout}ms` };
  }
  if (code && DNS_CODES.has(code)) {
    return { code: 'FETCH_DNS', detail: `DNS lookup failed: ${err.message}` };
  }
  if (code && TLS_CODES.has(code)) {
    return { code: 'FETCH_TLS', detail: `TLS handshake failed: ${code} - ${err.message}` };
  }
  if (code && CONNECTION_CODES.has(code)) {
    return { code: 'FETCH_CONNECTION', detail: `Connection failed: ${code} - ${err.message}` };
  }
  return { code: 'FETCH_CONNECTION', detail: `Fetch failed: ${err.message}` };
}

/**
 * Fetch a listing page over plain HTTP, the way a desktop browser would request it.
 * Never throws: failures are reported through `errorCode` and `errorDetail`.
 */
export async function fetchStatic(options: FetchOptions): Promise<FetchResult> {
  const startTime = Date.now();
  const {
    url,
    timeout = DEFAULT_TIMEOUT,
    userAgent = getRandomUserAgent(),
    headers = {},
    followRedirects = true,
    acceptEncoding = true,
    dispatcher,
  } = options;

  // Prepare headers
  const requestHeaders: Record<string, string> = {
    'User-Agent': userAgent,
    ...BROWSER_HEADERS,
    ...headers,
  };

  if (acceptEncoding) {
    requestHeaders['Accept-Encoding'] = 'gzip, deflate, br';
  }

  const result: FetchResult = {
    success: false,
    url,
    finalUrl: url,
    httpStatus: null,
    contentType: null,
    html: null,
    errorCode: null,
    errorDetail: null,
    timings: {
      total: 0,
    },
    headers: {},
  };

  try {
    const response = await request(url, {
      method: 'GET',
      headers: requestHeaders,
      headersTimeout: timeout,
      bodyTimeout: timeout,
      ...(followRedirects ? { maxRedirections: MAX_REDIRECTS } : {}),
      ...(dispatcher ? { dispatcher } : {}),
    });

    // Capture headers
    const responseHeaders: Record<string, string> = {};
    for (const [key, value] of Object.entries(response.headers)) {
      if (typeof value === 'string') {
        responseHeaders[key] = value;
      } else if (Array.isArray(value)) {
        responseHeaders[key] = value.join(', ');
      }
    }

    result.httpStatus = response.statusCode;
    result.headers = responseHeaders;
    result.contentType = responseHeaders['content-type'] ?? null;

    const buffer = Buffer.from(await response.body.arrayBuffer());
    result.timings.total = Date.now() - startTime;

    if (response.statusCode >= 400) {
      result.errorCode = response.statusCode >= 500 ? 'FETCH_HTTP_5XX' : 'FETCH_HTTP_4XX';
      result.errorDetail = `HTTP ${response.statusCode}`;
      return result;
    }

    if (result.contentType && !/html/i.test(result.contentType)) {
      result.errorCode = 'FETCH_NOT_HTML';
      result.errorDetail = `Unexpected content type: ${result.contentType}`;
      return result;
    }

    result.html = decompressBody(buffer, responseHeaders['content-encoding'] ?? null);
    result.success = true;
    staticLogger.debug(`Fetched ${url} (${response.statusCode}, ${result.html.length} chars, ${result.timings.total}ms)`);

    return result;
  } catch (error) {
    result.timings.total = Date.now() - startTime;

    const { code, detail } = classifyRequestError(error, timeout);
    result.errorCode = code;
    result.errorDetail = detail;

    return result;
  }
}
