// Page acquisition types
import type { ErrorCode } from '@autofields/shared';
import type { Dispatcher } from 'undici';

export interface FetchResult {
  success: boolean;
  url: string;
  finalUrl: string;  // after redirects
  httpStatus: number | null;
  contentType: string | null;
  html: string | null;
  errorCode: ErrorCode | null;
  errorDetail: string | null;
  timings: {
    total: number;
  };
  headers: Record<string, string>;
}

export interface FetchOptions {
  url: string;
  timeout?: number;  // default 15000ms
  userAgent?: string;
  headers?: Record<string, string>;
  followRedirects?: boolean;  // default true, max 5
  acceptEncoding?: boolean;  // gzip, deflate, br
  dispatcher?: Dispatcher;
}
