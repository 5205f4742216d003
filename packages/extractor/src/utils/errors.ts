/**
 * Coerce anything thrown into an Error
 */
export function toError(error: unknown): Error {
  if (error instanceof Error) return error;
  return new Error(typeof error === 'string' ? error : JSON.stringify(error));
}

/**
 * Node-style error code (`ECONNREFUSED`, `UND_ERR_HEADERS_TIMEOUT`, ...) if present
 */
export function errorCodeOf(error: unknown): string | null {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return null;
}
