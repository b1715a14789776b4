const TRANSIENT_STATUSES = new Set([408, 425, 429, 500, 502, 503, 504]);
const TRANSIENT_ERROR_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'ENOTFOUND',
  'ETIMEDOUT',
  'ECONNABORTED',
  'EAI_AGAIN',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
  'UND_ERR_SOCKET',
]);
const TRANSIENT_PATTERNS = [
  'rate limit',
  'too many requests',
  'overloaded',
  'temporarily unavailable',
  'timed out',
  'timeout',
  'socket hang up',
  'fetch failed',
  'network error',
  'connection refused',
  'connection error',
  'service unavailable',
  'bad gateway',
];

type HeaderBag = Headers | Record<string, string | undefined>;

function readHeader(headers: HeaderBag | undefined, name: string): string | null {
  if (!headers) return null;
  if (headers instanceof Headers) {
    return headers.get(name);
  }
  const key = Object.keys(headers).find((k) => k.toLowerCase() === name.toLowerCase());
  const value = key ? headers[key] : undefined;
  return typeof value === 'string' ? value : null;
}

function readProperty(value: unknown, key: string): unknown {
  if (typeof value !== 'object' || value === null) return undefined;
  const property: unknown = Reflect.get(value, key);
  return property;
}

function getStatusCode(error: unknown): number | null {
  const status = readProperty(error, 'status') ?? readProperty(error, 'statusCode');
  if (typeof status === 'number') return status;
  const responseStatus = readProperty(readProperty(error, 'response'), 'status');
  return typeof responseStatus === 'number' ? responseStatus : null;
}

function getErrorCode(error: unknown): string | null {
  const code = readProperty(error, 'code') ?? readProperty(readProperty(error, 'cause'), 'code');
  return typeof code === 'string' ? code.toUpperCase() : null;
}

/**
 * True for failures worth one more attempt: upstream 5xx/429, connection-level
 * errno codes, timeouts. 4xx responses other than 408/425/429 are final.
 */
export function isTransientError(error: unknown): boolean {
  const status = getStatusCode(error);
  if (status != null) return TRANSIENT_STATUSES.has(status);

  const code = getErrorCode(error);
  if (code && TRANSIENT_ERROR_CODES.has(code)) return true;

  const msg = (error instanceof Error ? error.message : String(error)).toLowerCase();
  return TRANSIENT_PATTERNS.some((p) => msg.includes(p));
}

/**
 * Retry-After delay in milliseconds, or 0 if absent. Capped at 30s.
 */
function getRetryAfterMs(error: unknown): number {
  const topHeaders = readProperty(error, 'headers');
  const responseHeaders = readProperty(readProperty(error, 'response'), 'headers');
  const retryAfter = readHeader(asHeaderBag(topHeaders), 'retry-after')
    ?? readHeader(asHeaderBag(responseHeaders), 'retry-after');
  if (!retryAfter) return 0;

  const seconds = parseFloat(retryAfter);
  if (!isNaN(seconds) && seconds > 0) {
    return Math.min(seconds, 30) * 1000;
  }
  return 0;
}

function asHeaderBag(value: unknown): HeaderBag | undefined {
  if (value instanceof Headers) return value;
  if (typeof value === 'object' && value !== null) {
    return Object.fromEntries(
      Object.entries(value).map(([k, v]) => [k, typeof v === 'string' ? v : undefined]),
    );
  }
  return undefined;
}

export interface RetryOptions {
  /** Total attempts including the first one. */
  maxAttempts?: number;
  baseDelay?: number;
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (attempt: number, error: Error) => void;
}

export class RetryExhaustedError extends Error {
  readonly attempts: number;

  constructor(attempts: number, cause: Error) {
    super(cause.message, { cause });
    this.name = 'RetryExhaustedError';
    this.attempts = attempts;
  }
}

/**
 * Runs `fn`, retrying transient failures with jittered exponential backoff.
 * Non-transient errors are rethrown as-is after the first attempt; a transient
 * error that survives every attempt is wrapped in RetryExhaustedError.
 */
export async function withRetry<T>(fn: () => Promise<T>, options?: RetryOptions): Promise<T> {
  const maxAttempts = options?.maxAttempts ?? 2;
  const baseDelay = options?.baseDelay ?? 500;
  const shouldRetry = options?.shouldRetry ?? isTransientError;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));

      if (!shouldRetry(err)) {
        throw error;
      }
      if (attempt >= maxAttempts) {
        throw new RetryExhaustedError(attempt, error);
      }

      options?.onRetry?.(attempt, error);

      const retryAfterMs = getRetryAfterMs(err);
      const delay = retryAfterMs > 0
        ? retryAfterMs
        : baseDelay * Math.pow(2, attempt - 1) * (0.5 + Math.random());
      await new Promise((resolve) => setTimeout(resolve, delay));
    }
  }
}
