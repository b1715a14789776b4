import { randomUUID } from 'node:crypto';
import type { Context, Next } from 'hono';
import { createRequestLogger, type Logger } from '../lib/logger.js';

declare module 'hono' {
  interface ContextVariableMap {
    requestId: string;
    log: Logger;
  }
}

const REQUEST_ID_PATTERN = /^[A-Za-z0-9._:-]+$/;
const MAX_REQUEST_ID_LENGTH = 64;

/** Caller-supplied id when it is safe to echo, otherwise a fresh UUID. */
export function resolveRequestId(raw: string | undefined): string {
  if (raw) {
    const candidate = raw.trim().slice(0, MAX_REQUEST_ID_LENGTH);
    if (REQUEST_ID_PATTERN.test(candidate)) return candidate;
  }
  return randomUUID();
}

export async function requestIdMiddleware(c: Context, next: Next) {
  const requestId = resolveRequestId(c.req.header('X-Request-ID'));
  c.set('requestId', requestId);
  c.set('log', createRequestLogger(requestId, { method: c.req.method, path: c.req.path }));
  c.header('X-Request-ID', requestId);
  await next();
}
