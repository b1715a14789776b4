import { getConnInfo } from '@hono/node-server/conninfo';
import type { Context, MiddlewareHandler, Next } from 'hono';
import { jsonError } from '../lib/http-response.js';
import logger from '../lib/logger.js';

interface RateLimitEntry {
  count: number;
  resetAt: number;
}

export interface RateLimitOptions {
  maxRequests: number;
  windowMs: number;
  /** Key clients by the first X-Forwarded-For hop instead of the socket address. */
  trustProxy?: boolean;
  maxBuckets?: number;
}

export interface RateLimitStats {
  active_buckets: number;
  max_buckets: number;
  allowed_decisions: number;
  denied_decisions: number;
  denied_by_scope: { scope: string; count: number }[];
}

export interface RateLimiter {
  middleware: MiddlewareHandler;
  stats(): RateLimitStats;
  reset(): void;
}

const DEFAULT_MAX_BUCKETS = 50_000;
const MAX_DENIED_SCOPE_ENTRIES = 200;

function trimKeySegment(value: string, maxLen = 128): string {
  const trimmed = value.trim();
  return trimmed.length > maxLen ? trimmed.slice(0, maxLen) : trimmed;
}

function socketAddress(c: Context): string | undefined {
  try {
    return getConnInfo(c).remote.address;
  } catch {
    // not served by @hono/node-server, so there is no socket to read
    return undefined;
  }
}

/**
 * In-memory fixed-window limiter. Expired buckets are dropped lazily when
 * their key is seen again or when the bucket map is full.
 */
export function createRateLimiter(options: RateLimitOptions): RateLimiter {
  const { maxRequests, windowMs } = options;
  const maxBuckets = options.maxBuckets ?? DEFAULT_MAX_BUCKETS;
  const buckets = new Map<string, RateLimitEntry>();
  const deniedByScope = new Map<string, number>();
  let allowedDecisions = 0;
  let deniedDecisions = 0;

  function identify(c: Context, scope: string): string {
    const forwarded = options.trustProxy ? c.req.header('x-forwarded-for')?.split(',')[0]?.trim() : undefined;
    const client = trimKeySegment(forwarded || socketAddress(c) || 'anonymous');
    return `ip:${client}:${scope}`;
  }

  function evictExpired(now: number) {
    for (const [key, entry] of buckets) {
      if (now >= entry.resetAt) buckets.delete(key);
    }
  }

  function recordDenied(scope: string) {
    deniedDecisions += 1;
    deniedByScope.set(scope, (deniedByScope.get(scope) ?? 0) + 1);
    while (deniedByScope.size > MAX_DENIED_SCOPE_ENTRIES) {
      const oldest = deniedByScope.keys().next().value;
      if (!oldest) break;
      deniedByScope.delete(oldest);
    }
  }

  const middleware: MiddlewareHandler = async (c: Context, next: Next) => {
    const scope = `${c.req.method}:${c.req.path}`;
    const key = identify(c, scope);
    const now = Date.now();
    let entry = buckets.get(key);

    if (!entry || now >= entry.resetAt) {
      if (buckets.size >= maxBuckets) evictExpired(now);
      while (buckets.size >= maxBuckets) {
        const oldest = buckets.keys().next().value;
        if (!oldest) break;
        buckets.delete(oldest);
      }
      entry = { count: 0, resetAt: now + windowMs };
      buckets.set(key, entry);
    } else {
      // keep insertion order = least recently used first
      buckets.delete(key);
      buckets.set(key, entry);
    }

    entry.count++;
    const resetSeconds = Math.max(1, Math.ceil((entry.resetAt - now) / 1000));
    c.header('X-RateLimit-Limit', String(maxRequests));
    c.header('X-RateLimit-Remaining', String(Math.max(0, maxRequests - entry.count)));
    c.header('X-RateLimit-Reset', String(resetSeconds));

    if (entry.count > maxRequests) {
      recordDenied(scope);
      c.header('Retry-After', String(resetSeconds));
      (c.get('log') ?? logger).warn({ key, scope, count: entry.count, max: maxRequests }, 'Rate limit exceeded');
      return jsonError(c, 429, 'Too many requests. Please try again later.', 'RATE_LIMITED');
    }

    allowedDecisions += 1;
    await next();
  };

  return {
    middleware,
    stats() {
      return {
        active_buckets: buckets.size,
        max_buckets: maxBuckets,
        allowed_decisions: allowedDecisions,
        denied_decisions: deniedDecisions,
        denied_by_scope: [...deniedByScope.entries()]
          .sort((a, b) => b[1] - a[1])
          .slice(0, 10)
          .map(([scope, count]) => ({ scope, count })),
      };
    },
    reset() {
      buckets.clear();
      deniedByScope.clear();
      allowedDecisions = 0;
      deniedDecisions = 0;
    },
  };
}
