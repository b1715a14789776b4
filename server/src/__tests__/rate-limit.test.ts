import { describe, it, expect, afterEach, vi } from 'vitest';
import { Hono } from 'hono';
import { requestIdMiddleware } from '../middleware/request-id.js';
import { createRateLimiter } from '../middleware/rate-limit.js';

function buildApp(maxRequests: number, windowMs: number, trustProxy = false) {
  const limiter = createRateLimiter({ maxRequests, windowMs, trustProxy });
  const app = new Hono();
  app.use('*', requestIdMiddleware);
  app.use('/limited', limiter.middleware);
  app.get('/limited', (c) => c.json({ ok: true }));
  return { app, limiter };
}

function fromIp(ip: string) {
  return { headers: { 'x-forwarded-for': ip } };
}

/** Bindings @hono/node-server passes as the env of each request. */
function fromSocket(remoteAddress: string) {
  return { incoming: { socket: { remoteAddress, remotePort: 52000, remoteFamily: 'IPv4' } } };
}

describe('createRateLimiter', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('keeps separate buckets per forwarded client when proxies are trusted', async () => {
    const { app } = buildApp(1, 10_000, true);

    const aFirst = await app.request('http://test/limited', fromIp('10.0.0.1'));
    const bFirst = await app.request('http://test/limited', fromIp('10.0.0.2'));
    const aSecond = await app.request('http://test/limited', fromIp('10.0.0.1'));

    expect(aFirst.status).toBe(200);
    expect(bFirst.status).toBe(200);
    expect(aSecond.status).toBe(429);
  });

  it('keys clients by socket address and ignores forwarded headers when proxies are not trusted', async () => {
    const { app } = buildApp(1, 10_000);

    const aFirst = await app.request('http://test/limited', fromIp('10.9.9.9'), fromSocket('10.0.0.1'));
    const bFirst = await app.request('http://test/limited', fromIp('10.9.9.9'), fromSocket('10.0.0.2'));
    const aSecond = await app.request('http://test/limited', fromIp('10.9.9.8'), fromSocket('10.0.0.1'));

    expect(aFirst.status).toBe(200);
    expect(bFirst.status).toBe(200);
    expect(aSecond.status).toBe(429);
  });

  it('falls back to the socket address when a trusted proxy sends no forwarded header', async () => {
    const { app } = buildApp(1, 10_000, true);

    const first = await app.request('http://test/limited', {}, fromSocket('10.0.0.1'));
    const forwarded = await app.request('http://test/limited', fromIp('10.0.0.1'), fromSocket('10.0.0.5'));
    const second = await app.request('http://test/limited', {}, fromSocket('10.0.0.1'));

    expect(first.status).toBe(200);
    expect(forwarded.status).toBe(429);
    expect(second.status).toBe(429);
  });

  it('returns the error body, Retry-After, and resets after the window', async () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-02-20T21:00:00.000Z'));
    const { app } = buildApp(2, 1_000);

    const first = await app.request('http://test/limited');
    const second = await app.request('http://test/limited');
    const third = await app.request('http://test/limited', { headers: { 'X-Request-ID': 'rl-1' } });

    expect(first.status).toBe(200);
    expect(second.headers.get('X-RateLimit-Remaining')).toBe('0');
    expect(third.status).toBe(429);
    expect(third.headers.get('Retry-After')).toBe('1');
    expect(await third.json()).toEqual({
      error: 'Too many requests. Please try again later.',
      code: 'RATE_LIMITED',
      request_id: 'rl-1',
    });

    vi.advanceTimersByTime(1_001);

    const afterReset = await app.request('http://test/limited');
    expect(afterReset.status).toBe(200);
  });

  it('tracks allowed and denied decisions', async () => {
    const { app, limiter } = buildApp(1, 10_000);

    await app.request('http://test/limited');
    await app.request('http://test/limited');

    const stats = limiter.stats();
    expect(stats.allowed_decisions).toBe(1);
    expect(stats.denied_decisions).toBe(1);
    expect(stats.denied_by_scope).toEqual([{ scope: 'GET:/limited', count: 1 }]);

    limiter.reset();
    expect(limiter.stats().active_buckets).toBe(0);
  });
});
