import type { Context, Next } from 'hono';
import logger from '../lib/logger.js';

interface Window {
  count: number;
  resetAt: number;
}

const windows = new Map<string, Window>();
let deniedDecisions = 0;

const cleanupTimer = setInterval(() => {
  const now = Date.now();
  for (const [key, entry] of windows) {
    if (now >= entry.resetAt) windows.delete(key);
  }
}, 60_000);
cleanupTimer.unref();

function clientKey(c: Context): string {
  const forwarded = c.req.header('x-forwarded-for')?.split(',')[0]?.trim();
  return (forwarded || c.req.header('x-real-ip') || 'anonymous').slice(0, 128);
}

export function getRateLimitStats() {
  return { active_windows: windows.size, denied_decisions: deniedDecisions };
}

export function resetRateLimitStateForTests() {
  windows.clear();
  deniedDecisions = 0;
}

/**
 * Fixed-window limit on how many requests one client may start. Guards the
 * expensive run endpoint; provider throughput is governed separately by the
 * service rate limiter.
 */
export function rateLimitMiddleware(maxRequests: number, windowMs: number) {
  return async (c: Context, next: Next) => {
    const key = `${c.req.path}:${clientKey(c)}`;
    const now = Date.now();
    const entry = windows.get(key);

    if (!entry || now >= entry.resetAt) {
      windows.set(key, { count: 1, resetAt: now + windowMs });
      await next();
      return;
    }

    if (entry.count >= maxRequests) {
      deniedDecisions += 1;
      const retryAfter = Math.ceil((entry.resetAt - now) / 1000);
      logger.warn({ key, retry_after_s: retryAfter }, 'Request rate limit exceeded');
      c.header('Retry-After', String(retryAfter));
      return c.json({ error: 'Too many requests. Please slow down.' }, 429);
    }

    entry.count += 1;
    await next();
  };
}
