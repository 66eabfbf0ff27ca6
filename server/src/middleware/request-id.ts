import { randomUUID } from 'node:crypto';
import type { Context, Next } from 'hono';

declare module 'hono' {
  interface ContextVariableMap {
    requestId: string;
  }
}

const SAFE_ID = /^[A-Za-z0-9._:-]{1,64}$/;

/**
 * Accepts a caller-supplied X-Request-ID (or X-Correlation-ID) when it is a
 * short token, otherwise mints one. The id doubles as the pipeline run id.
 */
export async function requestIdMiddleware(c: Context, next: Next) {
  const supplied = (c.req.header('X-Request-ID') ?? c.req.header('X-Correlation-ID'))?.trim();
  const requestId = supplied && SAFE_ID.test(supplied) ? supplied : randomUUID();
  c.set('requestId', requestId);
  c.header('X-Request-ID', requestId);
  await next();
}
