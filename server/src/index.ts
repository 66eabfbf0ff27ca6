import { Hono } from 'hono';
import { serve } from '@hono/node-server';
import { cors } from 'hono/cors';
import { fileURLToPath } from 'node:url';
import path from 'node:path';
import { requestIdMiddleware } from './middleware/request-id.js';
import { getRateLimitStats } from './middleware/rate-limit.js';
import { createInterviewRoutes } from './routes/interview.js';
import type { InterviewRouteDeps } from './routes/interview.js';
import { loadPipelineSettings, loadProviderSettings } from './lib/config.js';
import { AppError } from './lib/errors.js';
import { parsePositiveInt } from './lib/http-body-guard.js';
import { createServiceClients } from './lib/llm.js';
import { getMetrics, recordRequestMetric } from './lib/metrics.js';
import { ServiceRateLimiter } from './lib/rate-limiter.js';
import { RetryExecutor } from './lib/retry.js';
import { ResearchDiscoveryService } from './services/discovery.js';
import { LLMGenerationService } from './services/generation.js';
import { LLMTopicExtractor } from './services/topic-extraction.js';
import logger from './lib/logger.js';

const isProduction = process.env.NODE_ENV === 'production';
const allowedOrigins = process.env.ALLOWED_ORIGINS
  ? process.env.ALLOWED_ORIGINS.split(',').map((o) => o.trim())
  : isProduction
    ? []
    : ['http://localhost:5173'];

export interface AppOptions {
  /** Limiter shared with the run dependencies, surfaced on /metrics. */
  limiter?: ServiceRateLimiter;
  isShuttingDown?: () => boolean;
}

export function createApp(deps: InterviewRouteDeps, options: AppOptions = {}): Hono {
  const app = new Hono();
  const startTime = Date.now();
  const isShuttingDown = options.isShuttingDown ?? (() => false);

  app.use('*', requestIdMiddleware);

  app.use('*', async (c, next) => {
    const startedAt = Date.now();
    let status = 500;
    try {
      const bypass = c.req.path === '/health' || c.req.path === '/metrics';
      if (isShuttingDown() && !bypass) {
        status = 503;
        return c.json({ error: 'Server is restarting. Please retry shortly.' }, 503);
      }
      await next();
      status = c.res.status;
    } finally {
      recordRequestMetric(status, Date.now() - startedAt);
    }
  });

  app.use('*', async (c, next) => {
    await next();
    c.header('X-Content-Type-Options', 'nosniff');
    c.header('X-Frame-Options', 'DENY');
    c.header('Referrer-Policy', 'no-referrer');
  });

  app.use('*', cors({ origin: allowedOrigins }));

  app.get('/health', (c) => {
    c.header('Cache-Control', 'no-store');
    return c.json({
      status: isShuttingDown() ? 'draining' : 'ok',
      timestamp: new Date().toISOString(),
    });
  });

  app.get('/metrics', (c) => {
    c.header('Cache-Control', 'no-store');
    const metricsKey = process.env.METRICS_KEY;
    if (metricsKey) {
      if (c.req.header('Authorization') !== `Bearer ${metricsKey}`) {
        return c.json({ error: 'Unauthorized' }, 401);
      }
    } else if (isProduction) {
      return c.json({ error: 'Not found' }, 404);
    }

    const limiter = options.limiter;
    const memUsage = process.memoryUsage();
    return c.json({
      uptime_seconds: Math.floor((Date.now() - startTime) / 1000),
      ...getMetrics(),
      rate_limit_runtime: getRateLimitStats(),
      service_limits: limiter
        ? Object.fromEntries(limiter.services().map((service) => [service, limiter.usage(service)]))
        : {},
      memory: {
        rss_mb: Math.round(memUsage.rss / 1024 / 1024),
        heap_used_mb: Math.round(memUsage.heapUsed / 1024 / 1024),
      },
    });
  });

  app.route('/api/interview', createInterviewRoutes(deps));

  app.notFound((c) => c.json({ error: 'Not found' }, 404));

  app.onError((err, c) => {
    const requestId = c.get('requestId');
    if (err instanceof AppError && err.status < 500) {
      return c.json({ error: err.message, code: err.code, request_id: requestId }, 400);
    }
    logger.error({ err, requestId }, 'Unhandled error');
    return c.json({ error: 'Internal server error', request_id: requestId }, 500);
  });

  return app;
}

// ─── Process lifecycle ───────────────────────────────────────────────

let server: ReturnType<typeof serve> | null = null;
let shuttingDown = false;

function shutdown(signal: string) {
  if (shuttingDown || !server) return;
  shuttingDown = true;
  logger.info({ signal }, 'Graceful shutdown initiated');

  server.close(() => {
    logger.info('HTTP server closed');
    process.exit(0);
  });

  // Force exit if open SSE streams do not drain
  setTimeout(() => {
    logger.warn('Forcing exit after shutdown timeout');
    process.exit(1);
  }, 10_000).unref();
}

/**
 * Build settings and provider clients once, then serve. Configuration errors
 * surface here, before the port opens.
 */
export function startServer() {
  if (server) return server;

  const settings = loadPipelineSettings();
  const clients = createServiceClients(loadProviderSettings());
  const limiter = new ServiceRateLimiter(settings.rpm, { dailyLimits: settings.dailyLimits });
  const executor = new RetryExecutor(limiter, settings.retry);
  const app = createApp(
    {
      settings,
      executor,
      discovery: new ResearchDiscoveryService(clients),
      generation: new LLMGenerationService(clients),
      extractor: new LLMTopicExtractor(clients),
    },
    { limiter, isShuttingDown: () => shuttingDown },
  );

  const port = parsePositiveInt(process.env.PORT, 3001);
  logger.info(
    { port, llm: clients.llm.name, discovery: clients.perplexity ? 'perplexity' : clients.llm.name },
    'Interview prep server starting',
  );
  server = serve({ fetch: app.fetch, port });
  logger.info({ port }, `Server running at http://localhost:${port}`);

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('unhandledRejection', (reason) => {
    logger.error({ reason }, 'Unhandled promise rejection');
  });

  return server;
}

function isMainModule(): boolean {
  const current = fileURLToPath(import.meta.url);
  const entry = process.argv[1];
  if (!entry) return false;
  return path.resolve(entry) === path.resolve(current);
}

if (isMainModule()) {
  try {
    startServer();
  } catch (err) {
    logger.fatal({ err }, 'Server failed to start');
    process.exit(1);
  }
}
