import { Hono } from 'hono';
import { serve } from '@hono/node-server';
import { cors } from 'hono/cors';
import { fileURLToPath } from 'node:url';
import path from 'node:path';
import { loadConfig, type AppConfig } from './config.js';
import { isAppError } from './lib/errors.js';
import { jsonError } from './lib/http-response.js';
import { createCompletionProvider } from './lib/llm.js';
import logger, { createComponentLogger, errorMessage } from './lib/logger.js';
import { requestIdMiddleware } from './middleware/request-id.js';
import { createRateLimiter } from './middleware/rate-limit.js';
import { loadProfile } from './profile/loader.js';
import { otherLanguage } from './profile/types.js';
import { createDocumentRoutes } from './routes/documents.js';
import { AdaptationCache } from './tailoring/adaptation-cache.js';
import { AdaptationService } from './tailoring/adaptation-service.js';
import { defaultExtractionChain } from './tailoring/extraction.js';
import { JobAnalyzer } from './tailoring/job-analyzer.js';
import { TailoringPipeline } from './tailoring/pipeline.js';
import { createSearchProvider, ResearchHelper } from './tailoring/research.js';

export const VERSION = '1.0.0';

export interface AppState {
  shuttingDown: boolean;
}

export interface AppDeps {
  pipeline: TailoringPipeline;
  config: Pick<AppConfig, 'server' | 'llm' | 'research'>;
  state?: AppState;
}

/** Hono app over an already-built pipeline. No I/O at construction. */
export function createApp(deps: AppDeps): Hono {
  const { pipeline, config } = deps;
  const state = deps.state ?? { shuttingDown: false };
  const isProduction = process.env.NODE_ENV === 'production';
  const rateLimiter = createRateLimiter({
    maxRequests: config.server.rateLimit.maxRequests,
    windowMs: config.server.rateLimit.windowMs,
    trustProxy: config.server.trustProxy,
  });
  const startedAt = Date.now();

  const app = new Hono();

  app.use('*', requestIdMiddleware);

  app.use('*', async (c, next) => {
    if (state.shuttingDown && c.req.path !== '/health') {
      return jsonError(c, 503, 'Server is restarting. Please retry shortly.', 'SHUTTING_DOWN');
    }
    const requestStartedAt = Date.now();
    await next();
    c.get('log').debug({ status: c.res.status, duration_ms: Date.now() - requestStartedAt }, 'Request complete');
  });

  app.use('*', async (c, next) => {
    await next();
    c.header('X-Content-Type-Options', 'nosniff');
    c.header('X-Frame-Options', 'DENY');
    c.header('Referrer-Policy', 'no-referrer');
    const forwardedProto = c.req.header('x-forwarded-proto')?.split(',')[0]?.trim().toLowerCase();
    const requestIsHttps = forwardedProto === 'https' || new URL(c.req.url).protocol === 'https:';
    if (isProduction && requestIsHttps) {
      c.header('Strict-Transport-Security', 'max-age=63072000; includeSubDomains; preload');
    }
  });

  app.use('*', cors({ origin: config.server.allowedOrigins }));

  app.get('/', (c) => c.json({ message: 'CV tailoring service', version: VERSION }));

  app.get('/health', (c) => {
    c.header('Cache-Control', 'no-store');
    return c.json({
      status: state.shuttingDown ? 'draining' : 'ok',
      version: VERSION,
      uptime_seconds: Math.floor((Date.now() - startedAt) / 1000),
      llm: { provider: config.llm.provider, model: config.llm.modelId },
      web_search: config.research.enableWebSearch,
      adaptation_cache: pipeline.cacheStats(),
      rate_limit: rateLimiter.stats(),
      timestamp: new Date().toISOString(),
    });
  });

  app.use('/api/v1/*', rateLimiter.middleware);
  app.route('/api/v1', createDocumentRoutes({ pipeline, maxBodyBytes: config.server.maxBodyBytes }));

  app.notFound((c) => jsonError(c, 404, 'Not found', 'NOT_FOUND'));

  app.onError((err, c) => {
    const log = c.get('log') ?? logger;
    if (isAppError(err)) {
      const level = err.status >= 500 ? 'error' : 'warn';
      log[level]({ code: err.code, error: err.message }, 'Request failed');
      return jsonError(c, err.status, err.message, err.code);
    }
    log.error({ err }, 'Unhandled error');
    return jsonError(c, 500, 'Internal server error', 'INTERNAL_ERROR');
  });

  return app;
}

/**
 * Wires every component from one configuration. The profile is loaded here,
 * so a malformed Knowledge Base fails startup with ValidationError.
 */
export async function buildPipeline(config: AppConfig): Promise<TailoringPipeline> {
  const profile = await loadProfile(config.profile.path, {
    primaryLanguage: config.profile.primaryLanguage,
    phoneOverride: config.profile.phoneOverride,
  });
  const translations = config.profile.translationPath
    ? [
        await loadProfile(config.profile.translationPath, {
          primaryLanguage: otherLanguage(profile.primaryLanguage),
          phoneOverride: config.profile.phoneOverride,
        }),
      ]
    : [];

  const adaptation = new AdaptationService({
    provider: createCompletionProvider(config.llm),
    config: config.llm,
    cache: new AdaptationCache(),
    logger: createComponentLogger('adaptation'),
  });
  const analyzer = new JobAnalyzer({
    chain: defaultExtractionChain(adaptation, createComponentLogger('extraction')),
    primaryLanguage: profile.primaryLanguage,
    fetchTimeoutMs: config.fetch.timeoutMs,
    logger: createComponentLogger('analyzer'),
  });
  const research = new ResearchHelper({
    provider: createSearchProvider(config.research),
    config: config.research,
    logger: createComponentLogger('research'),
  });

  return new TailoringPipeline({
    profile,
    translations,
    analyzer,
    adaptation,
    research,
    weights: config.retrieval.weights,
    logger: createComponentLogger('pipeline'),
  });
}

let server: ReturnType<typeof serve> | null = null;

export async function startServer(config: AppConfig = loadConfig()) {
  if (server) return server;

  const pipeline = await buildPipeline(config);
  const state: AppState = { shuttingDown: false };
  const app = createApp({ pipeline, config, state });
  const { port } = config.server;

  logger.info(
    { port, llm: config.llm.provider, model: config.llm.modelId, web_search: config.research.enableWebSearch },
    'CV tailoring server starting',
  );
  const running = serve({ fetch: app.fetch, port });
  server = running;
  logger.info({ port }, `Server running at http://localhost:${port}`);

  function shutdown(signal: string) {
    if (state.shuttingDown) return;
    state.shuttingDown = true;
    logger.info({ signal }, 'Graceful shutdown initiated');

    running.close(() => {
      logger.info('HTTP server closed');
      process.exit(0);
    });

    // Force exit after 10s if connections don't drain
    setTimeout(() => {
      logger.warn('Forcing exit after shutdown timeout');
      process.exit(1);
    }, 10_000).unref();
  }

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('unhandledRejection', (reason) => {
    logger.error({ reason }, 'Unhandled promise rejection');
    shutdown('UNHANDLED_REJECTION');
  });
  process.on('uncaughtException', (err) => {
    logger.error({ err }, 'Uncaught exception');
    shutdown('UNCAUGHT_EXCEPTION');
  });

  return running;
}

function isMainModule(): boolean {
  const current = fileURLToPath(import.meta.url);
  const entry = process.argv[1];
  if (!entry) return false;
  return path.resolve(entry) === path.resolve(current);
}

if (isMainModule()) {
  startServer().catch((err: unknown) => {
    logger.fatal({ error: errorMessage(err) }, 'Startup failed');
    process.exit(1);
  });
}
