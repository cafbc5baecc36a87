import { Hono } from 'hono';
import { requestId } from './middleware/request-id.js';
import { createTracing } from './middleware/tracing.js';
import { createLogger, type LogLevel } from './middleware/logger.js';
import { createBodyLimit } from './middleware/body-limit.js';
import { createHealthRoutes } from './routes/health.js';
import { createStatsRoutes } from './routes/stats.js';
import { handleRouteError } from './utils/error-handler.js';
import type { StatEngine } from './engine.js';

export interface StatsAppOptions {
  /** Request log threshold. Default: the engine's configured level. */
  logLevel?: LogLevel;
  /** Request body limit for POST routes. Default: 64 KiB */
  maxBodyBytes?: number;
}

/**
 * Hono app exposing an engine over HTTP, for a host service to mount or serve.
 *
 * Routes:
 * - /api/health: component health
 * - /api/metrics, /api/caps/layers, /api/resolve, /api/cache: see routes/stats.ts
 */
export function createStatsApp(engine: StatEngine, options: StatsAppOptions = {}): Hono {
  const app = new Hono();
  const { middleware: loggerMiddleware } = createLogger(
    'stat-engine-http',
    options.logLevel ?? engine.config.logLevel,
  );

  app.use('*', requestId());
  app.use('*', createTracing());
  app.use('*', loggerMiddleware);
  app.use('/api/*', createBodyLimit(options.maxBodyBytes ?? 65_536));

  app.route('/api/health', createHealthRoutes({
    registry: engine.registry,
    store: engine.store,
    redisClient: engine.redis,
  }));
  app.route('/api', createStatsRoutes({
    aggregator: engine.aggregator,
    capsProvider: engine.capsProvider,
  }));

  app.notFound((c) => c.json({ error: 'not_found', message: `No route for ${c.req.method} ${c.req.path}` }, 404));
  app.onError((err, c) => {
    engine.log('error', { event: 'http_unhandled_error', path: c.req.path, message: err.message });
    return handleRouteError(c, err);
  });

  return app;
}
