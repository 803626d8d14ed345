import Fastify, { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { AppError } from './common/errors.js';
import type { Clock } from './common/host.deps.js';
import type { Env } from './config/env.js';
import { registerDashboardRoutes } from './modules/dashboard/index.js';
import { registerReportRoutes } from './modules/report/index.js';
import type { VerdictQueryService } from './modules/verdicts/index.js';

export interface AppDeps {
  query: VerdictQueryService;
  clock: Clock;
  config: Pick<Env, 'LOG_LEVEL' | 'CORS_ORIGINS' | 'NODE_ENV' | 'REFRESH_INTERVAL_MS'>;
}

/**
 * Build Fastify Application
 */
export function buildApp(deps: AppDeps): FastifyInstance {
  const { config } = deps;

  const app = Fastify({
    logger: {
      level: config.LOG_LEVEL,
    },
    trustProxy: true,
  });

  // CORS
  app.register(cors, {
    origin: config.CORS_ORIGINS === '*' ? true : config.CORS_ORIGINS.split(','),
    exposedHeaders: ['Content-Disposition'],
  });

  // Global error handler
  app.setErrorHandler((err, _req, reply) => {
    if (err instanceof AppError) {
      if (err.statusCode >= 500) {
        app.log.error(err);
      } else {
        app.log.warn({ code: err.code }, err.message);
      }
      return reply.status(err.statusCode).send({
        ok: false,
        error: err.code,
        message: err.message,
      });
    }

    app.log.error(err);

    // Fastify validation errors
    if (err.validation) {
      return reply.status(400).send({
        ok: false,
        error: 'VALIDATION_ERROR',
        message: err.message,
      });
    }

    // Unknown errors
    const statusCode = err.statusCode ?? 500;
    return reply.status(statusCode).send({
      ok: false,
      error: 'INTERNAL_ERROR',
      message: config.NODE_ENV === 'production' ? 'Internal server error' : err.message,
    });
  });

  // Not found handler
  app.setNotFoundHandler((_req, reply) => {
    reply.status(404).send({
      ok: false,
      error: 'NOT_FOUND',
      message: 'Route not found',
    });
  });

  app.get('/api/health', async () => ({
    ok: true,
    timestamp: deps.clock.utcNow().toISOString(),
    cache: deps.query.stats(),
  }));

  app.register(async (fastify) => {
    await registerDashboardRoutes(fastify, {
      query: deps.query,
      refreshIntervalMs: config.REFRESH_INTERVAL_MS,
    });
    await registerReportRoutes(fastify, { query: deps.query, clock: deps.clock });
  });

  return app;
}
