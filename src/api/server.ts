import Fastify from 'fastify';
import { getLogger } from '../utils/logging.js';
import { analyticsRoutes } from './routes/analytics.js';
import { ConcurrencyError, ValidationError } from '../core/errors.js';
import { RepositoryError, NotFoundError } from '../repositories/errors.js';
import { AnalyticsService } from '../services/analyticsService.js';
import { registry } from '../metrics/index.js';

export interface ServerOptions {
  service?: AnalyticsService;
}

export async function buildServer(opts: ServerOptions = {}) {
  const app = Fastify({ logger: getLogger() });
  const service = opts.service ?? new AnalyticsService();
  app.addHook('onClose', async () => {
    service.dispose();
  });

  app.get('/healthz', async () => {
    return {
      status: 'ok',
      time: new Date().toISOString(),
      build: {
        version: process.env.npm_package_version || 'dev',
        node: process.version,
      },
      sources: { count: service.sources.list().length },
      keywords: { count: service.keywords.list().length },
    };
  });

  app.get('/metrics', async (_req, reply) => {
    const body = await registry.metrics();
    reply.header('Content-Type', registry.contentType);
    return reply.send(body);
  });

  // Unified error handler
  app.setErrorHandler((error, _req, reply) => {
    if (error instanceof ValidationError) {
      return reply
        .status(400)
        .send({ error: { code: 'VALIDATION_ERROR', message: error.message, issues: error.issues } });
    }
    if (error instanceof NotFoundError) {
      return reply.status(404).send({ error: { code: 'NOT_FOUND', message: error.message } });
    }
    if (error instanceof ConcurrencyError) {
      return reply.status(409).send({ error: { code: 'CONFLICT', message: error.message } });
    }
    if (error instanceof RepositoryError) {
      return reply
        .status(500)
        .send({ error: { code: 'REPOSITORY_ERROR', message: error.message } });
    }
    if (isClientError(error)) {
      // Fastify's own rejections (malformed JSON body, unsupported media type)
      return reply
        .status(error.statusCode)
        .send({ error: { code: 'VALIDATION_ERROR', message: error.message } });
    }
    app.log.error({ err: error }, 'Unhandled error');
    return reply
      .status(500)
      .send({ error: { code: 'INTERNAL', message: 'Internal Server Error' } });
  });

  function isClientError(err: { statusCode?: number }): err is { statusCode: number } {
    return typeof err.statusCode === 'number' && err.statusCode >= 400 && err.statusCode < 500;
  }

  await app.register(analyticsRoutes(service));
  return app;
}
