import Fastify from 'fastify';
import { loadConfig } from '../config/index.js';
import {
  CatalogError,
  ConfigError,
  RunInProgressError,
  UnknownProductError,
} from '../core/errors.js';
import { registry } from '../metrics/index.js';
import { ValidationService } from '../services/validationService.js';
import { getLogger } from '../utils/logging.js';
import { validationRoutes } from './routes/validations.js';

export interface ServerOptions {
  service?: ValidationService;
}

export async function buildServer(opts: ServerOptions = {}) {
  const app = Fastify({ logger: getLogger() });

  // Validation service (singleton for process)
  const service = opts.service ?? new ValidationService(loadConfig());

  app.get('/healthz', async () => {
    const info = service.info();
    return {
      status: 'ok',
      time: new Date().toISOString(),
      build: {
        version: process.env.npm_package_version || 'dev',
        node: process.version,
      },
      catalog: { products: info.products },
      runs: {
        running: info.running,
        lastRunAt: info.lastRunAt,
        latestRunId: service.latestReport()?.runId ?? null,
      },
    };
  });

  app.get('/metrics', async (_req, reply) => {
    const body = await registry.metrics();
    reply.header('Content-Type', registry.contentType);
    return reply.send(body);
  });

  // Unified error handler; set before routes register so they inherit it
  app.setErrorHandler((error, _req, reply) => {
    if (error instanceof UnknownProductError) {
      return reply.status(400).send({ error: { code: error.code, message: error.message } });
    }
    if (error instanceof RunInProgressError) {
      return reply.status(409).send({ error: { code: error.code, message: error.message } });
    }
    if (error instanceof ConfigError || error instanceof CatalogError) {
      return reply.status(500).send({ error: { code: error.code, message: error.message } });
    }
    if (isValidationError(error)) {
      return reply
        .status(400)
        .send({ error: { code: 'VALIDATION_ERROR', message: error.message } });
    }
    app.log.error({ err: error }, 'Unhandled error');
    return reply
      .status(500)
      .send({ error: { code: 'INTERNAL', message: 'Internal Server Error' } });
  });

  await app.register(validationRoutes, { service });

  function isValidationError(err: unknown): err is { message: string } {
    if (typeof err !== 'object' || err === null) return false;
    return 'validation' in err && 'message' in err && typeof err.message === 'string';
  }
  return app;
}
