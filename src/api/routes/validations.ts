import type { FastifyInstance } from 'fastify';
import { BoundaryUnreachableError } from '../../core/errors.js';
import type { ValidationService } from '../../services/validationService.js';
import { runValidationBodySchema, toPublicProduct } from '../schemas/validationSchemas.js';

export async function validationRoutes(app: FastifyInstance, opts: { service: ValidationService }) {
  const { service } = opts;

  app.get('/v1/products', async () => {
    return { products: service.catalog.list().map(toPublicProduct) };
  });

  // Runs synchronously: the response carries the finished report
  app.post('/v1/validations', async (req, reply) => {
    const parsed = runValidationBodySchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      return reply
        .status(400)
        .send({ error: { code: 'VALIDATION_ERROR', message: parsed.error.message } });
    }
    try {
      const report = await service.run(parsed.data.products, {
        eventsPerProduct: parsed.data.eventsPerProduct,
      });
      return reply.status(200).send({ report });
    } catch (err) {
      if (err instanceof BoundaryUnreachableError) {
        return reply.status(502).send({
          error: { code: err.code, message: err.message },
          report: err.report,
        });
      }
      throw err;
    }
  });

  app.get('/v1/validations/latest', async (_req, reply) => {
    const report = service.latestReport();
    if (!report) {
      return reply
        .status(404)
        .send({ error: { code: 'NOT_FOUND', message: 'no validation run has completed yet' } });
    }
    return { report };
  });
}
