import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { entityIdSchema } from '../types/common';
import type { ApiOptions } from './options';

const idParamSchema = z.object({
  id: entityIdSchema,
});

/**
 * Notification request routes.
 * POST answers 201 for a new request and 200 when the dedup key matched an
 * existing one; processing continues in the background either way.
 */
export async function notificationRoutes(
  app: FastifyInstance,
  { container }: ApiOptions,
): Promise<void> {
  const { lifecycle, ledger } = container;

  // POST /notifications
  app.post('/notifications', async (request, reply) => {
    const { request: created, created: isNew } = await lifecycle.submit(request.body);
    return reply.status(isNew ? 201 : 200).send({ request: created, created: isNew });
  });

  // GET /notifications/:id
  app.get('/notifications/:id', async (request, reply) => {
    const params = idParamSchema.safeParse(request.params);
    if (!params.success) {
      return reply.status(400).send({ error: 'invalid_params', message: params.error.message });
    }

    return reply.send({ request: await lifecycle.get(params.data.id) });
  });

  // GET /notifications/:id/attempts
  app.get('/notifications/:id/attempts', async (request, reply) => {
    const params = idParamSchema.safeParse(request.params);
    if (!params.success) {
      return reply.status(400).send({ error: 'invalid_params', message: params.error.message });
    }

    const notification = await lifecycle.get(params.data.id);
    const attempts = await ledger.attemptsByRequest(notification.id);
    return reply.send({ requestId: notification.id, status: notification.status, attempts });
  });

  // POST /notifications/:id/cancel
  app.post('/notifications/:id/cancel', async (request, reply) => {
    const params = idParamSchema.safeParse(request.params);
    if (!params.success) {
      return reply.status(400).send({ error: 'invalid_params', message: params.error.message });
    }

    return reply.send({ request: await lifecycle.cancel(params.data.id) });
  });
}
