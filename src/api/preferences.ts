import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { preferencesPatchSchema } from '../integrations/validation';
import { entityIdSchema } from '../types/common';
import type { ApiOptions } from './options';

const userParamSchema = z.object({
  userId: entityIdSchema,
});

export async function preferenceRoutes(app: FastifyInstance, { container }: ApiOptions): Promise<void> {
  const { preferences } = container;

  // GET /users/:userId/preferences
  app.get('/users/:userId/preferences', async (request, reply) => {
    const params = userParamSchema.safeParse(request.params);
    if (!params.success) {
      return reply.status(400).send({ error: 'invalid_params', message: params.error.message });
    }

    return reply.send({ preferences: await preferences.get(params.data.userId) });
  });

  // PUT /users/:userId/preferences
  app.put('/users/:userId/preferences', async (request, reply) => {
    const params = userParamSchema.safeParse(request.params);
    if (!params.success) {
      return reply.status(400).send({ error: 'invalid_params', message: params.error.message });
    }

    const body = preferencesPatchSchema.safeParse(request.body);
    if (!body.success) {
      return reply.status(400).send({ error: 'invalid_body', message: body.error.message });
    }

    return reply.send({ preferences: await preferences.update(params.data.userId, body.data) });
  });
}
