import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { publishTemplateSchema } from '../integrations/validation';
import { channelSchema } from '../types/common';
import type { ApiOptions } from './options';

const templateParamSchema = z.object({
  name: z.string().min(1).max(128),
  channel: channelSchema,
});

const versionParamSchema = templateParamSchema.extend({
  version: z.coerce.number().int().positive(),
});

/**
 * Template management: publish new versions, read the Active one, list history.
 */
export async function templateRoutes(app: FastifyInstance, { container }: ApiOptions): Promise<void> {
  const { templates } = container;

  // POST /templates
  app.post('/templates', async (request, reply) => {
    const body = publishTemplateSchema.safeParse(request.body);
    if (!body.success) {
      return reply.status(400).send({ error: 'invalid_body', message: body.error.message });
    }

    return reply.status(201).send({ template: await templates.publish(body.data) });
  });

  // GET /templates/:name/:channel
  app.get('/templates/:name/:channel', async (request, reply) => {
    const params = templateParamSchema.safeParse(request.params);
    if (!params.success) {
      return reply.status(400).send({ error: 'invalid_params', message: params.error.message });
    }

    const template = await templates.resolve(params.data.name, params.data.channel);
    return reply.send({ template });
  });

  // GET /templates/:name/:channel/versions
  app.get('/templates/:name/:channel/versions', async (request, reply) => {
    const params = templateParamSchema.safeParse(request.params);
    if (!params.success) {
      return reply.status(400).send({ error: 'invalid_params', message: params.error.message });
    }

    const versions = await templates.listVersions(params.data.name, params.data.channel);
    return reply.send({ versions });
  });

  // POST /templates/:name/:channel/versions/:version/activate
  app.post('/templates/:name/:channel/versions/:version/activate', async (request, reply) => {
    const params = versionParamSchema.safeParse(request.params);
    if (!params.success) {
      return reply.status(400).send({ error: 'invalid_params', message: params.error.message });
    }

    const { name, channel, version } = params.data;
    return reply.send({ template: await templates.activate(name, channel, version) });
  });
}
