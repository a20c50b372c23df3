import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import fp from 'fastify-plugin';
import { v4 as uuid } from 'uuid';

declare module 'fastify' {
  interface FastifyRequest {
    requestId: string;
  }
}

export const REQUEST_ID_HEADER = 'x-request-id';

/**
 * Fastify plugin: attaches a request id to every request (the caller's
 * x-request-id when given), echoes it on the response, and logs
 * api.request.start / api.request.end with route, status code and duration.
 */
async function requestContextPlugin(app: FastifyInstance): Promise<void> {
  app.decorateRequest('requestId', '');

  app.addHook('onRequest', async (request: FastifyRequest, reply: FastifyReply) => {
    const header = request.headers[REQUEST_ID_HEADER];
    request.requestId = typeof header === 'string' && header.length > 0 ? header : uuid();
    void reply.header(REQUEST_ID_HEADER, request.requestId);
  });

  app.addHook('preHandler', async (request: FastifyRequest) => {
    request.log.info(
      {
        requestId: request.requestId,
        route: request.routeOptions.url ?? request.url,
        method: request.method,
      },
      'api.request.start',
    );
  });

  app.addHook('onResponse', async (request: FastifyRequest, reply: FastifyReply) => {
    request.log.info(
      {
        requestId: request.requestId,
        route: request.routeOptions.url ?? request.url,
        method: request.method,
        statusCode: reply.statusCode,
        durationMs: Math.round(reply.elapsedTime),
      },
      'api.request.end',
    );
  });
}

export default fp(requestContextPlugin, {
  name: 'request-context',
});
