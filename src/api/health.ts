import type { FastifyInstance } from 'fastify';
import { sql } from 'drizzle-orm';
import { errorMessage } from '../domain/errors';
import type { ApiOptions } from './options';

/**
 * GET /health — liveness/readiness probe.
 * Answers 503 when the database cannot be queried.
 */
export async function healthRoutes(app: FastifyInstance, { container }: ApiOptions): Promise<void> {
  app.get('/health', async (request, reply) => {
    const timestamp = new Date().toISOString();
    try {
      container.db.get(sql`select 1`);
      return reply.send({ ok: true, database: 'up', timestamp });
    } catch (err) {
      request.log.error({ err: errorMessage(err) }, 'Health check failed');
      return reply.status(503).send({ ok: false, database: 'down', timestamp });
    }
  });
}
