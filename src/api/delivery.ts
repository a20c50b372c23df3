import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { deliveryReceiptSchema } from '../integrations/validation';
import type { ApiOptions } from './options';

const addressQuerySchema = z.object({
  address: z.string().min(1).max(4096),
});

const failedQuerySchema = z.object({
  olderThanMinutes: z.coerce.number().int().min(0).default(0),
});

/**
 * Delivery receipts from providers and delivery-log queries.
 */
export async function deliveryRoutes(app: FastifyInstance, { container }: ApiOptions): Promise<void> {
  const { ledger, lifecycle } = container;

  // POST /delivery-receipts
  app.post('/delivery-receipts', async (request, reply) => {
    const body = deliveryReceiptSchema.safeParse(request.body);
    if (!body.success) {
      return reply.status(400).send({ error: 'invalid_body', message: body.error.message });
    }

    const result = await lifecycle.applyReceipt(body.data);
    if (!result.applied && result.reason === 'unknown_message') {
      return reply.status(404).send({
        error: 'unknown_message',
        message: `No delivery log for provider message '${body.data.providerMessageId}'`,
      });
    }
    if (!result.applied) {
      return reply.send({ applied: false, reason: result.reason, log: result.log });
    }
    return reply.send({ applied: true, log: result.log });
  });

  // GET /delivery-logs?address=
  app.get('/delivery-logs', async (request, reply) => {
    const query = addressQuerySchema.safeParse(request.query);
    if (!query.success) {
      return reply.status(400).send({ error: 'invalid_query', message: query.error.message });
    }

    return reply.send({ logs: await ledger.logsByRecipientAddress(query.data.address) });
  });

  // GET /delivery-logs/failed?olderThanMinutes=
  app.get('/delivery-logs/failed', async (request, reply) => {
    const query = failedQuerySchema.safeParse(request.query);
    if (!query.success) {
      return reply.status(400).send({ error: 'invalid_query', message: query.error.message });
    }

    const logs = await ledger.failedLogsOlderThan(query.data.olderThanMinutes * 60_000);
    return reply.send({ logs });
  });
}
