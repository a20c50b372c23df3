import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createTestContext, seedTemplates, type TestContext } from '../../helpers/container';

describe('OutboxRelayService', () => {
  let ctx: TestContext;

  beforeEach(() => {
    ctx = createTestContext();
  });

  afterEach(() => {
    ctx.container.close();
  });

  async function createRequest(dedupKey = 'order-A-100') {
    const { request } = await ctx.container.lifecycle.create({
      type: 'OrderConfirmed',
      payload: { orderId: 'A-100' },
      recipients: [{ userId: 'user-1', email: 'ana@example.com' }],
      channelPreferences: ['Email'],
      correlationId: 'corr-1',
      dedupKey,
    });
    return request;
  }

  it('publishes pending rows once and marks them published', async () => {
    const request = await createRequest();

    expect(await ctx.container.relay.drainOnce()).toEqual({ published: 1, failed: 0 });
    expect(await ctx.container.relay.drainOnce()).toEqual({ published: 0, failed: 0 });

    const [event] = ctx.broker.published;
    expect(event).toMatchObject({
      type: 'NotificationRequestedEvent',
      aggregateType: 'NotificationRequest',
      aggregateId: request.id,
      correlationId: 'corr-1',
      occurredAt: '2026-03-02T12:00:00.000Z',
    });

    const [row] = await ctx.container.dals.outbox.findByAggregate(request.id);
    expect(row?.publishedAt).toEqual(new Date('2026-03-02T12:00:00.000Z'));
  });

  it('publishes in the order the events were written', async () => {
    await seedTemplates(ctx.container, 'OrderConfirmed');
    const request = await createRequest();
    await ctx.container.lifecycle.process(request.id);

    await ctx.container.relay.drainOnce();

    const written = (await ctx.container.dals.outbox.findAll()).map((r) => r.eventId);
    expect(ctx.broker.published.map((e) => e.id)).toEqual(written);
    expect(ctx.broker.types().filter((t) => t.startsWith('Notification') && !t.includes('Template'))).toEqual([
      'NotificationRequestedEvent',
      'NotificationProcessingStartedEvent',
      'NotificationReadyToDispatchEvent',
      'NotificationDispatchAttemptedEvent',
      'NotificationSentToChannelEvent',
      'NotificationDeliveredEvent',
      'NotificationCompletedEvent',
    ]);
  });

  it('backs off a row the broker rejected and retries it later', async () => {
    const request = await createRequest();
    ctx.broker.failNext = 1;

    expect(await ctx.container.relay.drainOnce()).toEqual({ published: 0, failed: 1 });

    const [row] = await ctx.container.dals.outbox.findByAggregate(request.id);
    expect(row?.attempts).toBe(1);
    expect(row?.lastError).toBe('broker unavailable');
    expect(row?.publishedAt).toBeNull();
    expect(row?.nextAttemptAt.getTime()).toBeGreaterThan(ctx.clock.now().getTime());

    expect(await ctx.container.relay.drainOnce()).toEqual({ published: 0, failed: 0 });

    ctx.clock.advance(2000);
    expect(await ctx.container.relay.drainOnce()).toEqual({ published: 1, failed: 0 });
    expect(ctx.broker.types()).toEqual(['NotificationRequestedEvent']);
  });

  it('keeps later rows flowing when one row fails', async () => {
    await createRequest('k-1');
    await createRequest('k-2');
    ctx.broker.failNext = 1;

    expect(await ctx.container.relay.drainOnce()).toEqual({ published: 1, failed: 1 });
  });

  it('drains on start and waits for the running cycle on stop', async () => {
    await createRequest();

    ctx.container.relay.start();
    await ctx.container.relay.stop();

    expect(ctx.broker.published).toHaveLength(1);
  });
});
