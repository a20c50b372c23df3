import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { DispatchConfig } from '@/config/dispatch';
import { ValidationError } from '@/domain/errors';
import type { NotificationRequest } from '@/domain/notification-request';
import type { RenderedMessage } from '@/domain/template';
import { DispatchService } from '@/services/dispatch.service';
import { AbortError } from '@/utils/backoff';
import { FakeGateway } from '../../helpers/fakes';
import { createTestContext, type TestContext } from '../../helpers/container';

const message: RenderedMessage = {
  subject: 'Order A-100',
  body: 'Your order A-100 is confirmed.',
  templateId: 'tpl-1',
  templateVersion: 1,
};

const config: DispatchConfig = {
  maxAttempts: 3,
  baseDelayMs: 100,
  maxDelayMs: 1000,
  gatewayTimeoutMs: 1000,
  leaseTtlMs: 30_000,
  idempotencyTtlMs: 60_000,
  deliveryStrategy: 'fallback',
  receiptWaitMs: 60 * 60_000,
  reservationReadAttempts: 1,
  reservationReadDelayMs: 0,
  reconcileMaxConflicts: 1,
};

describe('DispatchService', () => {
  let ctx: TestContext;
  let request: NotificationRequest;

  async function createRequest(context: TestContext): Promise<NotificationRequest> {
    const { request: created } = await context.container.lifecycle.create({
      type: 'OrderConfirmed',
      payload: { orderId: 'A-100' },
      recipients: [{ userId: 'user-1', email: 'ana@example.com', phone: '+15551234567' }],
      channelPreferences: ['Email', 'SMS'],
      dedupKey: 'order-A-100',
    });
    return created;
  }

  function recipient() {
    const first = request.recipients[0];
    if (!first) throw new Error('request has no recipient');
    return first;
  }

  async function setup(overrides: Parameters<typeof createTestContext>[0] = {}): Promise<void> {
    ctx = createTestContext(overrides);
    request = await createRequest(ctx);
  }

  afterEach(() => {
    ctx.container.close();
  });

  describe('with default gateways', () => {
    beforeEach(async () => {
      await setup();
    });

    it('marks a provider without receipts Delivered after one call', async () => {
      const outcome = await ctx.container.dispatcher.dispatch({ request, recipient: recipient(), channel: 'Email', message });

      expect(outcome.status).toBe('Delivered');
      expect(outcome.log.providerMessageId).toBe('email-msg-1');
      expect(outcome.log.attempts.map((a) => a.status)).toEqual(['Delivered']);
      expect(ctx.gateways.Email.sent).toEqual([
        {
          address: 'ana@example.com',
          message: {
            requestId: request.id,
            correlationId: request.correlationId,
            recipientId: 'user-1',
            subject: 'Order A-100',
            body: 'Your order A-100 is confirmed.',
          },
        },
      ]);
    });

    it('leaves a provider with receipts at Sent', async () => {
      const outcome = await ctx.container.dispatcher.dispatch({ request, recipient: recipient(), channel: 'SMS', message });
      expect(outcome.status).toBe('Sent');
    });

    it('returns the settled log without calling the gateway again', async () => {
      const { dispatcher } = ctx.container;
      await dispatcher.dispatch({ request, recipient: recipient(), channel: 'Email', message });
      const again = await dispatcher.dispatch({ request, recipient: recipient(), channel: 'Email', message });

      expect(again.status).toBe('Delivered');
      expect(ctx.gateways.Email.calls).toBe(1);
      expect(await ctx.container.ledger.logsForRequest(request.id)).toHaveLength(1);
    });

    it('rejects a channel the recipient has no address for', async () => {
      await expect(
        ctx.container.dispatcher.dispatch({ request, recipient: recipient(), channel: 'Push', message }),
      ).rejects.toThrow(ValidationError);
    });

    it('yields when another holder owns the dispatch lease', async () => {
      const key = `dispatch:${request.id}:Email:ana@example.com`;
      await ctx.container.dals.leases.acquire(key, 'other-worker', 30_000, ctx.clock.now());

      const outcome = await ctx.container.dispatcher.dispatch({ request, recipient: recipient(), channel: 'Email', message });

      expect(outcome.status).toBe('InFlight');
      expect(outcome.log.currentStatus).toBe('QueuedForDispatch');
      expect(ctx.gateways.Email.calls).toBe(0);
    });

    it('records a cancellation before the first attempt', async () => {
      const controller = new AbortController();
      controller.abort();

      const outcome = await ctx.container.dispatcher.dispatch({
        request,
        recipient: recipient(),
        channel: 'Email',
        message,
        signal: controller.signal,
      });

      expect(outcome.status).toBe('Failed');
      expect(outcome.log.failureReason).toBe('canceled');
      expect(ctx.gateways.Email.calls).toBe(0);
    });
  });

  it('retries a transient failure up to maxAttempts with exponential backoff', async () => {
    await setup({ gateways: { Email: new FakeGateway('Email', { fallback: 'transient' }) } });

    const outcome = await ctx.container.dispatcher.dispatch({ request, recipient: recipient(), channel: 'Email', message });

    expect(outcome.status).toBe('Failed');
    expect(ctx.gateways.Email.calls).toBe(3);
    expect(ctx.delays).toEqual([100, 200]);
    expect(outcome.log.attempts.map((a) => a.status)).toEqual(['Retrying', 'Retrying', 'Failed']);
    expect(outcome.log.failureReason).toBe('retries exhausted after 3 attempts: FakeEmail unavailable');
  });

  it('succeeds on a retry after a transient failure', async () => {
    await setup({ gateways: { Email: new FakeGateway('Email', { steps: ['transient'] }) } });

    const outcome = await ctx.container.dispatcher.dispatch({ request, recipient: recipient(), channel: 'Email', message });

    expect(outcome.status).toBe('Delivered');
    expect(outcome.log.attempts.map((a) => a.status)).toEqual(['Retrying', 'Delivered']);
    expect(outcome.log.failureReason).toBeNull();
    expect(ctx.delays).toEqual([100]);
  });

  it('fails a permanent error after exactly one attempt', async () => {
    await setup({ gateways: { Email: new FakeGateway('Email', { fallback: 'permanent' }) } });

    const outcome = await ctx.container.dispatcher.dispatch({ request, recipient: recipient(), channel: 'Email', message });

    expect(outcome.status).toBe('Failed');
    expect(ctx.gateways.Email.calls).toBe(1);
    expect(ctx.delays).toEqual([]);
    expect(outcome.log.failureReason).toBe('FakeEmail rejected ana@example.com');
  });

  it('caps the backoff delay', async () => {
    await setup({
      gateways: { Email: new FakeGateway('Email', { fallback: 'transient' }) },
      dispatch: { maxAttempts: 6, baseDelayMs: 400, maxDelayMs: 1000 },
    });

    await ctx.container.dispatcher.dispatch({ request, recipient: recipient(), channel: 'Email', message });

    expect(ctx.delays).toEqual([400, 800, 1000, 1000, 1000]);
  });

  it('retries a call that outlives the gateway timeout', async () => {
    const email = new FakeGateway('Email', { steps: ['hang'] });
    await setup({ gateways: { Email: email }, dispatch: { gatewayTimeoutMs: 20 } });

    const outcome = await ctx.container.dispatcher.dispatch({ request, recipient: recipient(), channel: 'Email', message });

    expect(outcome.status).toBe('Delivered');
    expect(outcome.log.attempts.map((a) => [a.status, a.failureReason])).toEqual([
      ['Retrying', 'Operation timed out after 20ms'],
      ['Delivered', null],
    ]);
    expect(ctx.delays).toEqual([100]);
    email.release();
  });

  it('fails after maxAttempts calls that all time out', async () => {
    const email = new FakeGateway('Email', { fallback: 'hang' });
    await setup({ gateways: { Email: email }, dispatch: { gatewayTimeoutMs: 20 } });

    const outcome = await ctx.container.dispatcher.dispatch({ request, recipient: recipient(), channel: 'Email', message });

    expect(outcome.status).toBe('Failed');
    expect(email.calls).toBe(3);
    expect(outcome.log.attempts.map((a) => a.status)).toEqual(['Retrying', 'Retrying', 'Failed']);
    expect(outcome.log.failureReason).toBe(
      'retries exhausted after 3 attempts: Operation timed out after 20ms',
    );
    email.release();
  });

  it('gives exactly one active sender to concurrent dispatches of the same key', async () => {
    const email = new FakeGateway('Email', { steps: ['hang'] });
    await setup({ gateways: { Email: email } });
    const { dispatcher } = ctx.container;

    const first = dispatcher.dispatch({ request, recipient: recipient(), channel: 'Email', message });
    await vi.waitFor(() => expect(email.calls).toBe(1));

    const second = await dispatcher.dispatch({ request, recipient: recipient(), channel: 'Email', message });
    expect(second.status).toBe('InFlight');

    email.release();
    expect((await first).status).toBe('Delivered');
    expect(email.calls).toBe(1);
    expect(await ctx.container.ledger.logsForRequest(request.id)).toHaveLength(1);
  });

  it('treats a channel without a gateway as a permanent failure', async () => {
    await setup();
    const { ledger, dals } = ctx.container;
    const dispatcher = new DispatchService({
      ledger,
      leases: dals.leases,
      requests: dals.requests,
      gateways: {},
      config,
      clock: ctx.clock.now,
    });

    const outcome = await dispatcher.dispatch({ request, recipient: recipient(), channel: 'SMS', message });

    expect(outcome.status).toBe('Failed');
    expect(outcome.log.failureReason).toBe('no gateway configured for SMS');
  });

  it('stops retrying when aborted during the backoff', async () => {
    await setup({ gateways: { Email: new FakeGateway('Email', { fallback: 'transient' }) } });
    const controller = new AbortController();
    const { ledger, dals } = ctx.container;
    const dispatcher = new DispatchService({
      ledger,
      leases: dals.leases,
      requests: dals.requests,
      gateways: ctx.container.gateways,
      config: { ...config, maxAttempts: 5 },
      clock: ctx.clock.now,
      sleep: async () => {
        controller.abort();
        throw new AbortError();
      },
    });

    const outcome = await dispatcher.dispatch({
      request,
      recipient: recipient(),
      channel: 'Email',
      message,
      signal: controller.signal,
    });

    expect(outcome.status).toBe('Failed');
    expect(outcome.log.failureReason).toBe('canceled');
    expect(outcome.log.attempts.map((a) => a.status)).toEqual(['Retrying', 'Failed']);
    expect(ctx.gateways.Email.calls).toBe(1);
  });
});
