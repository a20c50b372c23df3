import { v4 as uuid } from 'uuid';
import { logger } from '../config/logger';
import type { DispatchConfig } from '../config/dispatch';
import type { LeaseDal } from '../dal/lease.dal';
import type { NotificationRequestDal } from '../dal/notification-request.dal';
import {
  dispatchAttemptCount,
  isDispatchSettled,
  type LogStatus,
  type SentNotificationLog,
} from '../domain/delivery-log';
import { errorMessage, PermanentGatewayError, ValidationError } from '../domain/errors';
import type { NotificationRequest, Recipient } from '../domain/notification-request';
import type { RenderedMessage } from '../domain/template';
import type { GatewayRegistry, IChannelGateway } from '../integrations/interfaces/channel-gateway';
import { startTimer } from '../telemetry/timing';
import { systemClock, type Channel, type Clock } from '../types/common';
import { AbortError, calculateDelay, sleep as defaultSleep, type Sleep } from '../utils/backoff';
import { withTimeout } from '../utils/timeout';
import type { DeliveryLedgerService } from './delivery-ledger.service';

export type DispatchStatus = Exclude<LogStatus, 'QueuedForDispatch'> | 'InFlight';

export interface DispatchOutcome {
  /** `InFlight`: another caller holds the lease; `log` is what it has written so far. */
  status: DispatchStatus;
  log: SentNotificationLog;
}

export interface DispatchInput {
  request: NotificationRequest;
  recipient: Recipient;
  channel: Channel;
  message: RenderedMessage;
  /** Aborting skips the remaining retries; a call already in flight finishes. */
  signal?: AbortSignal;
}

export interface DispatchServiceDeps {
  ledger: DeliveryLedgerService;
  leases: LeaseDal;
  requests: NotificationRequestDal;
  gateways: GatewayRegistry;
  config: DispatchConfig;
  clock?: Clock;
  sleep?: Sleep;
  random?: () => number;
}

type AttemptResult =
  | { kind: 'success'; providerMessageId: string }
  | { kind: 'permanent'; reason: string }
  | { kind: 'transient'; reason: string };

export const CANCELED_REASON = 'canceled';

function settled(log: SentNotificationLog): DispatchOutcome {
  const status = log.currentStatus === 'QueuedForDispatch' ? 'InFlight' : log.currentStatus;
  return { status, log };
}

/**
 * Sends one rendered message to one recipient address on one channel,
 * retrying transient failures with backoff.
 *
 * The (request, channel, address) key has a single delivery log and at most
 * one active sender: the log is insert-or-get and gateway calls happen only
 * under a lease on the key.
 */
export class DispatchService {
  private readonly clock: Clock;
  private readonly sleep: Sleep;
  private readonly random: () => number;

  constructor(private readonly deps: DispatchServiceDeps) {
    this.clock = deps.clock ?? systemClock;
    this.sleep = deps.sleep ?? defaultSleep;
    this.random = deps.random ?? Math.random;
  }

  async dispatch(input: DispatchInput): Promise<DispatchOutcome> {
    const { request, recipient, channel } = input;
    const address = recipient.addresses[channel];
    if (!address) {
      throw new ValidationError(`Recipient ${recipient.id} has no ${channel} address`);
    }

    const timer = startTimer('service.dispatch');
    try {
      const { log } = await this.deps.ledger.open({
        requestId: request.id,
        correlationId: request.correlationId,
        recipientId: recipient.id,
        notificationType: request.type,
        channel,
        address,
      });
      if (isDispatchSettled(log.currentStatus)) return settled(log);

      const leaseKey = `dispatch:${request.id}:${channel}:${address}`;
      const holder = uuid();
      const { leaseTtlMs } = this.deps.config;

      if (!(await this.deps.leases.acquire(leaseKey, holder, leaseTtlMs, this.clock()))) {
        logger.debug({ requestId: request.id, channel, address }, 'Dispatch already in flight');
        return { status: 'InFlight', log: (await this.deps.ledger.findById(log.id)) ?? log };
      }

      try {
        // Re-read under the lease: a previous holder may have finished meanwhile.
        const current = (await this.deps.ledger.findById(log.id)) ?? log;
        if (isDispatchSettled(current.currentStatus)) return settled(current);

        return await this.attemptUntilSettled(input, current, address, leaseKey, holder);
      } finally {
        await this.deps.leases.release(leaseKey, holder);
      }
    } finally {
      timer.stop();
    }
  }

  private async attemptUntilSettled(
    input: DispatchInput,
    opened: SentNotificationLog,
    address: string,
    leaseKey: string,
    holder: string,
  ): Promise<DispatchOutcome> {
    const { ledger, leases, config } = this.deps;
    const { request, channel } = input;
    const gateway = this.deps.gateways[channel];
    let log = opened;

    for (;;) {
      const attempt = dispatchAttemptCount(log) + 1;

      if (await this.isCanceled(request.id, input.signal)) {
        logger.info({ requestId: request.id, channel, attempt }, 'Dispatch canceled before attempt');
        log = await ledger.recordAttempt(log, {
          kind: 'dispatch',
          status: 'Failed',
          failureReason: CANCELED_REASON,
        });
        return settled(log);
      }

      if (!(await leases.renew(leaseKey, holder, config.leaseTtlMs, this.clock()))) {
        logger.warn({ requestId: request.id, channel }, 'Dispatch lease lost; yielding');
        return { status: 'InFlight', log };
      }

      const result = await this.callGateway(gateway, input, address);

      if (result.kind === 'success') {
        const status = gateway?.supportsDeliveryReceipts ? 'Sent' : 'Delivered';
        log = await ledger.recordAttempt(log, {
          kind: 'dispatch',
          status,
          providerMessageId: result.providerMessageId,
        });
        return settled(log);
      }

      if (result.kind === 'permanent') {
        logger.warn({ requestId: request.id, channel, reason: result.reason }, 'Permanent delivery failure');
        log = await ledger.recordAttempt(log, {
          kind: 'dispatch',
          status: 'Failed',
          failureReason: result.reason,
        });
        return settled(log);
      }

      if (attempt >= config.maxAttempts) {
        logger.warn(
          { requestId: request.id, channel, attempts: attempt, reason: result.reason },
          'Delivery retries exhausted',
        );
        log = await ledger.recordAttempt(log, {
          kind: 'dispatch',
          status: 'Failed',
          failureReason: `retries exhausted after ${attempt} attempts: ${result.reason}`,
        });
        return settled(log);
      }

      log = await ledger.recordAttempt(log, {
        kind: 'dispatch',
        status: 'Retrying',
        failureReason: result.reason,
      });

      const delayMs = calculateDelay(
        attempt,
        { baseDelayMs: config.baseDelayMs, maxDelayMs: config.maxDelayMs },
        this.random,
      );
      logger.debug({ requestId: request.id, channel, attempt, delayMs }, 'Retrying delivery');

      try {
        await this.sleep(delayMs, input.signal);
      } catch (err) {
        // Aborted: the cancellation check at the top of the loop records it.
        if (!(err instanceof AbortError)) throw err;
      }
    }
  }

  private async callGateway(
    gateway: IChannelGateway | undefined,
    input: DispatchInput,
    address: string,
  ): Promise<AttemptResult> {
    if (!gateway) {
      return { kind: 'permanent', reason: `no gateway configured for ${input.channel}` };
    }

    try {
      const { providerMessageId } = await withTimeout(
        gateway.send(
          {
            requestId: input.request.id,
            correlationId: input.request.correlationId,
            recipientId: input.recipient.id,
            subject: input.message.subject,
            body: input.message.body,
          },
          address,
        ),
        this.deps.config.gatewayTimeoutMs,
      );
      return { kind: 'success', providerMessageId };
    } catch (err) {
      if (err instanceof PermanentGatewayError) {
        return { kind: 'permanent', reason: err.message };
      }
      return { kind: 'transient', reason: errorMessage(err) };
    }
  }

  private async isCanceled(requestId: string, signal?: AbortSignal): Promise<boolean> {
    if (signal?.aborted) return true;
    const current = await this.deps.requests.findById(requestId);
    if (!current) return false;
    return current.cancelRequestedAt !== null || current.status === 'Canceled';
  }
}
