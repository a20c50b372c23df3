import { logger } from '../config/logger';
import type { RelayConfig } from '../config/dispatch';
import type { OutboxDal, OutboxRow } from '../dal/outbox.dal';
import { errorMessage } from '../domain/errors';
import type { IEventBroker, PublishedEvent } from '../integrations/interfaces/event-broker';
import { systemClock, type Clock } from '../types/common';
import { calculateDelay } from '../utils/backoff';

export interface DrainResult {
  published: number;
  failed: number;
}

function toPublishedEvent(row: OutboxRow): PublishedEvent {
  return {
    id: row.eventId,
    type: row.eventType,
    aggregateType: row.aggregateType,
    aggregateId: row.aggregateId,
    correlationId: row.correlationId,
    occurredAt: row.occurredAt.toISOString(),
    payload: row.payload,
  };
}

/**
 * Publishes outbox rows to the broker, oldest first.
 * A row is marked published only after the broker accepted it, so a crash
 * between the two re-publishes it (at-least-once).
 */
export class OutboxRelayService {
  private running = false;
  private pollTimer: NodeJS.Timeout | undefined;
  private pollPromise: Promise<void> | undefined;
  private consecutiveErrors = 0;
  private readonly clock: Clock;

  constructor(
    private readonly outbox: OutboxDal,
    private readonly broker: IEventBroker,
    private readonly config: RelayConfig,
    options: { clock?: Clock } = {},
  ) {
    this.clock = options.clock ?? systemClock;
  }

  /** One cycle: publish every due row in the batch. */
  async drainOnce(): Promise<DrainResult> {
    const rows = await this.outbox.findPending(this.clock(), this.config.batchSize);
    const result: DrainResult = { published: 0, failed: 0 };

    for (const row of rows) {
      try {
        await this.broker.publish(toPublishedEvent(row));
        await this.outbox.markPublished(row.position, this.clock());
        result.published++;
      } catch (err) {
        const attempts = row.attempts + 1;
        const delayMs = calculateDelay(attempts, {
          baseDelayMs: this.config.retryBaseMs,
          maxDelayMs: this.config.retryMaxMs,
        });
        await this.outbox.markFailed(row, errorMessage(err), new Date(this.clock().getTime() + delayMs));
        result.failed++;
        logger.warn(
          { eventId: row.eventId, eventType: row.eventType, attempts, delayMs, err: errorMessage(err) },
          'Outbox publish failed',
        );
      }
    }

    return result;
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    logger.info(
      { pollIntervalMs: this.config.pollIntervalMs, batchSize: this.config.batchSize },
      'Outbox relay started',
    );
    this.pollPromise = this.poll();
  }

  /** Stops polling and waits for the in-flight cycle. */
  async stop(): Promise<void> {
    this.running = false;
    if (this.pollTimer) {
      clearTimeout(this.pollTimer);
      this.pollTimer = undefined;
    }
    if (this.pollPromise) await this.pollPromise;
    logger.info('Outbox relay stopped');
  }

  private async poll(): Promise<void> {
    if (!this.running) return;

    try {
      const { published, failed } = await this.drainOnce();
      if (published > 0 || failed > 0) logger.debug({ published, failed }, 'Outbox cycle');
      this.consecutiveErrors = 0;
    } catch (err) {
      this.consecutiveErrors++;
      logger.error({ err: errorMessage(err), consecutiveErrors: this.consecutiveErrors }, 'Outbox cycle failed');
    }

    this.scheduleNext();
  }

  private scheduleNext(): void {
    if (!this.running) return;
    const delay =
      this.consecutiveErrors === 0
        ? this.config.pollIntervalMs
        : Math.min(this.config.pollIntervalMs * 2 ** this.consecutiveErrors, this.config.retryMaxMs);
    this.pollTimer = setTimeout(() => {
      this.pollPromise = this.poll();
    }, delay);
  }
}
