import { v4 as uuid } from 'uuid';
import { logger } from '../config/logger';
import type { DeliveryLogDal, OpenResult } from '../dal/delivery-log.dal';
import {
  appendAttempt,
  canProgress,
  newLog,
  type AppendAttemptInput,
  type DeliveryAttempt,
  type OpenLogInput,
  type SentNotificationLog,
} from '../domain/delivery-log';
import { ConcurrencyConflictError } from '../domain/errors';
import { systemClock, type Channel, type Clock } from '../types/common';

export interface AttemptRecord extends DeliveryAttempt {
  logId: string;
  recipientId: string;
  channel: Channel;
  address: string;
}

export interface ReceiptInput {
  providerMessageId: string;
  status: 'Delivered' | 'Read' | 'Failed';
  reason?: string;
  occurredAt?: Date;
}

export type ReceiptResult =
  | { applied: true; log: SentNotificationLog }
  | { applied: false; reason: 'unknown_message' }
  | { applied: false; reason: 'stale'; log: SentNotificationLog };

const RECEIPT_MAX_CONFLICTS = 5;

/**
 * Owns the SentNotificationLog aggregate: opening logs, appending attempts
 * and answering delivery-history queries.
 */
export class DeliveryLedgerService {
  private readonly clock: Clock;

  constructor(
    private readonly logs: DeliveryLogDal,
    options: { clock?: Clock } = {},
  ) {
    this.clock = options.clock ?? systemClock;
  }

  /** Insert-or-get on (request, channel, address). */
  async open(input: OpenLogInput): Promise<OpenResult> {
    return this.logs.openOrGet(newLog(uuid(), input, this.clock()));
  }

  async findById(id: string): Promise<SentNotificationLog | null> {
    return this.logs.findById(id);
  }

  /** Appends one attempt. Throws ConcurrencyConflictError if `log` is stale. */
  async recordAttempt(
    log: SentNotificationLog,
    input: AppendAttemptInput,
    at: Date = this.clock(),
  ): Promise<SentNotificationLog> {
    const { state, events } = appendAttempt(log, input, at);
    const added = state.attempts.slice(log.attempts.length);
    return this.logs.save(state, log.version, added, events);
  }

  /**
   * Applies an asynchronous provider callback. A receipt that would move a
   * log backwards (or out of a terminal status) is ignored and reported
   * as stale, so duplicate callbacks are harmless.
   */
  async recordReceipt(input: ReceiptInput): Promise<ReceiptResult> {
    for (let conflicts = 0; ; conflicts++) {
      const log = await this.logs.findByProviderMessageId(input.providerMessageId);
      if (!log) return { applied: false, reason: 'unknown_message' };

      if (!canProgress(log.currentStatus, input.status)) {
        logger.info(
          { logId: log.id, currentStatus: log.currentStatus, receipt: input.status },
          'Stale delivery receipt ignored',
        );
        return { applied: false, reason: 'stale', log };
      }

      try {
        const updated = await this.recordAttempt(
          log,
          { kind: 'receipt', status: input.status, failureReason: input.reason ?? null },
          input.occurredAt ?? this.clock(),
        );
        return { applied: true, log: updated };
      } catch (err) {
        if (!(err instanceof ConcurrencyConflictError) || conflicts >= RECEIPT_MAX_CONFLICTS) throw err;
      }
    }
  }

  async logsForRequest(requestId: string): Promise<SentNotificationLog[]> {
    return this.logs.findByRequest(requestId);
  }

  /** Every attempt of every log of the request, in time order. */
  async attemptsByRequest(requestId: string): Promise<AttemptRecord[]> {
    const logs = await this.logs.findByRequest(requestId);
    return logs
      .flatMap((log) =>
        log.attempts.map((attempt) => ({
          ...attempt,
          logId: log.id,
          recipientId: log.recipientId,
          channel: log.channel,
          address: log.address,
        })),
      )
      .sort((a, b) => a.occurredAt.getTime() - b.occurredAt.getTime());
  }

  async logsByRecipientAddress(address: string): Promise<SentNotificationLog[]> {
    return this.logs.findByAddress(address);
  }

  /** Failed logs that have not changed for at least `durationMs`. */
  async failedLogsOlderThan(durationMs: number): Promise<SentNotificationLog[]> {
    return this.logs.findFailedBefore(new Date(this.clock().getTime() - durationMs));
  }

  async countRecentSuccesses(
    recipientId: string,
    notificationType: string,
    windowMinutes: number,
    at: Date = this.clock(),
  ): Promise<number> {
    const since = new Date(at.getTime() - windowMinutes * 60_000);
    return this.logs.countRecentSuccesses(recipientId, notificationType, since);
  }
}
