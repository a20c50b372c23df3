import { and, asc, countDistinct, eq, gte, inArray, lte } from 'drizzle-orm';
import type { Db } from '../db/client';
import { deliveryAttempts, deliveryLogs } from '../db/schema';
import type { DeliveryAttempt, SentNotificationLog } from '../domain/delivery-log';
import { ConcurrencyConflictError } from '../domain/errors';
import type { DomainEvent, Transition } from '../domain/events';
import type { Channel } from '../types/common';
import type { OutboxDal } from './outbox.dal';

type LogRow = typeof deliveryLogs.$inferSelect;
type AttemptRow = typeof deliveryAttempts.$inferSelect;

function toAttempt(row: AttemptRow): DeliveryAttempt {
  return {
    seq: row.seq,
    kind: row.kind,
    status: row.status,
    failureReason: row.failureReason,
    occurredAt: row.occurredAt,
  };
}

function toLogRow(log: SentNotificationLog): LogRow {
  const { attempts: _attempts, ...row } = log;
  return row;
}

export interface OpenResult {
  log: SentNotificationLog;
  created: boolean;
}

/**
 * Data Access Layer for sent-notification logs and their attempt history.
 * One log per (request, channel, address); attempts are append-only rows.
 */
export class DeliveryLogDal {
  constructor(
    private readonly db: Db,
    private readonly outbox: OutboxDal,
  ) {}

  /**
   * Inserts the log unless one already exists for its dispatch key, in which
   * case the stored log is returned and the opening events are discarded.
   */
  async openOrGet(opened: Transition<SentNotificationLog>): Promise<OpenResult> {
    const log: SentNotificationLog = { ...opened.state, version: 1 };

    const created = this.db.transaction((tx) => {
      const result = tx
        .insert(deliveryLogs)
        .values(toLogRow(log))
        .onConflictDoNothing({
          target: [deliveryLogs.requestId, deliveryLogs.channel, deliveryLogs.address],
        })
        .run();
      if (result.changes === 0) return false;

      this.outbox.append(tx, opened.events);
      return true;
    });

    if (created) return { log, created };

    const existing = await this.findByKey(log.requestId, log.channel, log.address);
    if (!existing) {
      throw new Error(`Delivery log for ${log.requestId}/${log.channel} vanished after conflict`);
    }
    return { log: existing, created: false };
  }

  /**
   * Persists the log header (CAS on version) and appends `newAttempts`.
   * Attempt rows are keyed (logId, seq) so a lost race can never write twice.
   */
  async save(
    log: SentNotificationLog,
    expectedVersion: number,
    newAttempts: DeliveryAttempt[],
    events: DomainEvent[],
  ): Promise<SentNotificationLog> {
    const stored: SentNotificationLog = { ...log, version: expectedVersion + 1 };

    this.db.transaction((tx) => {
      const result = tx
        .update(deliveryLogs)
        .set(toLogRow(stored))
        .where(and(eq(deliveryLogs.id, log.id), eq(deliveryLogs.version, expectedVersion)))
        .run();
      if (result.changes === 0) {
        throw new ConcurrencyConflictError('SentNotificationLog', log.id, expectedVersion);
      }

      if (newAttempts.length > 0) {
        tx.insert(deliveryAttempts)
          .values(newAttempts.map((a) => ({ ...a, logId: log.id })))
          .run();
      }
      this.outbox.append(tx, events);
    });

    return stored;
  }

  async findById(id: string): Promise<SentNotificationLog | null> {
    const row = this.db.select().from(deliveryLogs).where(eq(deliveryLogs.id, id)).get();
    return row ? (await this.withAttempts([row]))[0] ?? null : null;
  }

  async findByKey(
    requestId: string,
    channel: Channel,
    address: string,
  ): Promise<SentNotificationLog | null> {
    const row = this.db
      .select()
      .from(deliveryLogs)
      .where(
        and(
          eq(deliveryLogs.requestId, requestId),
          eq(deliveryLogs.channel, channel),
          eq(deliveryLogs.address, address),
        ),
      )
      .get();
    return row ? (await this.withAttempts([row]))[0] ?? null : null;
  }

  async findByProviderMessageId(providerMessageId: string): Promise<SentNotificationLog | null> {
    const row = this.db
      .select()
      .from(deliveryLogs)
      .where(eq(deliveryLogs.providerMessageId, providerMessageId))
      .get();
    return row ? (await this.withAttempts([row]))[0] ?? null : null;
  }

  async findByRequest(requestId: string): Promise<SentNotificationLog[]> {
    const rows = this.db
      .select()
      .from(deliveryLogs)
      .where(eq(deliveryLogs.requestId, requestId))
      .orderBy(asc(deliveryLogs.createdAt), asc(deliveryLogs.id))
      .all();
    return this.withAttempts(rows);
  }

  async findByAddress(address: string): Promise<SentNotificationLog[]> {
    const rows = this.db
      .select()
      .from(deliveryLogs)
      .where(eq(deliveryLogs.address, address))
      .orderBy(asc(deliveryLogs.createdAt), asc(deliveryLogs.id))
      .all();
    return this.withAttempts(rows);
  }

  /** Failed logs whose last change is at or before `cutoff`. */
  async findFailedBefore(cutoff: Date): Promise<SentNotificationLog[]> {
    const rows = this.db
      .select()
      .from(deliveryLogs)
      .where(and(eq(deliveryLogs.currentStatus, 'Failed'), lte(deliveryLogs.updatedAt, cutoff)))
      .orderBy(asc(deliveryLogs.updatedAt))
      .all();
    return this.withAttempts(rows);
  }

  /**
   * Distinct requests of `notificationType` that reached `recipientId`
   * successfully with an attempt at or after `since`.
   */
  async countRecentSuccesses(
    recipientId: string,
    notificationType: string,
    since: Date,
  ): Promise<number> {
    const row = this.db
      .select({ n: countDistinct(deliveryLogs.requestId) })
      .from(deliveryLogs)
      .innerJoin(deliveryAttempts, eq(deliveryAttempts.logId, deliveryLogs.id))
      .where(
        and(
          eq(deliveryLogs.recipientId, recipientId),
          eq(deliveryLogs.notificationType, notificationType),
          inArray(deliveryAttempts.status, ['Sent', 'Delivered', 'Read']),
          gte(deliveryAttempts.occurredAt, since),
        ),
      )
      .get();
    return row?.n ?? 0;
  }

  private async withAttempts(rows: LogRow[]): Promise<SentNotificationLog[]> {
    if (rows.length === 0) return [];

    const attempts = this.db
      .select()
      .from(deliveryAttempts)
      .where(
        inArray(
          deliveryAttempts.logId,
          rows.map((r) => r.id),
        ),
      )
      .orderBy(asc(deliveryAttempts.logId), asc(deliveryAttempts.seq))
      .all();

    const byLog = new Map<string, DeliveryAttempt[]>();
    for (const a of attempts) {
      const list = byLog.get(a.logId) ?? [];
      list.push(toAttempt(a));
      byLog.set(a.logId, list);
    }

    return rows.map((row) => ({ ...row, attempts: byLog.get(row.id) ?? [] }));
  }
}
