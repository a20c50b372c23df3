import { and, eq, isNull, lte, or, asc } from 'drizzle-orm';
import type { Db, DbClient } from '../db/client';
import { notificationRequests, type StoredRecipient } from '../db/schema';
import { ConcurrencyConflictError } from '../domain/errors';
import type { DomainEvent } from '../domain/events';
import type { NotificationRequest, Recipient } from '../domain/notification-request';
import type { OutboxDal } from './outbox.dal';

type RequestRow = typeof notificationRequests.$inferSelect;
type RequestInsert = typeof notificationRequests.$inferInsert;

function toStoredRecipient(r: Recipient): StoredRecipient {
  return { ...r, deferredUntil: r.deferredUntil?.toISOString() ?? null };
}

function toRecipient(r: StoredRecipient): Recipient {
  return { ...r, deferredUntil: r.deferredUntil ? new Date(r.deferredUntil) : null };
}

function toRequest({ lastPickedAt: _lastPickedAt, ...row }: RequestRow): NotificationRequest {
  return { ...row, recipients: row.recipients.map(toRecipient) };
}

/** Leaves `lastPickedAt` alone: aggregate saves never touch it. */
function toRow(request: NotificationRequest): RequestInsert {
  return { ...request, recipients: request.recipients.map(toStoredRecipient) };
}

/**
 * Data Access Layer for notification requests.
 * Writes are compare-and-swap on `version` and carry their events into the
 * outbox in the same transaction.
 */
export class NotificationRequestDal {
  constructor(
    private readonly db: Db,
    private readonly outbox: OutboxDal,
  ) {}

  /**
   * Inserts the request only when `reserve` takes its dedup key, in one
   * transaction. Returns null when the key was already taken.
   */
  async insertReserved(
    request: NotificationRequest,
    events: DomainEvent[],
    reserve: (tx: DbClient) => boolean,
  ): Promise<NotificationRequest | null> {
    const stored: NotificationRequest = { ...request, version: 1 };

    const inserted = this.db.transaction((tx) => {
      if (!reserve(tx)) return false;
      tx.insert(notificationRequests).values(toRow(stored)).run();
      this.outbox.append(tx, events);
      return true;
    });

    return inserted ? stored : null;
  }

  /**
   * Persists `request` only if the stored row is still at `expectedVersion`.
   * Throws ConcurrencyConflictError otherwise; the caller reloads and retries.
   */
  async save(
    request: NotificationRequest,
    expectedVersion: number,
    events: DomainEvent[] = [],
  ): Promise<NotificationRequest> {
    const stored: NotificationRequest = { ...request, version: expectedVersion + 1 };

    this.db.transaction((tx) => {
      const result = tx
        .update(notificationRequests)
        .set(toRow(stored))
        .where(
          and(
            eq(notificationRequests.id, request.id),
            eq(notificationRequests.version, expectedVersion),
          ),
        )
        .run();

      if (result.changes === 0) {
        throw new ConcurrencyConflictError('NotificationRequest', request.id, expectedVersion);
      }
      this.outbox.append(tx, events);
    });

    return stored;
  }

  async findById(id: string): Promise<NotificationRequest | null> {
    const row = this.db
      .select()
      .from(notificationRequests)
      .where(eq(notificationRequests.id, id))
      .get();
    return row ? toRequest(row) : null;
  }

  async findByDedupKey(dedupKey: string): Promise<NotificationRequest | null> {
    const row = this.db
      .select()
      .from(notificationRequests)
      .where(eq(notificationRequests.dedupKey, dedupKey))
      .get();
    return row ? toRequest(row) : null;
  }

  /**
   * Requests the due-request worker should process:
   * - Pending or Processing with `deferredUntil` reached;
   * - Pending or Processing with nothing deferred that has not moved since
   *   `staleBefore` (the process that owned it stopped mid-way), unless the
   *   worker already took it up after `staleBefore`.
   */
  async findDue(now: Date, staleBefore: Date, limit = 50): Promise<NotificationRequest[]> {
    const open = or(
      eq(notificationRequests.status, 'Pending'),
      eq(notificationRequests.status, 'Processing'),
    );

    const rows = this.db
      .select()
      .from(notificationRequests)
      .where(
        and(
          open,
          or(
            lte(notificationRequests.deferredUntil, now),
            and(
              isNull(notificationRequests.deferredUntil),
              lte(notificationRequests.updatedAt, staleBefore),
              or(
                isNull(notificationRequests.lastPickedAt),
                lte(notificationRequests.lastPickedAt, staleBefore),
              ),
            ),
          ),
        ),
      )
      .orderBy(asc(notificationRequests.createdAt))
      .limit(limit)
      .all();

    return rows.map(toRequest);
  }

  /** Stamps the worker's pickup without bumping the version. */
  async markPicked(id: string, now: Date): Promise<void> {
    this.db
      .update(notificationRequests)
      .set({ lastPickedAt: now })
      .where(eq(notificationRequests.id, id))
      .run();
  }
}
