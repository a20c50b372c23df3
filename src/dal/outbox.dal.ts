import { and, asc, eq, isNull, lte } from 'drizzle-orm';
import type { DbClient } from '../db/client';
import { outbox } from '../db/schema';
import type { DomainEvent } from '../domain/events';

export type OutboxRow = typeof outbox.$inferSelect;

/**
 * Data Access Layer for the outbox table.
 * Every domain event is written here in the same transaction as the state
 * change that produced it. The outbox relay publishes the rows later.
 */
export class OutboxDal {
  constructor(private readonly db: DbClient) {}

  /** Call inside the caller's transaction so the rows commit with the mutation. */
  append(tx: DbClient, events: DomainEvent[]): void {
    if (events.length === 0) return;

    tx.insert(outbox)
      .values(
        events.map((event) => ({
          eventId: event.id,
          aggregateType: event.aggregateType,
          aggregateId: event.aggregateId,
          eventType: event.type,
          correlationId: event.correlationId,
          payload: event.payload,
          occurredAt: event.occurredAt,
          publishedAt: null,
          attempts: 0,
          nextAttemptAt: event.occurredAt,
          lastError: null,
        })),
      )
      .run();
  }

  /** Unpublished rows that are due, oldest first. */
  async findPending(now: Date, limit = 50): Promise<OutboxRow[]> {
    return this.db
      .select()
      .from(outbox)
      .where(and(isNull(outbox.publishedAt), lte(outbox.nextAttemptAt, now)))
      .orderBy(asc(outbox.position))
      .limit(limit)
      .all();
  }

  async findByAggregate(aggregateId: string): Promise<OutboxRow[]> {
    return this.db
      .select()
      .from(outbox)
      .where(eq(outbox.aggregateId, aggregateId))
      .orderBy(asc(outbox.position))
      .all();
  }

  async findAll(): Promise<OutboxRow[]> {
    return this.db.select().from(outbox).orderBy(asc(outbox.position)).all();
  }

  async markPublished(position: number, publishedAt: Date): Promise<void> {
    this.db
      .update(outbox)
      .set({ publishedAt, lastError: null })
      .where(eq(outbox.position, position))
      .run();
  }

  async markFailed(row: OutboxRow, error: string, nextAttemptAt: Date): Promise<void> {
    this.db
      .update(outbox)
      .set({ attempts: row.attempts + 1, lastError: error, nextAttemptAt })
      .where(eq(outbox.position, row.position))
      .run();
  }
}
