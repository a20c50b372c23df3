import { and, eq, lte } from 'drizzle-orm';
import type { Db, DbClient } from '../db/client';
import { idempotencyKeys } from '../db/schema';

export interface Reservation {
  /** True when this call took the key. */
  acquired: boolean;
  /** Reference stored under the key (ours when acquired). */
  ref: string;
}

/**
 * Idempotency store: dedup key -> reference, with a TTL.
 * A key is reserved by exactly one caller until it expires.
 */
export class IdempotencyDal {
  constructor(private readonly db: Db) {}

  async reserve(key: string, ref: string, ttlMs: number, now: Date): Promise<Reservation> {
    return this.db.transaction((tx) => this.reserveIn(tx, key, ref, ttlMs, now));
  }

  /**
   * Reserves inside the caller's transaction, so the reservation commits or
   * rolls back together with the row it guards.
   */
  reserveIn(tx: DbClient, key: string, ref: string, ttlMs: number, now: Date): Reservation {
    tx.delete(idempotencyKeys)
      .where(and(eq(idempotencyKeys.key, key), lte(idempotencyKeys.expiresAt, now)))
      .run();

    const inserted = tx
      .insert(idempotencyKeys)
      .values({ key, ref, expiresAt: new Date(now.getTime() + ttlMs) })
      .onConflictDoNothing()
      .run();
    if (inserted.changes === 1) return { acquired: true, ref };

    const existing = tx.select().from(idempotencyKeys).where(eq(idempotencyKeys.key, key)).get();
    return { acquired: false, ref: existing?.ref ?? ref };
  }

  async find(key: string, now: Date): Promise<string | null> {
    const row = this.db.select().from(idempotencyKeys).where(eq(idempotencyKeys.key, key)).get();
    return row && row.expiresAt.getTime() > now.getTime() ? row.ref : null;
  }
}
