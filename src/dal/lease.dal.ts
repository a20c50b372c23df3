import { and, eq } from 'drizzle-orm';
import type { Db } from '../db/client';
import { leases } from '../db/schema';

/**
 * Time-bounded exclusive claims. A lease whose `expiresAt` has passed is free
 * for anyone; the holder can renew or release its own lease only.
 */
export class LeaseDal {
  constructor(private readonly db: Db) {}

  async acquire(key: string, holder: string, ttlMs: number, now: Date): Promise<boolean> {
    const expiresAt = new Date(now.getTime() + ttlMs);

    return this.db.transaction((tx) => {
      const current = tx.select().from(leases).where(eq(leases.key, key)).get();

      if (!current) {
        tx.insert(leases).values({ key, holder, expiresAt }).run();
        return true;
      }
      if (current.holder !== holder && current.expiresAt.getTime() > now.getTime()) {
        return false;
      }
      tx.update(leases).set({ holder, expiresAt }).where(eq(leases.key, key)).run();
      return true;
    });
  }

  /** False when the lease was lost (expired and taken by another holder). */
  async renew(key: string, holder: string, ttlMs: number, now: Date): Promise<boolean> {
    const result = this.db
      .update(leases)
      .set({ expiresAt: new Date(now.getTime() + ttlMs) })
      .where(and(eq(leases.key, key), eq(leases.holder, holder)))
      .run();
    return result.changes > 0;
  }

  async release(key: string, holder: string): Promise<void> {
    this.db
      .delete(leases)
      .where(and(eq(leases.key, key), eq(leases.holder, holder)))
      .run();
  }
}
