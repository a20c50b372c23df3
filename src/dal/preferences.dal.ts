import { and, eq } from 'drizzle-orm';
import type { Db } from '../db/client';
import { userPreferences } from '../db/schema';
import { ConcurrencyConflictError } from '../domain/errors';
import type { DomainEvent } from '../domain/events';
import type { UserNotificationPreferences } from '../domain/preferences';
import type { OutboxDal } from './outbox.dal';

export class PreferencesDal {
  constructor(
    private readonly db: Db,
    private readonly outbox: OutboxDal,
  ) {}

  async find(userId: string): Promise<UserNotificationPreferences | null> {
    const row = this.db
      .select()
      .from(userPreferences)
      .where(eq(userPreferences.userId, userId))
      .get();
    return row ?? null;
  }

  /**
   * Upsert guarded by version: `expectedVersion` 0 means "no row yet".
   * Throws ConcurrencyConflictError when another writer got there first.
   */
  async save(
    prefs: UserNotificationPreferences,
    expectedVersion: number,
    events: DomainEvent[],
  ): Promise<UserNotificationPreferences> {
    const stored: UserNotificationPreferences = { ...prefs, version: expectedVersion + 1 };

    this.db.transaction((tx) => {
      const result =
        expectedVersion === 0
          ? tx.insert(userPreferences).values(stored).onConflictDoNothing().run()
          : tx
              .update(userPreferences)
              .set(stored)
              .where(
                and(
                  eq(userPreferences.userId, prefs.userId),
                  eq(userPreferences.version, expectedVersion),
                ),
              )
              .run();

      if (result.changes === 0) {
        throw new ConcurrencyConflictError('UserNotificationPreferences', prefs.userId, expectedVersion);
      }
      this.outbox.append(tx, events);
    });

    return stored;
  }
}
