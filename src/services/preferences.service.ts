import { logger } from '../config/logger';
import type { PreferencesDal } from '../dal/preferences.dal';
import { ConcurrencyConflictError, ValidationError } from '../domain/errors';
import { createEvent } from '../domain/events';
import { defaultPreferences, type UserNotificationPreferences } from '../domain/preferences';
import { preferencesPatchSchema, type PreferencesPatchInput } from '../integrations/validation';
import { systemClock, type Clock } from '../types/common';

const MAX_CONFLICTS = 5;

export class PreferencesService {
  private readonly clock: Clock;

  constructor(
    private readonly preferences: PreferencesDal,
    options: { clock?: Clock } = {},
  ) {
    this.clock = options.clock ?? systemClock;
  }

  /** Stored preferences, or the all-enabled defaults when the user has none. */
  async get(userId: string): Promise<UserNotificationPreferences> {
    return (await this.preferences.find(userId)) ?? defaultPreferences(userId, this.clock());
  }

  /** Replaces the fields present in `patch`. */
  async update(userId: string, patch: PreferencesPatchInput): Promise<UserNotificationPreferences> {
    const parsed = preferencesPatchSchema.safeParse(patch);
    if (!parsed.success) {
      throw new ValidationError(
        'Invalid preferences',
        parsed.error.issues.map((i) => ({ path: i.path.join('.'), message: i.message })),
      );
    }

    for (let conflicts = 0; ; conflicts++) {
      const current = await this.get(userId);
      const now = this.clock();
      const next: UserNotificationPreferences = {
        ...current,
        optOuts: parsed.data.optOuts ?? current.optOuts,
        doNotDisturb:
          parsed.data.doNotDisturb === undefined ? current.doNotDisturb : parsed.data.doNotDisturb,
        frequencyLimits: parsed.data.frequencyLimits ?? current.frequencyLimits,
        updatedAt: now,
      };
      const event = createEvent(
        'UserNotificationPreferencesUpdatedEvent',
        { type: 'UserNotificationPreferences', id: userId },
        { userId, version: current.version + 1 },
        now,
      );

      try {
        const saved = await this.preferences.save(next, current.version, [event]);
        logger.info({ userId, version: saved.version }, 'Preferences updated');
        return saved;
      } catch (err) {
        if (!(err instanceof ConcurrencyConflictError) || conflicts >= MAX_CONFLICTS) throw err;
      }
    }
  }
}
