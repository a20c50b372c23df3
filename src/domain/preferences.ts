import type { Channel } from '../types/common';

export interface DoNotDisturbWindow {
  /** Local wall-clock start, "HH:mm". */
  start: string;
  /** Local wall-clock end, "HH:mm". May be earlier than start (wraps midnight). */
  end: string;
  /** Offset of the user's local time from UTC. */
  utcOffsetMinutes: number;
}

export interface FrequencyLimit {
  max: number;
  windowMinutes: number;
}

export interface UserNotificationPreferences {
  userId: string;
  /** (type, channel) pairs the user switched off. Anything absent is enabled. */
  optOuts: Array<{ type: string; channel: Channel }>;
  doNotDisturb: DoNotDisturbWindow | null;
  /** Per notification type. */
  frequencyLimits: Record<string, FrequencyLimit>;
  version: number;
  updatedAt: Date;
}

export function defaultPreferences(userId: string, now: Date): UserNotificationPreferences {
  return {
    userId,
    optOuts: [],
    doNotDisturb: null,
    frequencyLimits: {},
    version: 0,
    updatedAt: now,
  };
}

export function isChannelEnabled(
  prefs: UserNotificationPreferences,
  type: string,
  channel: Channel,
): boolean {
  return !prefs.optOuts.some((o) => o.type === type && o.channel === channel);
}
