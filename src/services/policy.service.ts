import type { Channel } from '../types/common';
import type { NotificationRequest, Recipient } from '../domain/notification-request';
import {
  isChannelEnabled,
  type DoNotDisturbWindow,
  type UserNotificationPreferences,
} from '../domain/preferences';

export type PolicyDecision =
  | { kind: 'Allow'; channels: Channel[] }
  | { kind: 'Defer'; until: Date }
  | { kind: 'Block'; reason: string };

export interface PolicyContext {
  preferences: UserNotificationPreferences;
  /** Instant the message would go out: max(now, scheduledAt). */
  at: Date;
  /** Successful deliveries of this type to this user inside the frequency window. */
  recentCount: number;
}

const MINUTES_PER_DAY = 24 * 60;
const MS_PER_MINUTE = 60_000;

function parseClock(value: string): number {
  const [h, m] = value.split(':').map(Number);
  return (h ?? 0) * 60 + (m ?? 0);
}

/**
 * If `at` falls inside the window, the instant the window ends; otherwise null.
 * Windows are in the user's local time and may wrap midnight.
 * A window whose start equals its end is empty.
 */
export function doNotDisturbEnd(window: DoNotDisturbWindow, at: Date): Date | null {
  const start = parseClock(window.start);
  const end = parseClock(window.end);
  if (start === end) return null;

  const offsetMs = window.utcOffsetMinutes * MS_PER_MINUTE;
  const local = at.getTime() + offsetMs;
  const dayMs = MINUTES_PER_DAY * MS_PER_MINUTE;
  const localDayStart = local - (((local % dayMs) + dayMs) % dayMs);
  const minute = Math.floor((local - localDayStart) / MS_PER_MINUTE);

  let endDayOffset: number;
  if (start < end) {
    if (minute < start || minute >= end) return null;
    endDayOffset = 0;
  } else {
    if (minute >= start) endDayOffset = 1;
    else if (minute < end) endDayOffset = 0;
    else return null;
  }

  return new Date(localDayStart + endDayOffset * dayMs + end * MS_PER_MINUTE - offsetMs);
}

/**
 * Decides which of the request's channels may be used for one recipient.
 * Pure: everything it needs is in the arguments.
 *
 * Channels are taken in the request's preference order. A channel is dropped
 * when the recipient has no address for it, has opted out of (type, channel),
 * or has hit the frequency limit for the type. It is deferred when `at` falls
 * inside the do-not-disturb window and the request is not High urgency.
 */
export function evaluate(
  request: Pick<NotificationRequest, 'type' | 'channelPreferences' | 'urgency'>,
  recipient: Pick<Recipient, 'id' | 'addresses'>,
  context: PolicyContext,
): PolicyDecision {
  const { preferences, at, recentCount } = context;
  const limit = preferences.frequencyLimits[request.type];
  const overLimit = limit !== undefined && recentCount >= limit.max;
  const dndEnd =
    preferences.doNotDisturb && request.urgency !== 'High'
      ? doNotDisturbEnd(preferences.doNotDisturb, at)
      : null;

  const allowed: Channel[] = [];
  const dropped = new Set<string>();
  let deferred = false;

  for (const channel of request.channelPreferences) {
    if (!recipient.addresses[channel]) {
      dropped.add('no address for preferred channels');
    } else if (!isChannelEnabled(preferences, request.type, channel)) {
      dropped.add('opted out');
    } else if (overLimit) {
      dropped.add('frequency limit reached');
    } else if (dndEnd) {
      deferred = true;
    } else {
      allowed.push(channel);
    }
  }

  if (allowed.length > 0) return { kind: 'Allow', channels: allowed };
  if (deferred && dndEnd) return { kind: 'Defer', until: dndEnd };
  return { kind: 'Block', reason: [...dropped].join('; ') };
}
