import { v4 as uuid } from 'uuid';
import type { Channel } from '../types/common';

/**
 * Payload of every event the service emits, keyed by event type.
 * Subscribers receive these at least once and must dedupe on `id`.
 */
export interface EventPayloads {
  NotificationRequestedEvent: {
    type: string;
    urgency: string;
    recipientIds: string[];
    channelPreferences: Channel[];
    scheduledAt: string | null;
  };
  NotificationProcessingStartedEvent: { allowedRecipients: number; deferredRecipients: number };
  NotificationReadyToDispatchEvent: { requestId: string; channel: Channel; recipientId: string };
  NotificationDispatchAttemptedEvent: {
    requestId: string;
    channel: Channel;
    attempt: number;
    status: string;
    failureReason: string | null;
  };
  NotificationSentToChannelEvent: {
    requestId: string;
    channel: Channel;
    recipientId: string;
    providerMessageId: string;
  };
  NotificationDeliveredEvent: { requestId: string; channel: Channel; recipientId: string };
  NotificationReadEvent: { requestId: string; channel: Channel; recipientId: string };
  NotificationDeliveryFailedEvent: {
    requestId: string;
    channel: Channel;
    recipientId: string;
    reason: string;
  };
  NotificationFailedEvent: { reason: string };
  NotificationCompletedEvent: { succeededRecipients: number; failedRecipients: number };
  NotificationBlockedEvent: { reason: string };
  NotificationCanceledEvent: Record<string, never>;
  NotificationTemplateVersionCreatedEvent: {
    name: string;
    channel: Channel;
    version: number;
    status: string;
  };
  UserNotificationPreferencesUpdatedEvent: { userId: string; version: number };
}

export type EventType = keyof EventPayloads;

export type AggregateType =
  | 'NotificationRequest'
  | 'SentNotificationLog'
  | 'NotificationTemplate'
  | 'UserNotificationPreferences';

export interface DomainEvent<T extends EventType = EventType> {
  id: string;
  type: T;
  aggregateType: AggregateType;
  aggregateId: string;
  correlationId: string | null;
  occurredAt: Date;
  payload: EventPayloads[T];
}

export type AnyDomainEvent = { [K in EventType]: DomainEvent<K> }[EventType];

export function createEvent<T extends EventType>(
  type: T,
  aggregate: { type: AggregateType; id: string; correlationId?: string | null },
  payload: EventPayloads[T],
  occurredAt: Date,
): DomainEvent<T> {
  return {
    id: uuid(),
    type,
    aggregateType: aggregate.type,
    aggregateId: aggregate.id,
    correlationId: aggregate.correlationId ?? null,
    occurredAt,
    payload,
  };
}

/** A state transition: the new aggregate plus the events it produced. */
export interface Transition<T> {
  state: T;
  events: DomainEvent[];
}
