import type { Channel } from '../types/common';
import { InvalidStateTransitionError } from './errors';
import {
  createEvent,
  type DomainEvent,
  type EventPayloads,
  type EventType,
  type Transition,
} from './events';

export const LOG_STATUSES = ['QueuedForDispatch', 'Sent', 'Delivered', 'Read', 'Failed'] as const;
export type LogStatus = (typeof LOG_STATUSES)[number];

/** What a single appended attempt reports. `Retrying` = transient failure. */
export const ATTEMPT_STATUSES = ['Retrying', 'Sent', 'Delivered', 'Read', 'Failed'] as const;
export type AttemptStatus = (typeof ATTEMPT_STATUSES)[number];
export const ATTEMPT_KINDS = ['dispatch', 'receipt'] as const;
export type AttemptKind = (typeof ATTEMPT_KINDS)[number];

// QueuedForDispatch -> QueuedForDispatch is a transient failure awaiting retry.
// Delivered -> Read is the only way out of a terminal status.
const LOG_TRANSITIONS: Record<LogStatus, ReadonlySet<LogStatus>> = {
  QueuedForDispatch: new Set(['QueuedForDispatch', 'Sent', 'Delivered', 'Failed']),
  Sent: new Set(['Delivered', 'Read', 'Failed']),
  Delivered: new Set(['Read']),
  Read: new Set(),
  Failed: new Set(),
};

export function canProgress(from: LogStatus, to: LogStatus): boolean {
  return LOG_TRANSITIONS[from].has(to);
}

export function isTerminalLogStatus(status: LogStatus): boolean {
  return status === 'Delivered' || status === 'Read' || status === 'Failed';
}

/** The dispatch itself has finished (successfully or not); receipts may follow. */
export function isDispatchSettled(status: LogStatus): boolean {
  return status !== 'QueuedForDispatch';
}

/** The provider confirmed the message reached the device. */
export function isConfirmedLogStatus(status: LogStatus): boolean {
  return status === 'Delivered' || status === 'Read';
}

export function logStatusFor(attempt: AttemptStatus): LogStatus {
  return attempt === 'Retrying' ? 'QueuedForDispatch' : attempt;
}

export interface DeliveryAttempt {
  seq: number;
  kind: AttemptKind;
  status: AttemptStatus;
  failureReason: string | null;
  occurredAt: Date;
}

export interface SentNotificationLog {
  id: string;
  requestId: string;
  correlationId: string;
  recipientId: string;
  notificationType: string;
  channel: Channel;
  address: string;
  providerMessageId: string | null;
  currentStatus: LogStatus;
  failureReason: string | null;
  attempts: DeliveryAttempt[];
  version: number;
  createdAt: Date;
  updatedAt: Date;
}

export interface OpenLogInput {
  requestId: string;
  correlationId: string;
  recipientId: string;
  notificationType: string;
  channel: Channel;
  address: string;
}

export interface AppendAttemptInput {
  kind: AttemptKind;
  status: AttemptStatus;
  failureReason?: string | null;
  providerMessageId?: string | null;
}

function logEvent<T extends EventType>(
  log: SentNotificationLog,
  type: T,
  payload: EventPayloads[T],
  at: Date,
): DomainEvent {
  return createEvent(
    type,
    { type: 'SentNotificationLog', id: log.id, correlationId: log.correlationId },
    payload,
    at,
  );
}

export function newLog(id: string, input: OpenLogInput, now: Date): Transition<SentNotificationLog> {
  const log: SentNotificationLog = {
    ...input,
    id,
    providerMessageId: null,
    currentStatus: 'QueuedForDispatch',
    failureReason: null,
    attempts: [],
    version: 0,
    createdAt: now,
    updatedAt: now,
  };

  return {
    state: log,
    events: [
      logEvent(
        log,
        'NotificationReadyToDispatchEvent',
        { requestId: log.requestId, channel: log.channel, recipientId: log.recipientId },
        now,
      ),
    ],
  };
}

export function dispatchAttemptCount(log: SentNotificationLog): number {
  return log.attempts.filter((a) => a.kind === 'dispatch').length;
}

/**
 * Appends one attempt and derives the new status from it.
 * Attempts are stamped strictly after the previous one; a status that would
 * leave a terminal value is rejected.
 */
export function appendAttempt(
  log: SentNotificationLog,
  input: AppendAttemptInput,
  at: Date,
): Transition<SentNotificationLog> {
  const next = logStatusFor(input.status);
  if (!canProgress(log.currentStatus, next)) {
    throw new InvalidStateTransitionError('SentNotificationLog', log.currentStatus, next);
  }

  const last = log.attempts[log.attempts.length - 1];
  const occurredAt =
    last && at.getTime() <= last.occurredAt.getTime() ? new Date(last.occurredAt.getTime() + 1) : at;
  const failureReason = input.failureReason ?? null;

  const attempt: DeliveryAttempt = {
    seq: log.attempts.length + 1,
    kind: input.kind,
    status: input.status,
    failureReason,
    occurredAt,
  };

  const state: SentNotificationLog = {
    ...log,
    attempts: [...log.attempts, attempt],
    currentStatus: next,
    providerMessageId: input.providerMessageId ?? log.providerMessageId,
    failureReason: failureReason ?? (next === 'Failed' ? log.failureReason : null),
    updatedAt: occurredAt,
  };

  const ref = { requestId: state.requestId, channel: state.channel, recipientId: state.recipientId };
  const events: DomainEvent[] = [];

  if (input.kind === 'dispatch') {
    events.push(
      logEvent(
        state,
        'NotificationDispatchAttemptedEvent',
        {
          requestId: state.requestId,
          channel: state.channel,
          attempt: dispatchAttemptCount(state),
          status: input.status,
          failureReason,
        },
        occurredAt,
      ),
    );
    if (next === 'Sent' || next === 'Delivered') {
      events.push(
        logEvent(
          state,
          'NotificationSentToChannelEvent',
          { ...ref, providerMessageId: state.providerMessageId ?? '' },
          occurredAt,
        ),
      );
    }
  }

  if (next === 'Delivered') {
    events.push(logEvent(state, 'NotificationDeliveredEvent', ref, occurredAt));
  } else if (next === 'Read') {
    events.push(logEvent(state, 'NotificationReadEvent', ref, occurredAt));
  } else if (next === 'Failed') {
    events.push(
      logEvent(
        state,
        'NotificationDeliveryFailedEvent',
        { ...ref, reason: failureReason ?? 'unknown' },
        occurredAt,
      ),
    );
  }

  return { state, events };
}
