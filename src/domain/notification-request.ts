import type { Channel, Urgency } from '../types/common';
import { InvalidStateTransitionError } from './errors';
import {
  createEvent,
  type DomainEvent,
  type EventPayloads,
  type EventType,
  type Transition,
} from './events';

export const REQUEST_STATUSES = [
  'Pending',
  'Processing',
  'Completed',
  'Failed',
  'Blocked',
  'Canceled',
] as const;
export type RequestStatus = (typeof REQUEST_STATUSES)[number];

// Valid state transitions for the notification request state machine.
// Key = current status, Value = set of allowed next statuses.
const VALID_TRANSITIONS: Record<RequestStatus, ReadonlySet<RequestStatus>> = {
  Pending: new Set(['Processing', 'Blocked', 'Canceled']),
  Processing: new Set(['Completed', 'Failed']),
  // Terminal states — no further transitions
  Completed: new Set(),
  Failed: new Set(),
  Blocked: new Set(),
  Canceled: new Set(),
};

export function isValidTransition(from: RequestStatus, to: RequestStatus): boolean {
  return VALID_TRANSITIONS[from].has(to);
}

export function isTerminalStatus(status: RequestStatus): boolean {
  return VALID_TRANSITIONS[status].size === 0;
}

export type RecipientOutcome = 'Succeeded' | 'Failed' | 'Blocked';

export interface Recipient {
  /** User id. */
  id: string;
  addresses: Partial<Record<Channel, string>>;
  /** Channels the policy allowed, in fallback order. Null until evaluated. */
  allowedChannels: Channel[] | null;
  deferredUntil: Date | null;
  outcome: RecipientOutcome | null;
  reason: string | null;
}

export interface NotificationRequest {
  id: string;
  type: string;
  payload: Record<string, unknown>;
  recipients: Recipient[];
  channelPreferences: Channel[];
  urgency: Urgency;
  scheduledAt: Date | null;
  correlationId: string;
  dedupKey: string;
  status: RequestStatus;
  version: number;
  /** Next time the due-request worker should pick this request up. */
  deferredUntil: Date | null;
  /** Template version per channel, pinned when processing starts. */
  templateVersions: Partial<Record<Channel, number>>;
  failureReason: string | null;
  cancelRequestedAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface CreateNotificationCommand {
  type: string;
  payload: Record<string, unknown>;
  recipients: Array<{ id: string; addresses: Partial<Record<Channel, string>> }>;
  channelPreferences: Channel[];
  urgency: Urgency;
  scheduledAt?: Date | null;
  correlationId: string;
  dedupKey: string;
}

function requestEvent<T extends EventType>(
  request: NotificationRequest,
  type: T,
  payload: EventPayloads[T],
  at: Date,
): DomainEvent {
  return createEvent(
    type,
    { type: 'NotificationRequest', id: request.id, correlationId: request.correlationId },
    payload,
    at,
  );
}

function transitionTo(
  request: NotificationRequest,
  to: RequestStatus,
  now: Date,
  patch: Partial<NotificationRequest> = {},
): NotificationRequest {
  if (!isValidTransition(request.status, to)) {
    throw new InvalidStateTransitionError('NotificationRequest', request.status, to);
  }
  return { ...request, ...patch, status: to, updatedAt: now };
}

/** Builds a fresh Pending request. The repository assigns version 1 on insert. */
export function newRequest(
  id: string,
  command: CreateNotificationCommand,
  now: Date,
): Transition<NotificationRequest> {
  const request: NotificationRequest = {
    id,
    type: command.type,
    payload: command.payload,
    recipients: command.recipients.map((r) => ({
      id: r.id,
      addresses: r.addresses,
      allowedChannels: null,
      deferredUntil: null,
      outcome: null,
      reason: null,
    })),
    channelPreferences: [...command.channelPreferences],
    urgency: command.urgency,
    scheduledAt: command.scheduledAt ?? null,
    correlationId: command.correlationId,
    dedupKey: command.dedupKey,
    status: 'Pending',
    version: 0,
    deferredUntil: null,
    templateVersions: {},
    failureReason: null,
    cancelRequestedAt: null,
    createdAt: now,
    updatedAt: now,
  };

  return {
    state: request,
    events: [
      requestEvent(
        request,
        'NotificationRequestedEvent',
        {
          type: request.type,
          urgency: request.urgency,
          recipientIds: request.recipients.map((r) => r.id),
          channelPreferences: request.channelPreferences,
          scheduledAt: request.scheduledAt?.toISOString() ?? null,
        },
        now,
      ),
    ],
  };
}

export function markAsProcessing(
  request: NotificationRequest,
  recipients: Recipient[],
  templateVersions: Partial<Record<Channel, number>>,
  now: Date,
): Transition<NotificationRequest> {
  const deferred = recipients.filter((r) => r.outcome === null && r.deferredUntil !== null);
  const state = transitionTo(request, 'Processing', now, {
    recipients,
    templateVersions,
    deferredUntil: earliest(deferred.map((r) => r.deferredUntil)),
  });
  const allowed = recipients.filter((r) => r.allowedChannels !== null && r.deferredUntil === null);

  return {
    state,
    events: [
      requestEvent(
        state,
        'NotificationProcessingStartedEvent',
        { allowedRecipients: allowed.length, deferredRecipients: deferred.length },
        now,
      ),
    ],
  };
}

export function markAsBlocked(
  request: NotificationRequest,
  recipients: Recipient[],
  reason: string,
  now: Date,
): Transition<NotificationRequest> {
  const state = transitionTo(request, 'Blocked', now, {
    recipients,
    failureReason: reason,
    deferredUntil: null,
  });
  return { state, events: [requestEvent(state, 'NotificationBlockedEvent', { reason }, now)] };
}

export function markAsCompleted(
  request: NotificationRequest,
  now: Date,
): Transition<NotificationRequest> {
  const state = transitionTo(request, 'Completed', now, { deferredUntil: null });
  const succeeded = state.recipients.filter((r) => r.outcome === 'Succeeded').length;

  return {
    state,
    events: [
      requestEvent(
        state,
        'NotificationCompletedEvent',
        { succeededRecipients: succeeded, failedRecipients: state.recipients.length - succeeded },
        now,
      ),
    ],
  };
}

export function markAsFailed(
  request: NotificationRequest,
  reason: string,
  now: Date,
): Transition<NotificationRequest> {
  const state = transitionTo(request, 'Failed', now, { failureReason: reason, deferredUntil: null });
  return { state, events: [requestEvent(state, 'NotificationFailedEvent', { reason }, now)] };
}

export function markAsCanceled(
  request: NotificationRequest,
  now: Date,
): Transition<NotificationRequest> {
  const state = transitionTo(request, 'Canceled', now, {
    deferredUntil: null,
    cancelRequestedAt: now,
  });
  return { state, events: [requestEvent(state, 'NotificationCanceledEvent', {}, now)] };
}

/**
 * Keeps a Pending request Pending but records when it should be looked at
 * again (scheduled time or end of a do-not-disturb window). Not a transition.
 */
export function deferRequest(
  request: NotificationRequest,
  recipients: Recipient[],
  until: Date,
  now: Date,
): NotificationRequest {
  if (request.status !== 'Pending') {
    throw new InvalidStateTransitionError('NotificationRequest', request.status, 'Pending');
  }
  return { ...request, recipients, deferredUntil: until, updatedAt: now };
}

/** Records a cancel on a Processing request so pending retries stop. */
export function requestCancellation(
  request: NotificationRequest,
  now: Date,
): NotificationRequest {
  if (request.status !== 'Processing') {
    throw new InvalidStateTransitionError('NotificationRequest', request.status, 'Canceled');
  }
  return { ...request, cancelRequestedAt: request.cancelRequestedAt ?? now, updatedAt: now };
}

export function replaceRecipients(
  request: NotificationRequest,
  recipients: Recipient[],
  now: Date,
): NotificationRequest {
  const stillDeferred = recipients.filter((r) => r.outcome === null && r.deferredUntil !== null);
  return {
    ...request,
    recipients,
    deferredUntil: earliest(stillDeferred.map((r) => r.deferredUntil)),
    updatedAt: now,
  };
}

export function allRecipientsTerminal(request: NotificationRequest): boolean {
  return request.recipients.every((r) => r.outcome !== null);
}

export function earliest(dates: Array<Date | null>): Date | null {
  let min: Date | null = null;
  for (const d of dates) {
    if (d && (!min || d.getTime() < min.getTime())) min = d;
  }
  return min;
}
