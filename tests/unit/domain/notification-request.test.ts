import { describe, it, expect } from 'vitest';
import { InvalidStateTransitionError } from '@/domain/errors';
import {
  deferRequest,
  earliest,
  isTerminalStatus,
  isValidTransition,
  markAsBlocked,
  markAsCanceled,
  markAsCompleted,
  markAsFailed,
  markAsProcessing,
  newRequest,
  requestCancellation,
  type NotificationRequest,
  type Recipient,
} from '@/domain/notification-request';

const now = new Date('2026-03-02T12:00:00.000Z');

function pending(): NotificationRequest {
  return newRequest(
    'req-1',
    {
      type: 'OrderConfirmed',
      payload: { orderId: 'A-100' },
      recipients: [
        { id: 'user-1', addresses: { Email: 'ana@example.com' } },
        { id: 'user-2', addresses: { SMS: '+15551234567' } },
      ],
      channelPreferences: ['Email', 'SMS'],
      urgency: 'Medium',
      correlationId: 'corr-1',
      dedupKey: 'order-A-100',
    },
    now,
  ).state;
}

function ready(recipient: Recipient, channels: Recipient['allowedChannels']): Recipient {
  return { ...recipient, allowedChannels: channels };
}

describe('newRequest', () => {
  it('starts Pending with undecided recipients and one requested event', () => {
    const { state, events } = newRequest(
      'req-1',
      {
        type: 'OrderConfirmed',
        payload: { orderId: 'A-100' },
        recipients: [{ id: 'user-1', addresses: { Email: 'ana@example.com' } }],
        channelPreferences: ['Email'],
        urgency: 'High',
        scheduledAt: new Date('2026-03-02T13:00:00.000Z'),
        correlationId: 'corr-1',
        dedupKey: 'k1',
      },
      now,
    );

    expect(state.status).toBe('Pending');
    expect(state.recipients[0]).toEqual({
      id: 'user-1',
      addresses: { Email: 'ana@example.com' },
      allowedChannels: null,
      deferredUntil: null,
      outcome: null,
      reason: null,
    });
    expect(events).toHaveLength(1);
    expect(events[0]?.type).toBe('NotificationRequestedEvent');
    expect(events[0]?.aggregateId).toBe('req-1');
    expect(events[0]?.correlationId).toBe('corr-1');
    expect(events[0]?.payload).toEqual({
      type: 'OrderConfirmed',
      urgency: 'High',
      recipientIds: ['user-1'],
      channelPreferences: ['Email'],
      scheduledAt: '2026-03-02T13:00:00.000Z',
    });
  });
});

describe('state machine', () => {
  it('allows only the documented transitions', () => {
    expect(isValidTransition('Pending', 'Processing')).toBe(true);
    expect(isValidTransition('Pending', 'Blocked')).toBe(true);
    expect(isValidTransition('Pending', 'Canceled')).toBe(true);
    expect(isValidTransition('Processing', 'Completed')).toBe(true);
    expect(isValidTransition('Processing', 'Failed')).toBe(true);
    expect(isValidTransition('Pending', 'Completed')).toBe(false);
    expect(isValidTransition('Processing', 'Pending')).toBe(false);
    expect(isValidTransition('Completed', 'Failed')).toBe(false);
  });

  it('treats Completed, Failed, Blocked and Canceled as terminal', () => {
    expect(isTerminalStatus('Completed')).toBe(true);
    expect(isTerminalStatus('Failed')).toBe(true);
    expect(isTerminalStatus('Blocked')).toBe(true);
    expect(isTerminalStatus('Canceled')).toBe(true);
    expect(isTerminalStatus('Pending')).toBe(false);
    expect(isTerminalStatus('Processing')).toBe(false);
  });

  it('rejects markAsCompleted unless the request is Processing', () => {
    expect(() => markAsCompleted(pending(), now)).toThrow(InvalidStateTransitionError);
    expect(() => markAsCompleted(pending(), now)).toThrow(
      'Invalid NotificationRequest transition: Pending -> Completed',
    );
  });

  it('completes a Processing request and counts recipient outcomes', () => {
    const request = pending();
    const processing = markAsProcessing(
      request,
      request.recipients.map((r) => ready(r, ['Email'])),
      { Email: 3 },
      now,
    ).state;

    const { state, events } = markAsCompleted(
      {
        ...processing,
        recipients: processing.recipients.map((r, i): Recipient => ({
          ...r,
          outcome: i === 0 ? 'Succeeded' : 'Failed',
        })),
      },
      now,
    );

    expect(state.status).toBe('Completed');
    expect(events.map((e) => e.type)).toEqual(['NotificationCompletedEvent']);
    expect(events[0]?.payload).toEqual({ succeededRecipients: 1, failedRecipients: 1 });
  });

  it('pins template versions and counts deferred recipients when processing starts', () => {
    const request = pending();
    const until = new Date('2026-03-03T07:00:00.000Z');
    const [first, second] = request.recipients;
    if (!first || !second) throw new Error('fixture needs two recipients');

    const { state, events } = markAsProcessing(
      request,
      [ready(first, ['Email']), { ...second, deferredUntil: until }],
      { Email: 2 },
      now,
    );

    expect(state.status).toBe('Processing');
    expect(state.templateVersions).toEqual({ Email: 2 });
    expect(state.deferredUntil).toEqual(until);
    expect(events[0]?.payload).toEqual({ allowedRecipients: 1, deferredRecipients: 1 });
  });

  it('blocks a Pending request with the reason', () => {
    const request = pending();
    const { state, events } = markAsBlocked(request, request.recipients, 'opted out', now);

    expect(state.status).toBe('Blocked');
    expect(state.failureReason).toBe('opted out');
    expect(events[0]?.payload).toEqual({ reason: 'opted out' });
  });

  it('fails a Processing request with the reason', () => {
    const request = pending();
    const processing = markAsProcessing(request, request.recipients, {}, now).state;
    const { state } = markAsFailed(processing, 'no recipient reached', now);

    expect(state.status).toBe('Failed');
    expect(state.failureReason).toBe('no recipient reached');
  });

  it('cancels only Pending requests directly', () => {
    const canceled = markAsCanceled(pending(), now);
    expect(canceled.state.status).toBe('Canceled');
    expect(canceled.state.cancelRequestedAt).toEqual(now);
    expect(canceled.events.map((e) => e.type)).toEqual(['NotificationCanceledEvent']);

    expect(() => markAsCanceled(canceled.state, now)).toThrow(InvalidStateTransitionError);
  });

  it('records a cancellation on a Processing request once', () => {
    const request = pending();
    const processing = markAsProcessing(request, request.recipients, {}, now).state;
    const later = new Date(now.getTime() + 1000);

    const first = requestCancellation(processing, now);
    const second = requestCancellation(first, later);

    expect(first.status).toBe('Processing');
    expect(second.cancelRequestedAt).toEqual(now);
    expect(() => requestCancellation(pending(), now)).toThrow(InvalidStateTransitionError);
  });

  it('defers only Pending requests', () => {
    const request = pending();
    const until = new Date('2026-03-02T13:00:00.000Z');

    expect(deferRequest(request, request.recipients, until, now).deferredUntil).toEqual(until);

    const processing = markAsProcessing(request, request.recipients, {}, now).state;
    expect(() => deferRequest(processing, processing.recipients, until, now)).toThrow(
      InvalidStateTransitionError,
    );
  });
});

describe('earliest', () => {
  it('ignores nulls and returns the smallest date', () => {
    const a = new Date('2026-03-02T10:00:00.000Z');
    const b = new Date('2026-03-02T09:00:00.000Z');
    expect(earliest([null, a, b])).toBe(b);
    expect(earliest([null])).toBeNull();
  });
});
