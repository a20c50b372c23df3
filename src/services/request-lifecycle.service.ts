import { v4 as uuid } from 'uuid';
import { logger } from '../config/logger';
import type { DispatchConfig } from '../config/dispatch';
import type { IdempotencyDal } from '../dal/idempotency.dal';
import type { NotificationRequestDal } from '../dal/notification-request.dal';
import { isConfirmedLogStatus, type SentNotificationLog } from '../domain/delivery-log';
import {
  ConcurrencyConflictError,
  errorMessage,
  IdempotencyConflictError,
  InvalidStateTransitionError,
  MissingPlaceholderError,
  NotFoundError,
  TemplateNotFoundError,
  ValidationError,
} from '../domain/errors';
import type { DomainEvent } from '../domain/events';
import {
  allRecipientsTerminal,
  deferRequest,
  earliest,
  markAsBlocked,
  markAsCanceled,
  markAsCompleted,
  markAsFailed,
  markAsProcessing,
  newRequest,
  replaceRecipients,
  requestCancellation,
  type CreateNotificationCommand,
  type NotificationRequest,
  type Recipient,
} from '../domain/notification-request';
import type { RenderedMessage } from '../domain/template';
import { createNotificationSchema, type CreateNotificationInput } from '../integrations/validation';
import { startTimer } from '../telemetry/timing';
import { systemClock, type Channel, type Clock } from '../types/common';
import { sleep as defaultSleep, type Sleep } from '../utils/backoff';
import type { DeliveryLedgerService, ReceiptInput, ReceiptResult } from './delivery-ledger.service';
import { CANCELED_REASON, type DispatchService } from './dispatch.service';
import { evaluate } from './policy.service';
import type { PreferencesService } from './preferences.service';
import type { TemplateService } from './template.service';

export interface CreateResult {
  request: NotificationRequest;
  /** False when the dedup key matched an existing request. */
  created: boolean;
}

export interface RequestLifecycleDeps {
  requests: NotificationRequestDal;
  idempotency: IdempotencyDal;
  ledger: DeliveryLedgerService;
  dispatcher: DispatchService;
  templates: TemplateService;
  preferences: PreferencesService;
  config: DispatchConfig;
  clock?: Clock;
  sleep?: Sleep;
}

/** recipientId -> channel -> message */
type MessagePlan = Map<string, Map<Channel, RenderedMessage>>;

interface PreparedMessages {
  templateVersions: Partial<Record<Channel, number>>;
  messages: MessagePlan;
}

function isTemplateError(err: unknown): err is TemplateNotFoundError | MissingPlaceholderError {
  return err instanceof TemplateNotFoundError || err instanceof MissingPlaceholderError;
}

function isReady(recipient: Recipient): boolean {
  return (
    recipient.outcome === null &&
    recipient.allowedChannels !== null &&
    recipient.deferredUntil === null
  );
}

/**
 * Drives a NotificationRequest from creation to a terminal status.
 *
 * Every write is a compare-and-swap on the request version with its events
 * in the same transaction; callers that lose a race reload and retry.
 */
export class RequestLifecycleService {
  private readonly clock: Clock;
  private readonly sleep: Sleep;
  /** Abort handles of dispatches running in this process, per request. */
  private readonly running = new Map<string, Set<AbortController>>();
  private readonly background = new Set<Promise<void>>();

  constructor(private readonly deps: RequestLifecycleDeps) {
    this.clock = deps.clock ?? systemClock;
    this.sleep = deps.sleep ?? defaultSleep;
  }

  // ---------------------------------------------------------------------------
  // Create
  // ---------------------------------------------------------------------------

  /**
   * Creates a Pending request, or returns the existing one for the same
   * dedup key. Only a real creation emits NotificationRequestedEvent.
   * `input` is validated against createNotificationSchema.
   */
  async create(input: CreateNotificationInput | unknown): Promise<CreateResult> {
    const parsed = createNotificationSchema.safeParse(input);
    if (!parsed.success) {
      throw new ValidationError(
        'Invalid notification request',
        parsed.error.issues.map((i) => ({ path: i.path.join('.'), message: i.message })),
      );
    }

    const timer = startTimer('service.lifecycle.create');
    const { requests, idempotency, config } = this.deps;
    const { dedupKey } = parsed.data;
    const id = uuid();
    const now = this.clock();

    try {
      // The reservation may have expired while the request itself lives on.
      const existing = await requests.findByDedupKey(dedupKey);
      if (existing) return { request: existing, created: false };

      const command: CreateNotificationCommand = {
        ...parsed.data,
        scheduledAt: parsed.data.scheduledAt ?? null,
        correlationId: parsed.data.correlationId ?? uuid(),
      };
      const { state, events } = newRequest(id, command, now);

      // Key and request commit in one transaction.
      const stored = await requests.insertReserved(
        state,
        events,
        (tx) => idempotency.reserveIn(tx, dedupKey, id, config.idempotencyTtlMs, now).acquired,
      );
      if (!stored) {
        const reserved = await this.readReserved(dedupKey);
        logger.info({ requestId: reserved.id, dedupKey }, 'Duplicate notification request');
        return { request: reserved, created: false };
      }

      logger.info(
        { requestId: stored.id, type: stored.type, correlationId: stored.correlationId },
        'Notification request created',
      );
      return { request: stored, created: true };
    } finally {
      timer.stop();
    }
  }

  /** Creates the request and, when new, processes it in the background. */
  async submit(input: CreateNotificationInput | unknown): Promise<CreateResult> {
    const result = await this.create(input);
    if (result.created) this.processInBackground(result.request.id);
    return result;
  }

  processInBackground(requestId: string): void {
    const task = this.process(requestId).then(
      () => undefined,
      (err: unknown) => {
        logger.error({ requestId, err: errorMessage(err) }, 'Background processing failed');
      },
    );
    this.background.add(task);
    void task.finally(() => this.background.delete(task));
  }

  /** Resolves once every background task started so far has settled. */
  async idle(): Promise<void> {
    while (this.background.size > 0) {
      await Promise.allSettled([...this.background]);
    }
  }

  private async readReserved(dedupKey: string): Promise<NotificationRequest> {
    const { reservationReadAttempts, reservationReadDelayMs } = this.deps.config;
    for (let attempt = 1; attempt <= reservationReadAttempts; attempt++) {
      const existing = await this.deps.requests.findByDedupKey(dedupKey);
      if (existing) return existing;
      if (attempt < reservationReadAttempts) await this.sleep(reservationReadDelayMs);
    }
    throw new IdempotencyConflictError(dedupKey);
  }

  // ---------------------------------------------------------------------------
  // Read
  // ---------------------------------------------------------------------------

  async get(requestId: string): Promise<NotificationRequest> {
    const request = await this.deps.requests.findById(requestId);
    if (!request) throw new NotFoundError('NotificationRequest', requestId);
    return request;
  }

  // ---------------------------------------------------------------------------
  // Process
  // ---------------------------------------------------------------------------

  /**
   * Moves the request as far as it can go right now: applies policy, renders,
   * dispatches and reconciles. Safe to call repeatedly and concurrently.
   */
  async process(requestId: string): Promise<NotificationRequest> {
    const timer = startTimer('service.lifecycle.process');
    try {
      for (let conflicts = 0; ; conflicts++) {
        try {
          const request = await this.get(requestId);
          if (request.status === 'Pending') return await this.start(request);
          if (request.status === 'Processing') return await this.resume(request);
          return request;
        } catch (err) {
          if (!(err instanceof ConcurrencyConflictError)) throw err;
          if (conflicts >= this.deps.config.reconcileMaxConflicts) throw err;
          logger.debug({ requestId }, 'Request changed while processing; reloading');
        }
      }
    } finally {
      timer.stop();
    }
  }

  private async start(request: NotificationRequest): Promise<NotificationRequest> {
    const { requests } = this.deps;
    const now = this.clock();

    if (request.scheduledAt && request.scheduledAt.getTime() > now.getTime()) {
      if (request.deferredUntil?.getTime() === request.scheduledAt.getTime()) return request;
      return requests.save(
        deferRequest(request, request.recipients, request.scheduledAt, now),
        request.version,
      );
    }

    const recipients = await this.applyPolicy(request, request.recipients, now);

    if (recipients.every((r) => r.outcome === 'Blocked')) {
      const reasons = [...new Set(recipients.map((r) => r.reason ?? 'blocked'))].join('; ');
      const blocked = markAsBlocked(request, recipients, reasons, now);
      logger.info({ requestId: request.id, reason: reasons }, 'Notification request blocked');
      return requests.save(blocked.state, request.version, blocked.events);
    }

    if (!recipients.some(isReady)) {
      const until = earliest(recipients.map((r) => r.deferredUntil));
      if (!until) throw new Error(`Request ${request.id} has neither ready nor deferred recipients`);
      logger.info({ requestId: request.id, until: until.toISOString() }, 'Notification request deferred');
      return requests.save(deferRequest(request, recipients, until, now), request.version);
    }

    let prepared: PreparedMessages;
    try {
      prepared = await this.prepareMessages({ ...request, recipients }, {});
    } catch (err) {
      if (!isTemplateError(err)) throw err;
      // Processing -> Failed in one write so the failure is never lost.
      const processing = markAsProcessing(request, recipients, {}, now);
      const failed = markAsFailed(processing.state, err.message, now);
      logger.warn({ requestId: request.id, reason: err.message }, 'Rendering failed');
      return requests.save(failed.state, request.version, [
        ...processing.events,
        ...failed.events,
      ]);
    }

    const started = markAsProcessing(request, recipients, prepared.templateVersions, now);
    const saved = await requests.save(started.state, request.version, started.events);
    return this.dispatchAndReconcile(saved, prepared.messages);
  }

  /** Processing: re-evaluates deferred recipients that are due and sends to ready ones. */
  private async resume(request: NotificationRequest): Promise<NotificationRequest> {
    const { requests } = this.deps;
    const now = this.clock();
    if (request.cancelRequestedAt) return this.reconcile(request.id);

    const due = request.recipients.filter(
      (r) =>
        r.outcome === null &&
        r.deferredUntil !== null &&
        r.deferredUntil.getTime() <= now.getTime(),
    );
    const recipients =
      due.length > 0 ? await this.applyPolicy(request, request.recipients, now, due) : request.recipients;

    let prepared: PreparedMessages;
    try {
      prepared = await this.prepareMessages({ ...request, recipients }, request.templateVersions);
    } catch (err) {
      if (!isTemplateError(err)) throw err;
      const failed = markAsFailed({ ...request, recipients }, err.message, now);
      logger.warn({ requestId: request.id, reason: err.message }, 'Rendering failed');
      return requests.save(failed.state, request.version, failed.events);
    }

    let current = request;
    const pinnedChanged =
      Object.keys(prepared.templateVersions).length !== Object.keys(request.templateVersions).length;
    if (due.length > 0 || pinnedChanged) {
      current = await requests.save(
        {
          ...replaceRecipients(request, recipients, now),
          templateVersions: prepared.templateVersions,
        },
        request.version,
      );
    }

    return this.dispatchAndReconcile(current, prepared.messages);
  }

  /**
   * Evaluates policy for `subset` (default: every undecided recipient) and
   * returns the full recipient list with their new state.
   */
  private async applyPolicy(
    request: NotificationRequest,
    recipients: Recipient[],
    at: Date,
    subset: Recipient[] = recipients.filter((r) => r.outcome === null),
  ): Promise<Recipient[]> {
    const ids = new Set(subset.map((r) => r.id));

    return Promise.all(
      recipients.map(async (recipient): Promise<Recipient> => {
        if (!ids.has(recipient.id)) return recipient;

        const preferences = await this.deps.preferences.get(recipient.id);
        const limit = preferences.frequencyLimits[request.type];
        const recentCount = limit
          ? await this.deps.ledger.countRecentSuccesses(recipient.id, request.type, limit.windowMinutes, at)
          : 0;

        const decision = evaluate(request, recipient, { preferences, at, recentCount });
        switch (decision.kind) {
          case 'Allow':
            return { ...recipient, allowedChannels: decision.channels, deferredUntil: null };
          case 'Defer':
            return { ...recipient, allowedChannels: null, deferredUntil: decision.until };
          case 'Block':
            return {
              ...recipient,
              allowedChannels: [],
              deferredUntil: null,
              outcome: 'Blocked',
              reason: decision.reason,
            };
        }
      }),
    );
  }

  /**
   * Renders one message per (ready recipient, allowed channel), pinning the
   * Active template version of any channel not pinned yet.
   */
  private async prepareMessages(
    request: NotificationRequest,
    pinned: Partial<Record<Channel, number>>,
  ): Promise<PreparedMessages> {
    const { templates } = this.deps;
    const templateVersions = { ...pinned };
    const messages: MessagePlan = new Map();

    for (const recipient of request.recipients.filter(isReady)) {
      const perChannel = new Map<Channel, RenderedMessage>();

      for (const channel of recipient.allowedChannels ?? []) {
        const version = templateVersions[channel];
        const template =
          version === undefined
            ? await templates.resolve(request.type, channel)
            : await templates.getVersion(request.type, channel, version);
        templateVersions[channel] = template.version;

        perChannel.set(
          channel,
          templates.render(template, { ...request.payload, recipient: { id: recipient.id } }),
        );
      }
      messages.set(recipient.id, perChannel);
    }

    return { templateVersions, messages };
  }

  private async dispatchAndReconcile(
    request: NotificationRequest,
    messages: MessagePlan,
  ): Promise<NotificationRequest> {
    const controller = new AbortController();
    const handles = this.running.get(request.id) ?? new Set<AbortController>();
    handles.add(controller);
    this.running.set(request.id, handles);

    try {
      await Promise.all(
        request.recipients
          .filter(isReady)
          .map((recipient) =>
            this.dispatchRecipient(request, recipient, messages.get(recipient.id), controller.signal),
          ),
      );
    } finally {
      handles.delete(controller);
      if (handles.size === 0) this.running.delete(request.id);
    }

    return this.reconcile(request.id);
  }

  /** Never throws: a failure here must not take sibling recipients down. */
  private async dispatchRecipient(
    request: NotificationRequest,
    recipient: Recipient,
    messages: Map<Channel, RenderedMessage> | undefined,
    signal: AbortSignal,
  ): Promise<void> {
    const channels = recipient.allowedChannels ?? [];

    const send = async (channel: Channel): Promise<boolean> => {
      const message = messages?.get(channel);
      if (!message) return false;
      try {
        const outcome = await this.deps.dispatcher.dispatch({
          request,
          recipient,
          channel,
          message,
          signal,
        });
        // InFlight: another sender owns this key, so stop here rather than fall back.
        return outcome.status !== 'Failed';
      } catch (err) {
        logger.error(
          { requestId: request.id, recipientId: recipient.id, channel, err: errorMessage(err) },
          'Dispatch failed unexpectedly',
        );
        return true;
      }
    };

    if (this.deps.config.deliveryStrategy === 'broadcast') {
      await Promise.all(channels.map(send));
      return;
    }

    for (const channel of channels) {
      if (await send(channel)) return;
    }
  }

  // ---------------------------------------------------------------------------
  // Reconcile
  // ---------------------------------------------------------------------------

  /**
   * Recomputes recipient outcomes from the delivery logs and, once every
   * recipient is terminal, completes or fails the request. A request that is
   * no longer Processing is returned unchanged, so concurrent reconciles
   * emit the completion event once.
   */
  async reconcile(requestId: string): Promise<NotificationRequest> {
    for (let conflicts = 0; ; conflicts++) {
      const request = await this.get(requestId);
      if (request.status !== 'Processing') return request;

      const logs = await this.deps.ledger.logsForRequest(requestId);
      const now = this.clock();
      const recipients = request.recipients.map((r) => this.recipientOutcome(request, r, logs, now));
      const updated = replaceRecipients(request, recipients, now);

      let next: NotificationRequest;
      let events: DomainEvent[] = [];
      if (allRecipientsTerminal(updated)) {
        const transition = recipients.some((r) => r.outcome === 'Succeeded')
          ? markAsCompleted(updated, now)
          : markAsFailed(updated, this.failureSummary(recipients), now);
        next = transition.state;
        events = transition.events;
      } else if (recipients.some((r, i) => r !== request.recipients[i])) {
        next = updated;
      } else {
        return request;
      }

      try {
        const saved = await this.deps.requests.save(next, request.version, events);
        if (saved.status !== 'Processing') {
          logger.info({ requestId, status: saved.status }, 'Notification request finished');
        }
        return saved;
      } catch (err) {
        if (!(err instanceof ConcurrencyConflictError)) throw err;
        if (conflicts >= this.deps.config.reconcileMaxConflicts) throw err;
      }
    }
  }

  /**
   * Logs are keyed by address, so recipients that share an address share its
   * log. A Sent log keeps the recipient open until a receipt arrives or
   * `receiptWaitMs` passes without one.
   */
  private recipientOutcome(
    request: NotificationRequest,
    recipient: Recipient,
    logs: SentNotificationLog[],
    now: Date,
  ): Recipient {
    if (recipient.outcome !== null) return recipient;

    const allowed = recipient.allowedChannels ?? [];
    const own = logs.filter(
      (l) => allowed.includes(l.channel) && recipient.addresses[l.channel] === l.address,
    );
    const receiptDeadline = now.getTime() - this.deps.config.receiptWaitMs;
    const reached = own.some(
      (l) =>
        isConfirmedLogStatus(l.currentStatus) ||
        (l.currentStatus === 'Sent' && l.updatedAt.getTime() <= receiptDeadline),
    );
    if (reached) {
      return { ...recipient, outcome: 'Succeeded', reason: null };
    }

    const open = own.some((l) => l.currentStatus === 'QueuedForDispatch' || l.currentStatus === 'Sent');
    if (request.cancelRequestedAt && !open) {
      return { ...recipient, outcome: 'Failed', reason: CANCELED_REASON, deferredUntil: null };
    }

    if (!isReady(recipient)) return recipient;

    const failures = allowed.map(
      (channel) => own.find((l) => l.channel === channel && l.currentStatus === 'Failed') ?? null,
    );
    if (allowed.length > 0 && failures.every((l) => l !== null)) {
      const reason = failures.map((l) => `${l?.channel}: ${l?.failureReason ?? 'failed'}`).join('; ');
      return { ...recipient, outcome: 'Failed', reason };
    }

    return recipient;
  }

  private failureSummary(recipients: Recipient[]): string {
    const reasons = new Set(recipients.map((r) => r.reason ?? r.outcome ?? 'unknown'));
    return `no recipient reached: ${[...reasons].join('; ')}`;
  }

  // ---------------------------------------------------------------------------
  // Receipts
  // ---------------------------------------------------------------------------

  /**
   * Records a provider receipt and re-checks the parent request. A Failed
   * receipt resumes fallback to the recipient's next allowed channel in the
   * background.
   */
  async applyReceipt(input: ReceiptInput): Promise<ReceiptResult> {
    const result = await this.deps.ledger.recordReceipt(input);
    if (!result.applied) return result;

    const request = await this.deps.requests.findById(result.log.requestId);
    if (request?.status !== 'Processing') return result;

    if (result.log.currentStatus === 'Failed') {
      logger.info(
        { requestId: request.id, channel: result.log.channel, reason: result.log.failureReason },
        'Delivery failed after send; resuming fallback',
      );
      this.processInBackground(request.id);
    } else {
      await this.reconcile(request.id);
    }
    return result;
  }

  // ---------------------------------------------------------------------------
  // Cancel
  // ---------------------------------------------------------------------------

  /**
   * Pending -> Canceled. On a Processing request, records the cancel and
   * aborts retries that have not started; calls already in flight finish.
   */
  async cancel(requestId: string): Promise<NotificationRequest> {
    for (let conflicts = 0; ; conflicts++) {
      const request = await this.get(requestId);
      const now = this.clock();

      try {
        if (request.status === 'Pending') {
          const canceled = markAsCanceled(request, now);
          const saved = await this.deps.requests.save(canceled.state, request.version, canceled.events);
          logger.info({ requestId }, 'Notification request canceled');
          return saved;
        }

        if (request.status === 'Processing') {
          if (!request.cancelRequestedAt) {
            await this.deps.requests.save(requestCancellation(request, now), request.version);
          }
          for (const controller of this.running.get(requestId) ?? []) controller.abort();
          logger.info({ requestId }, 'Cancellation requested for processing request');
          return await this.reconcile(requestId);
        }

        throw new InvalidStateTransitionError('NotificationRequest', request.status, 'Canceled');
      } catch (err) {
        if (!(err instanceof ConcurrencyConflictError)) throw err;
        if (conflicts >= this.deps.config.reconcileMaxConflicts) throw err;
      }
    }
  }
}
