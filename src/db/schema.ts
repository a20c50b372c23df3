import {
  sqliteTable,
  text,
  integer,
  index,
  uniqueIndex,
  primaryKey,
} from 'drizzle-orm/sqlite-core';
import { CHANNELS, URGENCIES, type Channel } from '../types/common';
import { REQUEST_STATUSES, type RecipientOutcome } from '../domain/notification-request';
import { ATTEMPT_KINDS, ATTEMPT_STATUSES, LOG_STATUSES } from '../domain/delivery-log';
import { TEMPLATE_STATUSES } from '../domain/template';
import type { DoNotDisturbWindow, FrequencyLimit } from '../domain/preferences';

// Must match the DDL in ./migrate.ts.

/** Recipient as stored inside the request row (dates as ISO strings). */
export interface StoredRecipient {
  id: string;
  addresses: Partial<Record<Channel, string>>;
  allowedChannels: Channel[] | null;
  deferredUntil: string | null;
  outcome: RecipientOutcome | null;
  reason: string | null;
}

export const notificationRequests = sqliteTable(
  'notification_requests',
  {
    id: text('id').primaryKey(),
    type: text('type').notNull(),
    payload: text('payload', { mode: 'json' }).$type<Record<string, unknown>>().notNull(),
    recipients: text('recipients', { mode: 'json' }).$type<StoredRecipient[]>().notNull(),
    channelPreferences: text('channel_preferences', { mode: 'json' }).$type<Channel[]>().notNull(),
    urgency: text('urgency', { enum: URGENCIES }).notNull(),
    scheduledAt: integer('scheduled_at', { mode: 'timestamp_ms' }),
    correlationId: text('correlation_id').notNull(),
    dedupKey: text('dedup_key').notNull(),
    status: text('status', { enum: REQUEST_STATUSES }).notNull(),
    version: integer('version').notNull(),
    deferredUntil: integer('deferred_until', { mode: 'timestamp_ms' }),
    templateVersions: text('template_versions', { mode: 'json' })
      .$type<Partial<Record<Channel, number>>>()
      .notNull(),
    failureReason: text('failure_reason'),
    cancelRequestedAt: integer('cancel_requested_at', { mode: 'timestamp_ms' }),
    /** Last time the due-request worker took the request up. Not part of the aggregate. */
    lastPickedAt: integer('last_picked_at', { mode: 'timestamp_ms' }),
    createdAt: integer('created_at', { mode: 'timestamp_ms' }).notNull(),
    updatedAt: integer('updated_at', { mode: 'timestamp_ms' }).notNull(),
  },
  (t) => ({
    dedupKeyIdx: uniqueIndex('notification_requests_dedup_key_idx').on(t.dedupKey),
    dueIdx: index('notification_requests_due_idx').on(t.status, t.deferredUntil),
  }),
);

export const deliveryLogs = sqliteTable(
  'delivery_logs',
  {
    id: text('id').primaryKey(),
    requestId: text('request_id').notNull(),
    correlationId: text('correlation_id').notNull(),
    recipientId: text('recipient_id').notNull(),
    notificationType: text('notification_type').notNull(),
    channel: text('channel', { enum: CHANNELS }).notNull(),
    address: text('address').notNull(),
    providerMessageId: text('provider_message_id'),
    currentStatus: text('current_status', { enum: LOG_STATUSES }).notNull(),
    failureReason: text('failure_reason'),
    version: integer('version').notNull(),
    createdAt: integer('created_at', { mode: 'timestamp_ms' }).notNull(),
    updatedAt: integer('updated_at', { mode: 'timestamp_ms' }).notNull(),
  },
  (t) => ({
    dispatchKeyIdx: uniqueIndex('delivery_logs_dispatch_key_idx').on(
      t.requestId,
      t.channel,
      t.address,
    ),
    addressIdx: index('delivery_logs_address_idx').on(t.address),
    providerIdx: index('delivery_logs_provider_message_id_idx').on(t.providerMessageId),
    recipientIdx: index('delivery_logs_recipient_idx').on(t.recipientId, t.notificationType),
  }),
);

export const deliveryAttempts = sqliteTable(
  'delivery_attempts',
  {
    logId: text('log_id').notNull(),
    seq: integer('seq').notNull(),
    kind: text('kind', { enum: ATTEMPT_KINDS }).notNull(),
    status: text('status', { enum: ATTEMPT_STATUSES }).notNull(),
    failureReason: text('failure_reason'),
    occurredAt: integer('occurred_at', { mode: 'timestamp_ms' }).notNull(),
  },
  (t) => ({
    pk: primaryKey({ columns: [t.logId, t.seq] }),
  }),
);

export const notificationTemplates = sqliteTable(
  'notification_templates',
  {
    id: text('id').primaryKey(),
    name: text('name').notNull(),
    channel: text('channel', { enum: CHANNELS }).notNull(),
    subject: text('subject').notNull(),
    body: text('body').notNull(),
    defaults: text('defaults', { mode: 'json' }).$type<Record<string, string>>().notNull(),
    version: integer('version').notNull(),
    status: text('status', { enum: TEMPLATE_STATUSES }).notNull(),
    createdAt: integer('created_at', { mode: 'timestamp_ms' }).notNull(),
  },
  (t) => ({
    versionIdx: uniqueIndex('notification_templates_version_idx').on(t.name, t.channel, t.version),
  }),
);

export const userPreferences = sqliteTable('user_preferences', {
  userId: text('user_id').primaryKey(),
  optOuts: text('opt_outs', { mode: 'json' })
    .$type<Array<{ type: string; channel: Channel }>>()
    .notNull(),
  doNotDisturb: text('do_not_disturb', { mode: 'json' }).$type<DoNotDisturbWindow>(),
  frequencyLimits: text('frequency_limits', { mode: 'json' })
    .$type<Record<string, FrequencyLimit>>()
    .notNull(),
  version: integer('version').notNull(),
  updatedAt: integer('updated_at', { mode: 'timestamp_ms' }).notNull(),
});

export const idempotencyKeys = sqliteTable('idempotency_keys', {
  key: text('key').primaryKey(),
  ref: text('ref').notNull(),
  expiresAt: integer('expires_at', { mode: 'timestamp_ms' }).notNull(),
});

export const leases = sqliteTable('leases', {
  key: text('key').primaryKey(),
  holder: text('holder').notNull(),
  expiresAt: integer('expires_at', { mode: 'timestamp_ms' }).notNull(),
});

export const outbox = sqliteTable(
  'outbox',
  {
    position: integer('position').primaryKey({ autoIncrement: true }),
    eventId: text('event_id').notNull(),
    aggregateType: text('aggregate_type').notNull(),
    aggregateId: text('aggregate_id').notNull(),
    eventType: text('event_type').notNull(),
    correlationId: text('correlation_id'),
    payload: text('payload', { mode: 'json' }).$type<Record<string, unknown>>().notNull(),
    occurredAt: integer('occurred_at', { mode: 'timestamp_ms' }).notNull(),
    publishedAt: integer('published_at', { mode: 'timestamp_ms' }),
    attempts: integer('attempts').notNull(),
    nextAttemptAt: integer('next_attempt_at', { mode: 'timestamp_ms' }).notNull(),
    lastError: text('last_error'),
  },
  (t) => ({
    eventIdIdx: uniqueIndex('outbox_event_id_idx').on(t.eventId),
    pendingIdx: index('outbox_pending_idx').on(t.publishedAt, t.nextAttemptAt),
  }),
);

export const schema = {
  notificationRequests,
  deliveryLogs,
  deliveryAttempts,
  notificationTemplates,
  userPreferences,
  idempotencyKeys,
  leases,
  outbox,
};
