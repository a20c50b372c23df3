import type { Database } from 'better-sqlite3';

/**
 * DDL for every table. Must match the drizzle schema in ./schema.ts.
 * Idempotent: safe to run on every start.
 */
const SCHEMA = `
CREATE TABLE IF NOT EXISTS notification_requests (
  id TEXT PRIMARY KEY NOT NULL,
  type TEXT NOT NULL,
  payload TEXT NOT NULL,
  recipients TEXT NOT NULL,
  channel_preferences TEXT NOT NULL,
  urgency TEXT NOT NULL,
  scheduled_at INTEGER,
  correlation_id TEXT NOT NULL,
  dedup_key TEXT NOT NULL,
  status TEXT NOT NULL,
  version INTEGER NOT NULL,
  deferred_until INTEGER,
  template_versions TEXT NOT NULL,
  failure_reason TEXT,
  cancel_requested_at INTEGER,
  last_picked_at INTEGER,
  created_at INTEGER NOT NULL,
  updated_at INTEGER NOT NULL
);
CREATE UNIQUE INDEX IF NOT EXISTS notification_requests_dedup_key_idx ON notification_requests(dedup_key);
CREATE INDEX IF NOT EXISTS notification_requests_due_idx ON notification_requests(status, deferred_until);

CREATE TABLE IF NOT EXISTS delivery_logs (
  id TEXT PRIMARY KEY NOT NULL,
  request_id TEXT NOT NULL,
  correlation_id TEXT NOT NULL,
  recipient_id TEXT NOT NULL,
  notification_type TEXT NOT NULL,
  channel TEXT NOT NULL,
  address TEXT NOT NULL,
  provider_message_id TEXT,
  current_status TEXT NOT NULL,
  failure_reason TEXT,
  version INTEGER NOT NULL,
  created_at INTEGER NOT NULL,
  updated_at INTEGER NOT NULL
);
CREATE UNIQUE INDEX IF NOT EXISTS delivery_logs_dispatch_key_idx ON delivery_logs(request_id, channel, address);
CREATE INDEX IF NOT EXISTS delivery_logs_address_idx ON delivery_logs(address);
CREATE INDEX IF NOT EXISTS delivery_logs_provider_message_id_idx ON delivery_logs(provider_message_id);
CREATE INDEX IF NOT EXISTS delivery_logs_recipient_idx ON delivery_logs(recipient_id, notification_type);

-- Append-only. Rows are never updated.
CREATE TABLE IF NOT EXISTS delivery_attempts (
  log_id TEXT NOT NULL,
  seq INTEGER NOT NULL,
  kind TEXT NOT NULL,
  status TEXT NOT NULL,
  failure_reason TEXT,
  occurred_at INTEGER NOT NULL,
  PRIMARY KEY (log_id, seq)
);

CREATE TABLE IF NOT EXISTS notification_templates (
  id TEXT PRIMARY KEY NOT NULL,
  name TEXT NOT NULL,
  channel TEXT NOT NULL,
  subject TEXT NOT NULL,
  body TEXT NOT NULL,
  defaults TEXT NOT NULL,
  version INTEGER NOT NULL,
  status TEXT NOT NULL,
  created_at INTEGER NOT NULL
);
CREATE UNIQUE INDEX IF NOT EXISTS notification_templates_version_idx ON notification_templates(name, channel, version);

CREATE TABLE IF NOT EXISTS user_preferences (
  user_id TEXT PRIMARY KEY NOT NULL,
  opt_outs TEXT NOT NULL,
  do_not_disturb TEXT,
  frequency_limits TEXT NOT NULL,
  version INTEGER NOT NULL,
  updated_at INTEGER NOT NULL
);

CREATE TABLE IF NOT EXISTS idempotency_keys (
  key TEXT PRIMARY KEY NOT NULL,
  ref TEXT NOT NULL,
  expires_at INTEGER NOT NULL
);

CREATE TABLE IF NOT EXISTS leases (
  key TEXT PRIMARY KEY NOT NULL,
  holder TEXT NOT NULL,
  expires_at INTEGER NOT NULL
);

CREATE TABLE IF NOT EXISTS outbox (
  position INTEGER PRIMARY KEY AUTOINCREMENT,
  event_id TEXT NOT NULL,
  aggregate_type TEXT NOT NULL,
  aggregate_id TEXT NOT NULL,
  event_type TEXT NOT NULL,
  correlation_id TEXT,
  payload TEXT NOT NULL,
  occurred_at INTEGER NOT NULL,
  published_at INTEGER,
  attempts INTEGER NOT NULL,
  next_attempt_at INTEGER NOT NULL,
  last_error TEXT
);
CREATE UNIQUE INDEX IF NOT EXISTS outbox_event_id_idx ON outbox(event_id);
CREATE INDEX IF NOT EXISTS outbox_pending_idx ON outbox(published_at, next_attempt_at);
`;

export function migrate(sqlite: Database): void {
  sqlite.exec(SCHEMA);
}
