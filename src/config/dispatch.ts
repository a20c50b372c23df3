/**
 * Dispatch engine configuration.
 * Retry, lease and timeout knobs for the orchestrator and its background loops.
 */
import { env } from './env';

export type DeliveryStrategy = 'fallback' | 'broadcast';

export interface DispatchConfig {
  /** Gateway calls per (request, channel, address) before the log fails. */
  maxAttempts: number;

  /** First backoff delay; doubles on every transient failure. */
  baseDelayMs: number;

  /** Upper bound for a single backoff delay. */
  maxDelayMs: number;

  /** Every gateway call is raced against this; losing counts as transient. */
  gatewayTimeoutMs: number;

  /** Lease on a dispatch key. Renewed before each attempt, expires on crash. */
  leaseTtlMs: number;

  /** How long a dedup key reservation outlives the create call. */
  idempotencyTtlMs: number;

  /**
   * fallback: try a recipient's allowed channels in order, stop at first success.
   * broadcast: send on every allowed channel at once.
   */
  deliveryStrategy: DeliveryStrategy;

  /**
   * A Sent message with no delivery receipt after this long counts as
   * reached, so its request can finish.
   */
  receiptWaitMs: number;

  /** Re-reads of an idempotency reservation whose request is not yet visible. */
  reservationReadAttempts: number;
  reservationReadDelayMs: number;

  /** Compare-and-swap retries when sibling dispatches reconcile at once. */
  reconcileMaxConflicts: number;
}

export const dispatchConfig: DispatchConfig = {
  maxAttempts: env.DISPATCH_MAX_ATTEMPTS,
  baseDelayMs: env.DISPATCH_BASE_DELAY_MS,
  maxDelayMs: env.DISPATCH_MAX_DELAY_MS,
  gatewayTimeoutMs: env.GATEWAY_TIMEOUT_MS,
  leaseTtlMs: env.LEASE_TTL_MS,
  idempotencyTtlMs: env.IDEMPOTENCY_TTL_MS,
  deliveryStrategy: env.DELIVERY_STRATEGY,
  receiptWaitMs: env.RECEIPT_WAIT_MS,
  reservationReadAttempts: 5,
  reservationReadDelayMs: 20,
  reconcileMaxConflicts: 10,
};

export interface RelayConfig {
  pollIntervalMs: number;
  batchSize: number;
  /** Backoff for a row whose publish failed: base · 2^(attempts-1), capped. */
  retryBaseMs: number;
  retryMaxMs: number;
}

export const relayConfig: RelayConfig = {
  pollIntervalMs: env.OUTBOX_POLL_MS,
  batchSize: env.OUTBOX_BATCH_SIZE,
  retryBaseMs: 1000,
  retryMaxMs: 60_000,
};

export interface WorkerConfig {
  pollIntervalMs: number;
  batchSize: number;
  /** Open requests untouched for this long are treated as abandoned and resumed. */
  staleAfterMs: number;
}

export const workerConfig: WorkerConfig = {
  pollIntervalMs: env.WORKER_POLL_MS,
  batchSize: 50,
  staleAfterMs: 5 * 60_000,
};
