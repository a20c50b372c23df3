/**
 * Error taxonomy of the dispatch engine.
 *
 * Every error carries a stable machine-readable `code`; the API error handler
 * maps codes to HTTP statuses and background loops log them.
 */

export type DomainErrorCode =
  | 'VALIDATION_ERROR'
  | 'NOT_FOUND'
  | 'INVALID_STATE_TRANSITION'
  | 'CONCURRENCY_CONFLICT'
  | 'IDEMPOTENCY_CONFLICT'
  | 'TRANSIENT_GATEWAY_ERROR'
  | 'PERMANENT_GATEWAY_ERROR'
  | 'TEMPLATE_NOT_FOUND'
  | 'MISSING_PLACEHOLDER';

export abstract class DomainError extends Error {
  abstract readonly code: DomainErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export interface ValidationIssue {
  path: string;
  message: string;
}

export class ValidationError extends DomainError {
  readonly code = 'VALIDATION_ERROR';

  constructor(
    message: string,
    readonly issues: ValidationIssue[] = [],
  ) {
    super(message);
  }
}

export class NotFoundError extends DomainError {
  readonly code = 'NOT_FOUND';

  constructor(
    readonly entity: string,
    readonly id: string,
  ) {
    super(`${entity} '${id}' not found`);
  }
}

export class InvalidStateTransitionError extends DomainError {
  readonly code = 'INVALID_STATE_TRANSITION';

  constructor(
    readonly entity: string,
    readonly from: string,
    readonly to: string,
  ) {
    super(`Invalid ${entity} transition: ${from} -> ${to}`);
  }
}

/** Optimistic version check failed. Reload and retry. */
export class ConcurrencyConflictError extends DomainError {
  readonly code = 'CONCURRENCY_CONFLICT';

  constructor(
    readonly entity: string,
    readonly id: string,
    readonly expectedVersion: number,
  ) {
    super(`${entity} '${id}' was modified concurrently (expected version ${expectedVersion})`);
  }
}

/** A dedup key is reserved but its request never became readable. */
export class IdempotencyConflictError extends DomainError {
  readonly code = 'IDEMPOTENCY_CONFLICT';

  constructor(readonly dedupKey: string) {
    super(`Dedup key '${dedupKey}' is reserved by a request that is still being created`);
  }
}

/** Timeout, network error, provider 5xx. Retried with backoff. */
export class TransientGatewayError extends DomainError {
  readonly code = 'TRANSIENT_GATEWAY_ERROR';
}

/** Malformed or rejected address. Never retried. */
export class PermanentGatewayError extends DomainError {
  readonly code = 'PERMANENT_GATEWAY_ERROR';
}

export class TemplateNotFoundError extends DomainError {
  readonly code = 'TEMPLATE_NOT_FOUND';

  constructor(
    readonly templateName: string,
    readonly channel: string,
    readonly version?: number,
  ) {
    super(
      version === undefined
        ? `No active template '${templateName}' for channel ${channel}`
        : `Template '${templateName}' v${version} for channel ${channel} does not exist`,
    );
  }
}

export class MissingPlaceholderError extends DomainError {
  readonly code = 'MISSING_PLACEHOLDER';

  constructor(
    readonly placeholder: string,
    readonly templateName: string,
  ) {
    super(`Template '${templateName}' references '{{${placeholder}}}' but no value or default was given`);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
