import type { FastifyError, FastifyInstance } from 'fastify';
import fp from 'fastify-plugin';
import { DomainError, ValidationError, type DomainErrorCode } from '../../domain/errors';
import type { ApiError } from '../../types/common';

const STATUS_BY_CODE: Record<DomainErrorCode, number> = {
  VALIDATION_ERROR: 400,
  NOT_FOUND: 404,
  INVALID_STATE_TRANSITION: 409,
  CONCURRENCY_CONFLICT: 409,
  IDEMPOTENCY_CONFLICT: 409,
  TEMPLATE_NOT_FOUND: 422,
  MISSING_PLACEHOLDER: 422,
  TRANSIENT_GATEWAY_ERROR: 502,
  PERMANENT_GATEWAY_ERROR: 502,
};

/**
 * Maps domain errors to HTTP responses in one place.
 * Body: `{ error: <snake_case code>, message }`, plus `issues` for validation.
 */
async function errorHandlerPlugin(app: FastifyInstance): Promise<void> {
  app.setErrorHandler((error: FastifyError, request, reply) => {
    if (error instanceof DomainError) {
      const statusCode = STATUS_BY_CODE[error.code];
      const body: ApiError & { issues?: unknown } = {
        error: error.code.toLowerCase(),
        message: error.message,
      };
      if (error instanceof ValidationError) body.issues = error.issues;

      request.log.info(
        { requestId: request.requestId, code: error.code, statusCode },
        'api.request.rejected',
      );
      return reply.status(statusCode).send(body);
    }

    // Fastify's own 4xx (malformed JSON, payload too large, ...)
    if (error.statusCode !== undefined && error.statusCode < 500) {
      return reply
        .status(error.statusCode)
        .send({ error: 'bad_request', message: error.message } satisfies ApiError);
    }

    request.log.error({ requestId: request.requestId, err: error }, 'api.request.error');
    return reply
      .status(500)
      .send({ error: 'internal_error', message: 'Internal server error' } satisfies ApiError);
  });
}

export default fp(errorHandlerPlugin, {
  name: 'error-handler',
});
