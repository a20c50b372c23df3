import fastify, { type FastifyInstance } from 'fastify';
import { env } from './config/env';
import type { Container } from './container';
import requestContextPlugin from './api/middleware/request-context';
import errorHandlerPlugin from './api/middleware/error-handler';
import { healthRoutes } from './api/health';
import { versionRoutes } from './api/version';
import { notificationRoutes } from './api/notifications';
import { deliveryRoutes } from './api/delivery';
import { templateRoutes } from './api/templates';
import { preferenceRoutes } from './api/preferences';

/**
 * Creates and configures the Fastify application.
 * Exported as a factory so tests can create isolated instances over their
 * own container.
 */
export function buildApp(container: Container): FastifyInstance {
  const app = fastify({
    logger: {
      level: env.LOG_LEVEL,
      transport:
        env.NODE_ENV === 'development'
          ? { target: 'pino-pretty', options: { colorize: true } }
          : undefined,
    },
  });

  // Middleware: request_id + structured logging on all routes
  void app.register(requestContextPlugin);
  void app.register(errorHandlerPlugin);

  // Register routes
  void app.register(healthRoutes, { container });
  void app.register(versionRoutes);
  void app.register(notificationRoutes, { container });
  void app.register(deliveryRoutes, { container });
  void app.register(templateRoutes, { container });
  void app.register(preferenceRoutes, { container });

  return app;
}
