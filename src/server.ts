import { buildApp } from './app';
import { env } from './config/env';
import { logger } from './config/logger';
import { createContainer } from './container';

const container = createContainer();
const app = buildApp(container);

const shutdown = async (signal: string): Promise<void> => {
  logger.info({ signal }, 'server.stopping');
  try {
    await app.close();
    await container.worker.stop();
    await container.lifecycle.idle();
    await container.relay.stop();
    container.close();
    process.exit(0);
  } catch (err) {
    logger.error({ err }, 'server.shutdown_failed');
    process.exit(1);
  }
};

const start = async (): Promise<void> => {
  try {
    await app.listen({ port: env.PORT, host: '0.0.0.0' });

    container.relay.start();
    container.worker.start();

    logger.info({ port: env.PORT, env: env.NODE_ENV }, 'server.started');
  } catch (err) {
    app.log.error(err);
    process.exit(1);
  }
};

process.once('SIGINT', (signal) => void shutdown(signal));
process.once('SIGTERM', (signal) => void shutdown(signal));

void start();
