import type { FastifyInstance } from 'fastify';
import { env } from '../config/env';
import pkg from '../../package.json';

const startedAt = Date.now();

interface VersionInfo {
  name: string;
  version: string;
  environment: string;
  /** Build commit, when the deploy sets GIT_SHA. */
  commit: string | null;
  uptimeSeconds: number;
}

export async function versionRoutes(app: FastifyInstance): Promise<void> {
  // GET /version
  app.get('/version', async (_request, reply) => {
    const info: VersionInfo = {
      name: pkg.name,
      version: pkg.version,
      environment: env.NODE_ENV,
      commit: env.GIT_SHA ?? null,
      uptimeSeconds: Math.floor((Date.now() - startedAt) / 1000),
    };
    return reply.send(info);
  });
}
