import type { FastifyInstance } from 'fastify';
import type { AppConfig } from '../config.js';
import type { Core } from '../core/core.js';

export async function registerHealthRoutes(app: FastifyInstance, config: AppConfig, core: Core): Promise<void> {
  app.get('/api/health', async () => {
    return {
      ok: true,
      ready: core.ready,
      env: config.NODE_ENV,
      time: new Date().toISOString()
    };
  });
}
