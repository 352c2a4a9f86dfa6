import type { FastifyInstance } from 'fastify';
import type { Core } from '../core/core.js';

export async function registerCacheRoutes(app: FastifyInstance, core: Core): Promise<void> {
  app.post(
    '/api/cache/clear',
    {
      config: {
        rateLimit: {
          max: 10,
          timeWindow: '1 minute'
        }
      }
    },
    async () => ({ ok: true, removed: core.clearCache() })
  );
}
