import type { FastifyInstance } from 'fastify';
import type { Core } from '../core/core.js';

export async function registerStatsRoutes(app: FastifyInstance, core: Core): Promise<void> {
  app.get(
    '/api/stats',
    {
      config: {
        rateLimit: {
          max: 120,
          timeWindow: '1 minute'
        }
      }
    },
    async () => core.stats()
  );
}
