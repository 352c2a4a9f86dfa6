import type { FastifyInstance, FastifyRequest } from 'fastify';
import { z } from 'zod';
import type { Core } from '../core/core.js';
import { ValidationError } from '../core/errors.js';

const testBody = z
  .object({
    server: z.string().trim().min(1).max(100).optional(),
    domain: z.string().trim().min(1).max(255).optional()
  })
  .strict();

export async function registerServersRoutes(app: FastifyInstance, core: Core): Promise<void> {
  // Connectivity test: one uncached query per server.
  app.post(
    '/api/servers/test',
    {
      config: {
        rateLimit: {
          max: 10,
          timeWindow: '1 minute'
        }
      }
    },
    async (request: FastifyRequest<{ Body: unknown }>) => {
      const parsed = testBody.safeParse(request.body ?? {});
      if (!parsed.success) throw new ValidationError('invalid request body');

      const results = await core.testServers(parsed.data.server, parsed.data.domain);
      return { ok: results.every((r) => r.success), results };
    }
  );
}
