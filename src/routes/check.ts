import type { FastifyInstance, FastifyRequest } from 'fastify';
import type { Core } from '../core/core.js';

export const MAX_BATCH = 100;

export async function registerCheckRoutes(app: FastifyInstance, core: Core): Promise<void> {
  app.post(
    '/api/check',
    {
      config: {
        rateLimit: {
          max: 600,
          timeWindow: '1 minute'
        }
      },
      schema: {
        body: {
          type: 'object',
          required: ['domain'],
          additionalProperties: false,
          properties: {
            domain: { type: 'string', minLength: 1, maxLength: 255 },
            qtype: { type: 'string', minLength: 1, maxLength: 10 }
          }
        }
      }
    },
    async (request: FastifyRequest<{ Body: { domain: string; qtype?: string } }>) => {
      return core.check(request.body.domain, request.body.qtype);
    }
  );

  // Results are positional; names are never echoed back.
  app.post(
    '/api/check/batch',
    {
      config: {
        rateLimit: {
          max: 120,
          timeWindow: '1 minute'
        }
      },
      schema: {
        body: {
          type: 'object',
          required: ['domains'],
          additionalProperties: false,
          properties: {
            domains: {
              type: 'array',
              minItems: 1,
              maxItems: MAX_BATCH,
              items: { type: 'string', maxLength: 255 }
            }
          }
        }
      }
    },
    async (request: FastifyRequest<{ Body: { domains: string[] } }>) => {
      const results = core.checkBatch(request.body.domains).map((r, index) => (r ? { index, ...r } : { index, error: 'VALIDATION' }));
      return { results };
    }
  );
}
