import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import type { AppConfig } from '../config.js';
import type { Core } from '../core/core.js';
import { statusForKind } from './httpErrors.js';
import { withMessageId } from '../resolver/dnsMessage.js';

type ResolveBody = {
  domain: string;
  qtype?: string;
  deadlineMs?: number;
  // DNS message id to answer with; defaults to the upstream message's id.
  id?: number;
};

export async function registerResolveRoutes(app: FastifyInstance, config: AppConfig, core: Core): Promise<void> {
  app.post(
    '/api/resolve',
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
            qtype: { type: 'string', minLength: 1, maxLength: 10 },
            deadlineMs: { type: 'integer', minimum: 1, maximum: 60_000 },
            id: { type: 'integer', minimum: 0, maximum: 65535 }
          }
        }
      }
    },
    async (request: FastifyRequest<{ Body: ResolveBody }>, reply: FastifyReply) => {
      const { domain, qtype = 'A', deadlineMs = config.RESOLVE_DEADLINE_MS, id } = request.body;
      const res = await core.resolve(domain, qtype, deadlineMs);

      if (res.error) {
        return reply.code(statusForKind(res.error)).send({ error: res.error, message: 'resolution did not complete' });
      }

      const payload = res.response && id !== undefined ? withMessageId(res.response, id) : res.response;
      return {
        blocked: res.blocked,
        category: res.category,
        cached: res.cached,
        ttlSeconds: res.ttlSeconds,
        ready: res.ready,
        response: payload ? payload.toString('base64') : null
      };
    }
  );
}
