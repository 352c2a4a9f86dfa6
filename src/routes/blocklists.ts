import type { FastifyInstance, FastifyRequest } from 'fastify';
import type { Core } from '../core/core.js';
import { parseSourceList } from '../core/coreConfig.js';

export async function registerBlocklistsRoutes(app: FastifyInstance, core: Core): Promise<void> {
  app.get(
    '/api/blocklists/sources',
    {
      config: {
        rateLimit: {
          max: 120,
          timeWindow: '1 minute'
        }
      }
    },
    async () => {
      const items = core.sources().map((s) => ({
        ...s,
        lastUpdate: s.lastUpdate === null ? null : new Date(s.lastUpdate).toISOString()
      }));
      return { items };
    }
  );

  // Without a body the configured sources are refreshed; with `sources` the
  // list is replaced (sources left out lose their entries).
  app.post(
    '/api/blocklists/reload',
    {
      config: {
        rateLimit: {
          max: 6,
          timeWindow: '1 minute'
        }
      }
    },
    async (request: FastifyRequest<{ Body: unknown }>) => {
      const body = request.body;
      const sources =
        typeof body === 'object' && body !== null && 'sources' in body && body.sources !== undefined
          ? parseSourceList(body.sources)
          : undefined;
      const summary = await core.reload(sources);
      return {
        ok: true,
        totalEntries: summary.totalEntries,
        dropped: summary.dropped,
        durationMs: summary.durationMs,
        results: summary.results
      };
    }
  );
}
