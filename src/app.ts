import Fastify, { type FastifyError } from 'fastify';
import rateLimit from '@fastify/rate-limit';

import type { AppConfig } from './config.js';
import type { Core } from './core/core.js';
import { CoreError } from './core/errors.js';
import { loggerOptions } from './logger.js';
import { statusForKind } from './routes/httpErrors.js';
import { registerHealthRoutes } from './routes/health.js';
import { registerCheckRoutes } from './routes/check.js';
import { registerResolveRoutes } from './routes/resolve.js';
import { registerBlocklistsRoutes } from './routes/blocklists.js';
import { registerStatsRoutes } from './routes/stats.js';
import { registerCacheRoutes } from './routes/cache.js';
import { registerServersRoutes } from './routes/servers.js';

/** HTTP adapter around a core. The caller owns the core's lifecycle. */
export async function buildApp(config: AppConfig, core: Core) {
  const app = Fastify({
    logger: config.NODE_ENV === 'test' ? false : loggerOptions(config)
  });

  await app.register(rateLimit, {
    global: false,
    max: 600,
    timeWindow: '1 minute'
  });

  app.setErrorHandler((err: FastifyError, request, reply) => {
    if (err instanceof CoreError) {
      return reply.code(statusForKind(err.kind)).send({ error: err.kind, message: err.message });
    }
    if (err.validation) {
      return reply.code(400).send({ error: 'VALIDATION', message: 'invalid request body' });
    }
    if (err.statusCode && err.statusCode < 500) {
      return reply.code(err.statusCode).send({ error: err.code || 'BAD_REQUEST', message: err.message });
    }
    request.log.error({ err: err.name }, 'unhandled request error');
    return reply.code(500).send({ error: 'INTERNAL', message: 'internal error' });
  });

  await registerHealthRoutes(app, config, core);
  await registerCheckRoutes(app, core);
  await registerResolveRoutes(app, config, core);
  await registerBlocklistsRoutes(app, core);
  await registerStatsRoutes(app, core);
  await registerCacheRoutes(app, core);
  await registerServersRoutes(app, core);

  return app;
}
