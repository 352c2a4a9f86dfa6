import { loadConfig } from './config.js';
import { buildApp } from './app.js';
import { createCore } from './core/core.js';
import { loadCoreConfig } from './core/coreConfig.js';
import { errorCode } from './core/errors.js';

async function main(): Promise<void> {
  const config = loadConfig();
  // Fatal on invalid sources/servers.
  const coreConfig = await loadCoreConfig(config.HUSHDNS_CONFIG_FILE);

  const core = createCore(config, coreConfig);
  const app = await buildApp(config, core);

  const shutdown = async (signal: string) => {
    core.logger.info({ signal }, 'shutting down');
    try {
      await app.close();
      await core.close();
    } catch (err) {
      core.logger.error({ err: errorCode(err) }, 'shutdown failed');
    }
    process.exit(0);
  };
  process.once('SIGINT', (s) => void shutdown(s));
  process.once('SIGTERM', (s) => void shutdown(s));

  await app.listen({ host: config.HOST, port: config.PORT });

  // Checks answer "not ready" until the first snapshot is published.
  void core
    .start()
    .then((summary) => core.logger.info({ entries: summary.totalEntries, durationMs: summary.durationMs }, 'initial blocklist load done'))
    .catch((err: unknown) => core.logger.error({ err: errorCode(err) }, 'initial blocklist load failed'));

  if (config.TEST_SERVERS_ON_START) {
    void core
      .testServers()
      .then((results) => {
        for (const r of results) {
          core.logger.info({ server: r.server, protocol: r.protocol, success: r.success, latencyMs: r.latencyMs, err: r.error }, 'upstream server test');
        }
      })
      .catch((err: unknown) => core.logger.error({ err: errorCode(err) }, 'upstream server test failed'));
  }
}

main().catch((err) => {
  // eslint-disable-next-line no-console
  console.error(err);
  process.exit(1);
});
