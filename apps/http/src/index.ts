// apps/http/src/index.ts
import { loadNetworks } from '@netlace/core';
import { SqlStore } from '@netlace/store-sql';
import { buildApp } from './app';
import { loadConfig } from './config';

async function main() {
  const config = loadConfig();
  const registry = loadNetworks(config.NETWORKS_PATH);
  const store = SqlStore.connect(config.DB_URI);

  const app = await buildApp({
    registry,
    store,
    logLevel: config.LOG_LEVEL,
    corsOrigins: config.CORS_ORIGIN,
    rateLimitMax: config.RATE_LIMIT_MAX
  });
  app.addHook('onClose', async () => store.close());

  app.log.info(
    {
      db_uri: process.env.DB_URI ? 'env:DB_URI' : 'default',
      networks: config.NETWORKS_PATH ?? 'networks.json (search)',
      entities: registry.list().map((t) => t.entity)
    },
    'store-config'
  );

  const onShutdown = async (signal: string) => {
    app.log.info({ signal }, 'shutting-down');
    try {
      await app.close();
    } finally {
      process.exit(0);
    }
  };
  process.on('SIGINT', () => void onShutdown('SIGINT'));
  process.on('SIGTERM', () => void onShutdown('SIGTERM'));

  await app.listen({ port: config.PORT, host: config.HOST });
}

main().catch((err) => {
  // eslint-disable-next-line no-console
  console.error('Fatal boot error', err);
  process.exit(1);
});
