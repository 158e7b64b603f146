import 'dotenv/config';
import { createServer } from 'http';
import { createSleeper, createStore, loadStoreConfig } from '@anomaly-lab/adapters';
import { AnomalyLabService } from '@anomaly-lab/harness';
import { buildApp } from './app.js';

const PORT = parseInt(process.env['PORT'] ?? '3002', 10);

async function main() {
  const config = loadStoreConfig();
  const store = createStore(config);

  await store.ping();
  await store.ensureSchema();
  console.log(`[server] ${store.driver} store ready`);

  const service = new AnomalyLabService({ store, sleeper: createSleeper(config) });
  const httpServer = createServer(buildApp({ service, store }));

  httpServer.listen(PORT, () => {
    console.log(`[server] listening on http://0.0.0.0:${PORT}`);
  });

  const shutdown = () => {
    console.log('[server] shutting down...');
    httpServer.close(() => {
      store
        .close()
        .catch((err) => console.error('[server] closing store failed', err))
        .finally(() => process.exit(0));
    });
  };

  process.on('SIGTERM', shutdown);
  process.on('SIGINT', shutdown);
}

main().catch((err) => {
  console.error('[server] fatal startup error', err);
  process.exit(1);
});
