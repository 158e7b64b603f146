import 'dotenv/config';
import { createSleeper, createStore, loadStoreConfig } from '@anomaly-lab/adapters';
import { AnomalyLabService } from '@anomaly-lab/harness';
import { EXIT_ERROR, runCli } from './cli.js';

/**
 * Anomaly lab runner, one invocation per scenario.
 *
 * Env vars:
 *   SCENARIO_ID          scenario to run when no argument is given
 *   STORE_DRIVER         postgres (default) | memory
 *   DATABASE_URL         PostgreSQL connection string
 *   FIXTURE_TABLE        lab-owned contention table, emptied on every run (default: anomaly_items)
 *   STATEMENT_TIMEOUT_MS per-statement budget (default: 5000)
 *   LOCK_TIMEOUT_MS      row-lock wait budget (default: 2000)
 *   SLEEP_MODE           virtual (default) | wall
 */
async function main(): Promise<number> {
  const config = loadStoreConfig();
  const store = createStore(config);
  try {
    await store.ensureSchema();
    const service = new AnomalyLabService({ store, sleeper: createSleeper(config) });
    return await runCli(process.argv[2] ?? process.env['SCENARIO_ID'], service, {
      out: (line) => console.log(line),
      err: (line) => console.error(line),
    });
  } finally {
    await store.close();
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    console.error('[runner] fatal error', err);
    process.exitCode = EXIT_ERROR;
  });
