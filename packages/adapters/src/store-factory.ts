import type { SleeperPort, TransactionalStorePort } from '@anomaly-lab/domain';
import type { StoreConfig } from './config/store-config.js';
import { createPool } from './postgres/pool.js';
import { PgTransactionalStore } from './postgres/pg-store.js';
import { InMemoryIsolationStore } from './memory/memory-store.js';
import { DeterministicClock, WallClock } from './clock/deterministic-clock.js';

export function createStore(config: StoreConfig): TransactionalStorePort {
  if (config.driver === 'memory') {
    return new InMemoryIsolationStore({
      lockTimeoutMs: config.lockTimeoutMs,
      table: config.fixtureTable,
    });
  }
  return new PgTransactionalStore({
    pool: createPool({
      connectionString: config.databaseUrl,
      applicationName: 'anomaly-lab',
      statementTimeoutMs: config.statementTimeoutMs,
      lockTimeoutMs: config.lockTimeoutMs,
    }),
    table: config.fixtureTable,
    statementTimeoutMs: config.statementTimeoutMs,
    lockTimeoutMs: config.lockTimeoutMs,
  });
}

export function createSleeper(config: Pick<StoreConfig, 'sleepMode'>): SleeperPort {
  return config.sleepMode === 'wall' ? new WallClock() : new DeterministicClock(Date.now());
}
