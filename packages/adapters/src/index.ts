// ─── PostgreSQL Adapters ───────────────────────────────────────────────────────
export { createPool, withTransaction } from './postgres/pool.js';
export type { DbPool, DbClient, PoolOptions } from './postgres/pool.js';
export { PgTransactionalStore } from './postgres/pg-store.js';
export type { PgStoreOptions } from './postgres/pg-store.js';
export { PgStoreSession } from './postgres/pg-session.js';
export { classifyPgError, isPgError } from './postgres/error-codes.js';

// ─── In-process Store ─────────────────────────────────────────────────────────
export { InMemoryIsolationStore } from './memory/memory-store.js';
export type { InMemoryStoreOptions } from './memory/memory-store.js';
export { MvccEngine } from './memory/mvcc-engine.js';

// ─── Clock ────────────────────────────────────────────────────────────────────
export { DeterministicClock, WallClock } from './clock/deterministic-clock.js';

// ─── Configuration ────────────────────────────────────────────────────────────
export { loadStoreConfig } from './config/store-config.js';
export type { StoreConfig, StoreDriver, SleepMode } from './config/store-config.js';
export { createStore, createSleeper } from './store-factory.js';
