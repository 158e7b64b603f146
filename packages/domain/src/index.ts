// ─── Entities ─────────────────────────────────────────────────────────────────
export * from './entities/item.js';
export * from './entities/isolation-level.js';
export * from './entities/transaction-actor.js';
export * from './entities/scenario.js';
export * from './entities/scenario-result.js';

// ─── Errors ───────────────────────────────────────────────────────────────────
export * from './errors/harness-errors.js';

// ─── Inbound Ports ────────────────────────────────────────────────────────────
export * from './ports/inbound/scenario-command.port.js';

// ─── Outbound Ports ───────────────────────────────────────────────────────────
export * from './ports/outbound/transactional-store.port.js';
export * from './ports/outbound/sleeper.port.js';
