/**
 * In-process Store Tests
 *
 * Exercises InMemoryIsolationStore through the session port only, with the
 * statement orders the anomaly scenarios rely on.
 */

import { describe, it, expect, beforeEach } from '@jest/globals';
import { LockTimeout, SerializationFailure, StepExecutionError } from '@anomaly-lab/domain';
import type { StoreSessionPort } from '@anomaly-lab/domain';
import { InMemoryIsolationStore } from '../memory/memory-store.js';

const PHANTOM_ROWS = [
  { id: 1, name: 'widget', price: 100 },
  { id: 2, name: 'gadget', price: 75 },
  { id: 3, name: 'gizmo', price: 50 },
  { id: 4, name: 'trinket', price: 10 },
  { id: 5, name: 'relic', price: 120, deleted: true },
];

let store: InMemoryIsolationStore;
let a: StoreSessionPort;
let b: StoreSessionPort;

beforeEach(async () => {
  store = new InMemoryIsolationStore({ lockTimeoutMs: 20 });
  await store.resetFixture({ rows: [{ id: 1, name: 'Apple', price: 150 }] });
  a = await store.openSession('A');
  b = await store.openSession('B');
});

// ═══════════════════════════════════════════════════════════════════════════════
// Visibility
// ═══════════════════════════════════════════════════════════════════════════════

describe('uncommitted writes', () => {
  it('are visible to their own transaction only', async () => {
    await a.begin('READ_COMMITTED');
    expect(await a.addToPrice(1, 50)).toBe(1);
    expect(await a.readPrice(1)).toBe(200);

    await b.begin('READ_COMMITTED');
    expect(await b.readPrice(1)).toBe(150);
  });

  it('stay invisible to READ UNCOMMITTED readers', async () => {
    await a.begin('READ_COMMITTED');
    await a.addToPrice(1, 50);
    await b.begin('READ_UNCOMMITTED');
    expect(await b.readPrice(1)).toBe(150);
  });

  it('disappear on rollback', async () => {
    await a.begin('READ_COMMITTED');
    await a.addToPrice(1, 50);
    await a.rollback();
    expect(await store.readCommittedPrice(1)).toBe(150);
  });

  it('returns null for rows that do not exist', async () => {
    await a.begin('READ_COMMITTED');
    expect(await a.readPrice(999)).toBeNull();
    expect(await a.addToPrice(999, 1)).toBe(0);
  });
});

describe('READ COMMITTED', () => {
  it('sees a commit that lands between two reads', async () => {
    await a.begin('READ_COMMITTED');
    expect(await a.readPrice(1)).toBe(150);

    await b.begin('READ_COMMITTED');
    await b.addToPrice(1, 1);
    await b.commit();

    expect(await a.readPrice(1)).toBe(151);
  });

  it('sees rows inserted and committed between two counts', async () => {
    await store.resetFixture({ rows: PHANTOM_ROWS });
    await a.begin('READ_COMMITTED');
    expect(await a.countMatching({ minPrice: 50 })).toBe(3);

    await b.begin('READ_COMMITTED');
    expect(await b.insertItem({ name: 'phantom-1', price: 100 })).toBe(6);
    await b.commit();

    expect(await a.countMatching({ minPrice: 50 })).toBe(4);
  });
});

describe('REPEATABLE READ', () => {
  it('keeps the snapshot of its first statement', async () => {
    await a.begin('REPEATABLE_READ');
    expect(await a.readPrice(1)).toBe(150);

    await b.begin('READ_COMMITTED');
    await b.addToPrice(1, 1);
    await b.commit();

    expect(await a.readPrice(1)).toBe(150);
    await a.commit();
    expect(await store.readCommittedPrice(1)).toBe(151);
  });

  it('takes the snapshot at the first statement, not at BEGIN', async () => {
    await a.begin('REPEATABLE_READ');

    await b.begin('READ_COMMITTED');
    await b.addToPrice(1, 1);
    await b.commit();

    expect(await a.readPrice(1)).toBe(151);
  });

  it('refuses to update a row changed after its snapshot', async () => {
    await a.begin('REPEATABLE_READ');
    await a.readPrice(1);

    await b.begin('READ_COMMITTED');
    await b.addToPrice(1, 1);
    await b.commit();

    await expect(a.addToPrice(1, 1)).rejects.toBeInstanceOf(SerializationFailure);
  });
});

describe('SERIALIZABLE', () => {
  beforeEach(async () => {
    await store.resetFixture({ rows: PHANTOM_ROWS });
  });

  it('counts the same rows twice and commits when it wrote nothing', async () => {
    await a.begin('SERIALIZABLE');
    expect(await a.countMatching({ minPrice: 50 })).toBe(3);

    await b.begin('READ_COMMITTED');
    await b.insertItem({ name: 'serial-1', price: 100 });
    await b.commit();

    expect(await a.countMatching({ minPrice: 50 })).toBe(3);
    await expect(a.commit()).resolves.toBeUndefined();
  });

  it('fails the commit of a writer whose predicate read went stale', async () => {
    await a.begin('SERIALIZABLE');
    await a.countMatching({ minPrice: 50 });

    await b.begin('READ_COMMITTED');
    await b.insertItem({ name: 'serial-1', price: 100 });
    await b.commit();

    await a.addToPrice(4, 1);
    await expect(a.commit()).rejects.toBeInstanceOf(SerializationFailure);
    expect(await store.readCommittedPrice(4)).toBe(10);
  });

  it('commits a writer when concurrent changes miss everything it read', async () => {
    await a.begin('SERIALIZABLE');
    await a.countMatching({ minPrice: 500 });

    await b.begin('READ_COMMITTED');
    await b.insertItem({ name: 'cheap', price: 5 });
    await b.commit();

    await a.addToPrice(4, 1);
    await a.commit();
    expect(await store.readCommittedPrice(4)).toBe(11);
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// Locks and housekeeping
// ═══════════════════════════════════════════════════════════════════════════════

describe('row locks', () => {
  it('time out a writer blocked by another open writer', async () => {
    await a.begin('READ_COMMITTED');
    await a.addToPrice(1, 1);

    await b.begin('READ_COMMITTED');
    await expect(b.addToPrice(1, 1)).rejects.toBeInstanceOf(LockTimeout);
  });

  it('hand the row to a waiter once the holder commits', async () => {
    await a.begin('READ_COMMITTED');
    await a.addToPrice(1, 1);

    await b.begin('READ_COMMITTED');
    const blocked = b.addToPrice(1, 10);
    await a.commit();

    expect(await blocked).toBe(1);
    expect(await b.readPrice(1)).toBe(161);
    await b.commit();
    expect(await store.readCommittedPrice(1)).toBe(161);
  });

  it('reject a duplicate primary key', async () => {
    await a.begin('READ_COMMITTED');
    await expect(a.insertItem({ id: 1, name: 'Apple again', price: 1 })).rejects.toBeInstanceOf(
      StepExecutionError,
    );
  });
});

describe('fixture reset', () => {
  it('refuses to run while a transaction is open', async () => {
    await a.begin('READ_COMMITTED');
    await expect(store.resetFixture({ rows: [] })).rejects.toBeInstanceOf(StepExecutionError);
  });

  it('restarts generated ids after the highest seeded id', async () => {
    await store.resetFixture({ rows: [{ id: 10, name: 'ten', price: 1 }] });
    expect(await a.insertItem({ name: 'eleven', price: 1 })).toBe(11);
  });

  it('close rolls back whatever the session left open', async () => {
    await a.begin('READ_COMMITTED');
    await a.addToPrice(1, 50);
    await a.close();
    expect(store.openSessions).toBe(1);
    expect(store.engine.openTransactions).toBe(0);
    expect(await store.readCommittedPrice(1)).toBe(150);
  });
});
