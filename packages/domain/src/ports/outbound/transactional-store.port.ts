import type { CountPredicate, ItemSeed } from '../../entities/item.js';
import type { IsolationLevel } from '../../entities/isolation-level.js';
import type { FixtureSpec } from '../../entities/scenario.js';

/**
 * One live connection to the store. Failures surface as HarnessError subclasses:
 * SerializationFailure and LockTimeout for expected conflicts, StepExecutionError
 * for everything else.
 */
export interface StoreSessionPort {
  readonly label: string;
  begin(level: IsolationLevel): Promise<void>;
  /** Price of the row visible to the current transaction, null if none is. */
  readPrice(itemId: number): Promise<number | null>;
  countMatching(predicate: CountPredicate): Promise<number>;
  /** `price = price + delta`; resolves to the number of rows changed. */
  addToPrice(itemId: number, delta: number): Promise<number>;
  /** Resolves to the id of the inserted row. */
  insertItem(row: ItemSeed): Promise<number>;
  commit(): Promise<void>;
  rollback(): Promise<void>;
  /** Returns the connection; idempotent. */
  close(): Promise<void>;
}

export interface TransactionalStorePort {
  readonly driver: string;
  openSession(label: string): Promise<StoreSessionPort>;
  ensureSchema(): Promise<void>;
  /** Replace every fixture row with `fixture.rows`, outside any actor transaction. */
  resetFixture(fixture: FixtureSpec): Promise<void>;
  readCommittedPrice(itemId: number): Promise<number | null>;
  ping(): Promise<void>;
  close(): Promise<void>;
}
