import {
  LockTimeout,
  SerializationFailure,
  StepExecutionError,
  matchesPredicate,
  usesTransactionSnapshot,
} from '@anomaly-lab/domain';
import type { CountPredicate, IsolationLevel, Item, ItemSeed } from '@anomaly-lab/domain';

interface RowVersion {
  /** Commit sequence number that produced this version; seeds are 0. */
  readonly seq: number;
  readonly item: Item;
}

interface LockWaiter {
  readonly txId: number;
  readonly wake: () => void;
}

interface RowLock {
  owner: number;
  readonly waiters: LockWaiter[];
}

interface CommitRecord {
  readonly seq: number;
  readonly txId: number;
  /** Images before and after, so predicate overlap can be checked on either side. */
  readonly touched: ReadonlyArray<{ readonly before: Item | null; readonly after: Item }>;
}

export type TxStatus = 'active' | 'committed' | 'aborted';

export interface MvccTransaction {
  readonly id: number;
  readonly level: IsolationLevel;
  status: TxStatus;
  /** Fixed at the first statement for snapshot levels; unused otherwise. */
  snapshotSeq: number | null;
  readonly writes: Map<number, Item>;
  readonly readIds: Set<number>;
  readonly predicates: CountPredicate[];
}

function roundPrice(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Multi-version row store with PostgreSQL-flavoured isolation:
 *
 * - READ UNCOMMITTED runs as READ COMMITTED, so uncommitted rows are never visible.
 * - READ COMMITTED takes a new snapshot per statement; an UPDATE that waited on a
 *   row lock applies its change to the newest committed version.
 * - REPEATABLE READ and SERIALIZABLE keep the snapshot taken by the first statement.
 *   Updating a row that changed after that snapshot fails with SerializationFailure.
 * - SERIALIZABLE also refuses to commit a transaction that wrote something after
 *   reading rows (or predicates) that a concurrent, already committed transaction
 *   changed.
 *
 * Row locks are exclusive and held until commit or rollback. Waiting longer than
 * `lockTimeoutMs` fails with LockTimeout.
 */
export class MvccEngine {
  private readonly rows = new Map<number, RowVersion[]>();
  private readonly locks = new Map<number, RowLock>();
  private readonly commits: CommitRecord[] = [];
  private readonly active = new Map<number, MvccTransaction>();
  private commitSeq = 0;
  private nextTxId = 1;
  private nextItemId = 1;

  constructor(
    private readonly lockTimeoutMs: number,
    private readonly table = 'anomaly_items',
  ) {}

  get openTransactions(): number {
    return this.active.size;
  }

  reset(seeds: readonly ItemSeed[]): void {
    if (this.active.size > 0) {
      throw new StepExecutionError(
        `cannot reset ${this.table} while ${this.active.size} transaction(s) are open`,
      );
    }
    this.rows.clear();
    this.locks.clear();
    this.commits.length = 0;
    this.commitSeq = 0;
    this.nextItemId = 1;
    for (const seed of seeds) {
      const id = seed.id ?? this.nextItemId;
      if (this.rows.has(id)) {
        throw new StepExecutionError(`duplicate fixture row id=${id} in ${this.table}`);
      }
      this.rows.set(id, [{ seq: 0, item: toItem(id, seed) }]);
      this.nextItemId = Math.max(this.nextItemId, id + 1);
    }
  }

  begin(level: IsolationLevel): MvccTransaction {
    const tx: MvccTransaction = {
      id: this.nextTxId++,
      level,
      status: 'active',
      snapshotSeq: null,
      writes: new Map(),
      readIds: new Set(),
      predicates: [],
    };
    this.active.set(tx.id, tx);
    return tx;
  }

  latestCommitted(itemId: number): Item | null {
    return this.versionAt(itemId, Number.POSITIVE_INFINITY)?.item ?? null;
  }

  read(tx: MvccTransaction, itemId: number): number | null {
    this.assertActive(tx);
    const seq = this.statementSnapshot(tx);
    tx.readIds.add(itemId);
    return this.visible(tx, itemId, seq)?.price ?? null;
  }

  count(tx: MvccTransaction, predicate: CountPredicate): number {
    this.assertActive(tx);
    const seq = this.statementSnapshot(tx);
    tx.predicates.push(predicate);
    const ids = new Set<number>([...this.rows.keys(), ...tx.writes.keys()]);
    let matching = 0;
    for (const id of ids) {
      const item = this.visible(tx, id, seq);
      if (item && matchesPredicate(item, predicate)) matching++;
    }
    return matching;
  }

  async addToPrice(tx: MvccTransaction, itemId: number, delta: number): Promise<number> {
    this.assertActive(tx);
    const seq = this.statementSnapshot(tx);
    if (!this.visible(tx, itemId, seq)) return 0;

    await this.acquireLock(tx, itemId);

    const own = tx.writes.get(itemId);
    if (own) {
      tx.writes.set(itemId, { ...own, price: roundPrice(own.price + delta) });
      return 1;
    }
    const latest = this.versionAt(itemId, Number.POSITIVE_INFINITY);
    if (!latest) return 0;
    if (usesTransactionSnapshot(tx.level) && tx.snapshotSeq !== null && latest.seq > tx.snapshotSeq) {
      throw new SerializationFailure(
        `could not serialize access due to concurrent update of ${this.table} id=${itemId}`,
      );
    }
    tx.writes.set(itemId, { ...latest.item, price: roundPrice(latest.item.price + delta) });
    return 1;
  }

  async insert(tx: MvccTransaction, seed: ItemSeed): Promise<number> {
    this.assertActive(tx);
    this.statementSnapshot(tx);
    const id = seed.id ?? this.nextItemId++;
    this.nextItemId = Math.max(this.nextItemId, id + 1);

    await this.acquireLock(tx, id);

    if (tx.writes.has(id) || this.latestCommitted(id)) {
      throw new StepExecutionError(
        `duplicate key value violates unique constraint "${this.table}_pkey": Key (id)=(${id}) already exists`,
      );
    }
    tx.writes.set(id, toItem(id, seed));
    return id;
  }

  commit(tx: MvccTransaction): void {
    this.assertActive(tx);
    if (tx.level === 'SERIALIZABLE' && tx.writes.size > 0 && this.hasReadWriteConflict(tx)) {
      this.finish(tx, 'aborted');
      throw new SerializationFailure(
        'could not serialize access due to read/write dependencies among transactions',
      );
    }
    if (tx.writes.size > 0) {
      const seq = ++this.commitSeq;
      const touched: Array<{ before: Item | null; after: Item }> = [];
      for (const [id, item] of tx.writes) {
        touched.push({ before: this.latestCommitted(id), after: item });
        const versions = this.rows.get(id) ?? [];
        versions.push({ seq, item });
        this.rows.set(id, versions);
      }
      this.commits.push({ seq, txId: tx.id, touched });
    }
    this.finish(tx, 'committed');
  }

  rollback(tx: MvccTransaction): void {
    if (tx.status !== 'active') return;
    this.finish(tx, 'aborted');
  }

  private hasReadWriteConflict(tx: MvccTransaction): boolean {
    const since = tx.snapshotSeq;
    if (since === null) return false;
    return this.commits.some(
      (c) =>
        c.seq > since &&
        c.touched.some(
          ({ before, after }) =>
            tx.readIds.has(after.id) ||
            tx.predicates.some(
              (p) => matchesPredicate(after, p) || (before !== null && matchesPredicate(before, p)),
            ),
        ),
    );
  }

  private statementSnapshot(tx: MvccTransaction): number {
    if (!usesTransactionSnapshot(tx.level)) return this.commitSeq;
    if (tx.snapshotSeq === null) tx.snapshotSeq = this.commitSeq;
    return tx.snapshotSeq;
  }

  private visible(tx: MvccTransaction, itemId: number, seq: number): Item | null {
    return tx.writes.get(itemId) ?? this.versionAt(itemId, seq)?.item ?? null;
  }

  private versionAt(itemId: number, seq: number): RowVersion | undefined {
    const versions = this.rows.get(itemId);
    if (!versions) return undefined;
    for (let i = versions.length - 1; i >= 0; i--) {
      const version = versions[i];
      if (version && version.seq <= seq) return version;
    }
    return undefined;
  }

  private async acquireLock(tx: MvccTransaction, itemId: number): Promise<void> {
    const lock = this.locks.get(itemId);
    if (!lock) {
      this.locks.set(itemId, { owner: tx.id, waiters: [] });
      return;
    }
    if (lock.owner === tx.id) return;

    await new Promise<void>((resolve, reject) => {
      const waiter: LockWaiter = {
        txId: tx.id,
        wake: () => {
          clearTimeout(timer);
          resolve();
        },
      };
      const timer = setTimeout(() => {
        const idx = lock.waiters.indexOf(waiter);
        if (idx >= 0) lock.waiters.splice(idx, 1);
        reject(
          new LockTimeout(
            `canceling statement due to lock timeout: ${this.table} id=${itemId} is locked by transaction ${lock.owner}`,
          ),
        );
      }, this.lockTimeoutMs);
      lock.waiters.push(waiter);
    });
  }

  private finish(tx: MvccTransaction, status: TxStatus): void {
    tx.status = status;
    tx.writes.clear();
    this.active.delete(tx.id);
    for (const [itemId, lock] of this.locks) {
      if (lock.owner !== tx.id) continue;
      const next = lock.waiters.shift();
      if (next) {
        lock.owner = next.txId;
        next.wake();
      } else {
        this.locks.delete(itemId);
      }
    }
  }

  private assertActive(tx: MvccTransaction): void {
    if (tx.status !== 'active') {
      throw new StepExecutionError(`transaction ${tx.id} is ${tx.status}`);
    }
  }
}

function toItem(id: number, seed: ItemSeed): Item {
  return { id, name: seed.name, price: roundPrice(seed.price), deleted: seed.deleted ?? false };
}
