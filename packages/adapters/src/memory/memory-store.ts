import { StepExecutionError } from '@anomaly-lab/domain';
import type {
  CountPredicate,
  FixtureSpec,
  IsolationLevel,
  ItemSeed,
  StoreSessionPort,
  TransactionalStorePort,
} from '@anomaly-lab/domain';
import { MvccEngine } from './mvcc-engine.js';
import type { MvccTransaction } from './mvcc-engine.js';

export interface InMemoryStoreOptions {
  lockTimeoutMs?: number;
  table?: string;
}

/** In-process stand-in for PostgreSQL, sharing one MvccEngine across sessions. */
export class InMemoryIsolationStore implements TransactionalStorePort {
  readonly driver = 'memory';
  readonly engine: MvccEngine;
  private readonly sessions = new Set<InMemorySession>();

  constructor(opts: InMemoryStoreOptions = {}) {
    this.engine = new MvccEngine(opts.lockTimeoutMs ?? 2_000, opts.table);
  }

  /** Sessions handed out and not yet closed. */
  get openSessions(): number {
    return this.sessions.size;
  }

  async openSession(label: string): Promise<StoreSessionPort> {
    const session = new InMemorySession(label, this.engine, () => this.sessions.delete(session));
    this.sessions.add(session);
    return session;
  }

  async ensureSchema(): Promise<void> {
    // tables exist implicitly
  }

  async resetFixture(fixture: FixtureSpec): Promise<void> {
    this.engine.reset(fixture.rows);
  }

  async readCommittedPrice(itemId: number): Promise<number | null> {
    return this.engine.latestCommitted(itemId)?.price ?? null;
  }

  async ping(): Promise<void> {}

  async close(): Promise<void> {
    for (const session of [...this.sessions]) await session.close();
  }
}

class InMemorySession implements StoreSessionPort {
  private tx: MvccTransaction | null = null;
  private closed = false;

  constructor(
    readonly label: string,
    private readonly engine: MvccEngine,
    private readonly onClose: () => void,
  ) {}

  async begin(level: IsolationLevel): Promise<void> {
    this.assertOpen();
    if (this.tx) {
      throw new StepExecutionError(`[${this.label}] there is already a transaction in progress`);
    }
    this.tx = this.engine.begin(level);
  }

  async readPrice(itemId: number): Promise<number | null> {
    return this.statement((tx) => this.engine.read(tx, itemId));
  }

  async countMatching(predicate: CountPredicate): Promise<number> {
    return this.statement((tx) => this.engine.count(tx, predicate));
  }

  async addToPrice(itemId: number, delta: number): Promise<number> {
    return this.statement((tx) => this.engine.addToPrice(tx, itemId, delta));
  }

  async insertItem(row: ItemSeed): Promise<number> {
    return this.statement((tx) => this.engine.insert(tx, row));
  }

  async commit(): Promise<void> {
    this.assertOpen();
    const tx = this.tx;
    this.tx = null;
    if (tx) this.engine.commit(tx);
  }

  async rollback(): Promise<void> {
    this.assertOpen();
    const tx = this.tx;
    this.tx = null;
    if (tx) this.engine.rollback(tx);
  }

  async close(): Promise<void> {
    if (this.closed) return;
    if (this.tx) this.engine.rollback(this.tx);
    this.tx = null;
    this.closed = true;
    this.onClose();
  }

  /** Outside BEGIN a statement runs in its own READ COMMITTED transaction. */
  private async statement<T>(fn: (tx: MvccTransaction) => T | Promise<T>): Promise<T> {
    this.assertOpen();
    if (this.tx) return fn(this.tx);
    const tx = this.engine.begin('READ_COMMITTED');
    try {
      const result = await fn(tx);
      this.engine.commit(tx);
      return result;
    } catch (err) {
      this.engine.rollback(tx);
      throw err;
    }
  }

  private assertOpen(): void {
    if (this.closed) throw new StepExecutionError(`[${this.label}] session is closed`);
  }
}
