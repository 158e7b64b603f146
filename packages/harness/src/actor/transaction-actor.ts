import {
  ActorMisuseError,
  StepExecutionError,
  isHarnessError,
  isTerminalState,
} from '@anomaly-lab/domain';
import type {
  ActorSpec,
  ActorState,
  CountPredicate,
  IsolationLevel,
  ItemSeed,
  SleeperPort,
  StoreSessionPort,
  TransactionalStorePort,
} from '@anomaly-lab/domain';

/**
 * One participant of a scenario. Owns a single store session for its whole
 * lifetime and runs at most one transaction on it.
 *
 * NOT_STARTED -> ACTIVE -> COMMITTED | ROLLED_BACK | FAILED
 */
export class TransactionActor {
  private _state: ActorState = 'NOT_STARTED';
  private _isolationLevel: IsolationLevel;
  private released = false;

  private constructor(
    readonly role: string,
    isolationLevel: IsolationLevel,
    private readonly session: StoreSessionPort,
    private readonly sleeper: SleeperPort,
  ) {
    this._isolationLevel = isolationLevel;
  }

  static async open(
    store: TransactionalStorePort,
    spec: ActorSpec,
    sleeper: SleeperPort,
  ): Promise<TransactionActor> {
    const session = await store.openSession(spec.role);
    return new TransactionActor(spec.role, spec.isolationLevel, session, sleeper);
  }

  get state(): ActorState {
    return this._state;
  }

  get isolationLevel(): IsolationLevel {
    return this._isolationLevel;
  }

  async begin(isolationLevel: IsolationLevel = this._isolationLevel): Promise<void> {
    this.require('BEGIN', 'NOT_STARTED');
    try {
      await this.session.begin(isolationLevel);
    } catch (err) {
      this._state = 'FAILED';
      throw err;
    }
    this._isolationLevel = isolationLevel;
    this._state = 'ACTIVE';
  }

  async read(itemId: number): Promise<number | null> {
    this.require('READ', 'ACTIVE');
    return this.statement(() => this.session.readPrice(itemId));
  }

  async count(predicate: CountPredicate): Promise<number> {
    this.require('COUNT', 'ACTIVE');
    return this.statement(() => this.session.countMatching(predicate));
  }

  async update(itemId: number, delta: number): Promise<number> {
    this.require('UPDATE', 'ACTIVE');
    return this.statement(() => this.session.addToPrice(itemId, delta));
  }

  async insert(row: ItemSeed): Promise<number> {
    this.require('INSERT', 'ACTIVE');
    return this.statement(() => this.session.insertItem(row));
  }

  /** Leaves the transaction open and untouched; no statement reaches the store. */
  async sleep(durationMs: number): Promise<void> {
    this.require('SLEEP', 'ACTIVE');
    await this.sleeper.sleep(durationMs);
  }

  async commit(): Promise<void> {
    this.require('COMMIT', 'ACTIVE');
    try {
      await this.session.commit();
    } catch (err) {
      this._state = 'FAILED';
      throw isHarnessError(err)
        ? err
        : new StepExecutionError(`[${this.role}] COMMIT failed`, { cause: err });
    }
    this._state = 'COMMITTED';
  }

  /** Never throws for an ACTIVE actor; a store error is logged and the state still changes. */
  async rollback(): Promise<void> {
    this.require('ROLLBACK', 'ACTIVE');
    await this.discard();
    this._state = 'ROLLED_BACK';
  }

  /** Return the session to the store. Safe to call in any state, more than once. */
  async release(): Promise<void> {
    if (this.released) return;
    this.released = true;
    await this.session.close();
  }

  /**
   * A failed statement leaves the transaction unusable: conflicts and timeouts
   * end it as ROLLED_BACK, anything else as FAILED.
   */
  private async statement<T>(fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      const error = isHarnessError(err)
        ? err
        : new StepExecutionError(`[${this.role}] statement failed`, { cause: err });
      await this.discard();
      this._state = error.recoverable ? 'ROLLED_BACK' : 'FAILED';
      throw error;
    }
  }

  private async discard(): Promise<void> {
    try {
      await this.session.rollback();
    } catch (err) {
      console.warn(`[actor] ${this.role}: rollback failed`, err);
    }
  }

  private require(action: string, expected: ActorState): void {
    if (this.released) {
      throw new ActorMisuseError(`${this.role}: ${action} after the session was released`);
    }
    if (this._state === expected) return;
    const reason = isTerminalState(this._state)
      ? `transaction already ended as ${this._state}`
      : `actor is ${this._state}, ${action} requires ${expected}`;
    throw new ActorMisuseError(`${this.role}: ${action} rejected, ${reason}`);
  }
}
