import { StepExecutionError } from '@anomaly-lab/domain';
import type {
  FixtureSpec,
  StoreSessionPort,
  TransactionalStorePort,
} from '@anomaly-lab/domain';
import { withTransaction } from './pool.js';
import type { DbClient, DbPool } from './pool.js';
import { classifyPgError } from './error-codes.js';
import { PgStoreSession } from './pg-session.js';
import { priceRowSchema } from './rows.js';

export interface PgStoreOptions {
  pool: DbPool;
  /** Fixture table; must already be a validated identifier. */
  table?: string;
  statementTimeoutMs: number;
  lockTimeoutMs: number;
}

export class PgTransactionalStore implements TransactionalStorePort {
  readonly driver = 'postgres';
  private readonly pool: DbPool;
  private readonly table: string;

  constructor(private readonly opts: PgStoreOptions) {
    this.pool = opts.pool;
    this.table = opts.table ?? 'anomaly_items';
  }

  async openSession(label: string): Promise<StoreSessionPort> {
    let client: DbClient;
    try {
      client = await this.pool.connect();
    } catch (err) {
      throw new StepExecutionError(`[${label}] could not acquire a connection`, { cause: err });
    }
    try {
      await client.query(
        `SELECT set_config('statement_timeout', $1, false),
                set_config('lock_timeout', $2, false)`,
        this.budgets(),
      );
    } catch (err) {
      client.release(true);
      throw classifyPgError(err, 'configure session');
    }
    return new PgStoreSession(label, client, this.table);
  }

  async ensureSchema(): Promise<void> {
    await this.pool.query(
      `CREATE TABLE IF NOT EXISTS ${this.table} (
         id      SERIAL PRIMARY KEY,
         name    VARCHAR(255) NOT NULL,
         price   NUMERIC(12, 2) NOT NULL,
         deleted BOOLEAN NOT NULL DEFAULT FALSE
       )`,
    );
  }

  async resetFixture(fixture: FixtureSpec): Promise<void> {
    try {
      await this.reseed(fixture);
    } catch (err) {
      throw classifyPgError(err, `reset ${this.table}`);
    }
  }

  private async reseed(fixture: FixtureSpec): Promise<void> {
    await withTransaction(this.pool, async (client) => {
      // transaction-local, so the budget holds whichever pooled connection this is
      await client.query(
        `SELECT set_config('statement_timeout', $1, true),
                set_config('lock_timeout', $2, true)`,
        this.budgets(),
      );
      await client.query(`DELETE FROM ${this.table}`);
      for (const row of fixture.rows) {
        if (row.id === undefined) {
          await client.query(
            `INSERT INTO ${this.table} (name, price, deleted) VALUES ($1, $2, $3)`,
            [row.name, row.price, row.deleted ?? false],
          );
        } else {
          await client.query(
            `INSERT INTO ${this.table} (id, name, price, deleted) VALUES ($1, $2, $3, $4)`,
            [row.id, row.name, row.price, row.deleted ?? false],
          );
        }
      }
      // keep inserts without an explicit id clear of the seeded ids
      await client.query(
        `SELECT setval(pg_get_serial_sequence($1, 'id'),
                       COALESCE((SELECT MAX(id) FROM ${this.table}), 0) + 1,
                       false)`,
        [this.table],
      );
    });
  }

  async readCommittedPrice(itemId: number): Promise<number | null> {
    const { rows } = await this.pool.query(`SELECT price FROM ${this.table} WHERE id = $1`, [itemId]);
    return rows[0] ? priceRowSchema.parse(rows[0]).price : null;
  }

  private budgets(): [string, string] {
    return [String(this.opts.statementTimeoutMs), String(this.opts.lockTimeoutMs)];
  }

  async ping(): Promise<void> {
    await this.pool.query('SELECT 1');
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
