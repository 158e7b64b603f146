import type { QueryResult } from 'pg';
import { StepExecutionError, isolationLevelSql } from '@anomaly-lab/domain';
import type {
  CountPredicate,
  IsolationLevel,
  ItemSeed,
  StoreSessionPort,
} from '@anomaly-lab/domain';
import type { DbClient } from './pool.js';
import { classifyPgError, isPgError } from './error-codes.js';
import { countRowSchema, idRowSchema, priceRowSchema } from './rows.js';

export class PgStoreSession implements StoreSessionPort {
  private inTransaction = false;
  private closed = false;
  /** Set when the connection itself failed; it is then destroyed instead of pooled. */
  private broken = false;

  constructor(
    readonly label: string,
    private readonly client: DbClient,
    private readonly table: string,
  ) {}

  async begin(level: IsolationLevel): Promise<void> {
    await this.exec(`BEGIN ISOLATION LEVEL ${isolationLevelSql(level)}`);
    this.inTransaction = true;
  }

  async readPrice(itemId: number): Promise<number | null> {
    const { rows } = await this.exec(`SELECT price FROM ${this.table} WHERE id = $1`, [itemId]);
    return rows[0] ? priceRowSchema.parse(rows[0]).price : null;
  }

  async countMatching(predicate: CountPredicate): Promise<number> {
    const { rows } = await this.exec(
      `SELECT COUNT(*) AS count FROM ${this.table} WHERE price >= $1 AND deleted = $2`,
      [predicate.minPrice, predicate.deleted ?? false],
    );
    return countRowSchema.parse(rows[0]).count;
  }

  async addToPrice(itemId: number, delta: number): Promise<number> {
    const result = await this.exec(
      `UPDATE ${this.table} SET price = price + $2 WHERE id = $1`,
      [itemId, delta],
    );
    return result.rowCount ?? 0;
  }

  async insertItem(row: ItemSeed): Promise<number> {
    const result =
      row.id === undefined
        ? await this.exec(
            `INSERT INTO ${this.table} (name, price, deleted) VALUES ($1, $2, $3) RETURNING id`,
            [row.name, row.price, row.deleted ?? false],
          )
        : await this.exec(
            `INSERT INTO ${this.table} (id, name, price, deleted) VALUES ($1, $2, $3, $4) RETURNING id`,
            [row.id, row.name, row.price, row.deleted ?? false],
          );
    return idRowSchema.parse(result.rows[0]).id;
  }

  async commit(): Promise<void> {
    try {
      const result = await this.exec('COMMIT');
      // COMMIT of an aborted transaction block reports ROLLBACK instead of failing
      if (result.command === 'ROLLBACK') {
        throw new StepExecutionError(
          `[${this.label}] transaction was already aborted; COMMIT rolled it back`,
        );
      }
    } finally {
      // a failed COMMIT ends the transaction block as well
      this.inTransaction = false;
    }
  }

  async rollback(): Promise<void> {
    try {
      await this.exec('ROLLBACK');
    } finally {
      this.inTransaction = false;
    }
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    if (this.inTransaction && !this.broken) {
      try {
        await this.client.query('ROLLBACK');
      } catch (err) {
        console.warn(`[pg-session] ${this.label}: rollback on close failed`, err);
        this.broken = true;
      }
      this.inTransaction = false;
    }
    this.client.release(this.broken);
  }

  private async exec(sql: string, params?: unknown[]): Promise<QueryResult> {
    if (this.closed) {
      throw new StepExecutionError(`[${this.label}] session is closed`);
    }
    try {
      return await this.client.query(sql, params);
    } catch (err) {
      if (!isPgError(err)) this.broken = true;
      throw classifyPgError(err, sql);
    }
  }
}
