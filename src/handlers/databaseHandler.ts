/**
 * Database Handler
 *
 * Inserts each record into a PostgreSQL table through a `pg` pool:
 *
 *   INSERT INTO <table> (timestamp, tag, value, session_id) VALUES ($1, $2, $3, $4)
 *
 * `handle` starts the insert and returns; the pending query is tracked so
 * `flush()` can wait for it. A failed insert is logged, or kept and
 * rethrown from the next `flush()` when `propagateErrors` is set.
 *
 * @module handlers/databaseHandler
 */

import type pg from 'pg';
import { InvalidTableNameError, toError } from '../core/errors.js';
import type { MetricRecord } from '../core/record.js';
import { SqlRecordFormatter } from '../formatters/recordFormatters.js';
import { BaseHandler, type BaseHandlerOptions } from './handler.js';

export const DEFAULT_METRICS_TABLE = 'metrics';

/** `table` or `schema.table`, unquoted identifiers only. */
const TABLE_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*(?:\.[A-Za-z_][A-Za-z0-9_]*)?$/;

export type MetricsPool = Pick<pg.Pool, 'query' | 'end'>;

export interface DatabaseHandlerOptions extends BaseHandlerOptions {
  pool: MetricsPool;
  /** Destination table. Defaults to 'metrics'. */
  table?: string;
}

export function isValidTableName(table: string): boolean {
  return TABLE_NAME_PATTERN.test(table);
}

export function buildInsertSql(table: string): string {
  if (!isValidTableName(table)) throw new InvalidTableNameError(table);
  return `INSERT INTO ${table} (timestamp, tag, value, session_id) VALUES ($1, $2, $3, $4)`;
}

export class DatabaseHandler extends BaseHandler {
  readonly table: string;
  private readonly pool: MetricsPool;
  private readonly insertSql: string;
  private readonly inFlight = new Set<Promise<void>>();
  private failures: Error[] = [];
  private closed = false;

  constructor(options: DatabaseHandlerOptions) {
    super({ formatter: new SqlRecordFormatter(), ...options });
    this.table = options.table ?? DEFAULT_METRICS_TABLE;
    this.insertSql = buildInsertSql(this.table);
    this.pool = options.pool;
  }

  get pendingInserts(): number {
    return this.inFlight.size;
  }

  protected override emit(record: MetricRecord): void {
    if (this.closed) {
      throw new Error(`DatabaseHandler for "${this.table}" is closed`);
    }

    const values = [record.created, record.tag, record.value, record.sessionId];
    const insert: Promise<void> = this.pool.query(this.insertSql, values).then(
      () => {
        this.inFlight.delete(insert);
      },
      (error: unknown) => {
        this.inFlight.delete(insert);
        this.onInsertFailed(record, error);
      },
    );
    this.inFlight.add(insert);
  }

  /** Waits for every insert started so far. */
  override async flush(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }

    if (this.failures.length > 0) {
      const failures = this.failures;
      this.failures = [];
      throw new AggregateError(failures, `${failures.length} metric insert(s) into ${this.table} failed`);
    }
  }

  /** Flushes, then ends the pool. Later calls do nothing. */
  override async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    try {
      await this.flush();
    } finally {
      await this.pool.end();
    }
  }

  private onInsertFailed(record: MetricRecord, error: unknown): void {
    if (this.propagateErrors) {
      this.failures.push(toError(error));
      return;
    }
    this.logger.error(`Failed to insert metric into ${this.table}`, toError(error), {
      tag: record.tag,
      values: this.format(record),
    });
  }
}
