import type pg from 'pg';
import type { Statement } from './query/builder.js';
import { compile, producesRows } from './query/compiler.js';
import { Result } from './result/result.js';
import { Row } from './result/row.js';
import type { Executor } from './types.js';

/**
 * Executes statements on one client. Obtained from Engine.session();
 * the engine releases the client when the session callback settles.
 */
export class Session implements Executor {
  constructor(private readonly client: pg.ClientBase) {}

  async execute(statement: Statement): Promise<Result> {
    const { sql, params } = compile(statement);

    if (producesRows(statement)) {
      // Array rows keep select-list order and duplicate column names intact
      const result = await this.client.query<unknown[]>({ text: sql, values: params, rowMode: 'array' });
      const columns = result.fields.map((f) => f.name);
      return Result.fromRows(columns, result.rows.map((values) => new Row(columns, values)));
    }

    const result = await this.client.query(sql, params);
    return result.rowCount === null ? Result.empty() : Result.fromAffected(result.rowCount);
  }

  async scalar(statement: Statement): Promise<unknown> {
    const result = await this.execute(statement);
    return result.scalar();
  }

  /**
   * Runs `fn` inside BEGIN/COMMIT. Any error rolls the transaction back
   * and is rethrown as-is, even when the ROLLBACK itself fails.
   */
  async begin<T>(fn: (session: Session) => Promise<T>): Promise<T> {
    await this.client.query('BEGIN');
    let value: T;
    try {
      value = await fn(this);
    } catch (err) {
      await this.client.query('ROLLBACK').catch(() => undefined);
      throw err;
    }
    await this.client.query('COMMIT');
    return value;
  }
}
