import { z } from 'zod';
import { col } from '../../src/schema/columns.js';
import { defineTable } from '../../src/schema/table.js';
import type { Statement } from '../../src/query/builder.js';
import { Result } from '../../src/result/result.js';
import { Row } from '../../src/result/row.js';
import type { Executor } from '../../src/types.js';

export const Users = defineTable('users', {
  id: col.serial().primaryKey(),
  username: col.varchar(50).notNull(),
  secret_token: col.varchar(50),
});

export const UserSummary = z.object({ username: z.string() });
export const UserRow = z.object({ id: z.number(), username: z.string() });

export function makeRows(columns: string[], data: unknown[][]): Row[] {
  return data.map((values) => new Row(columns, values));
}

/**
 * In-memory executor over a fixed row set. Answers count statements with
 * the row count (as a string, the way pg returns int8) and applies a
 * select's offset/limit. Filters are ignored.
 */
export class FakeExecutor implements Executor {
  readonly executed: Statement[] = [];

  constructor(
    private readonly columns: string[],
    private readonly data: unknown[][],
  ) {}

  async scalar(statement: Statement): Promise<unknown> {
    this.executed.push(statement);
    if (statement.kind !== 'count') {
      throw new Error(`FakeExecutor.scalar() got a ${statement.kind} statement`);
    }
    return String(this.data.length);
  }

  async execute(statement: Statement): Promise<Result> {
    this.executed.push(statement);
    if (statement.kind !== 'select') {
      throw new Error(`FakeExecutor.execute() got a ${statement.kind} statement`);
    }
    const start = statement.state.offset ?? 0;
    const end = statement.state.limit === null ? undefined : start + statement.state.limit;
    return Result.fromRows(this.columns, makeRows(this.columns, this.data.slice(start, end)));
  }
}

/** n user rows: [1, 'user_0'], [2, 'user_1'], ... */
export function userData(n: number): unknown[][] {
  return Array.from({ length: n }, (_, i) => [i + 1, `user_${i}`]);
}
