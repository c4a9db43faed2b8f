import type { Table } from '../schema/table.js';
import {
  CountStatement,
  DeleteStatement,
  InsertStatement,
  RawStatement,
  SelectStatement,
  UpdateStatement,
} from './builder.js';
import type { Selectable } from './types.js';

/**
 * Entry points for the statement builder.
 *
 * @example
 * select(Users.column('id'), Users.column('name'))
 *   .where(eq(Users.column('active'), true))
 *   .orderBy(Users.column('id'))
 */
export function select(...items: Selectable[]): SelectStatement {
  return new SelectStatement({ items, filter: null, order: [], limit: null, offset: null });
}

/** Counts every row the statement would return. */
export function count(statement: SelectStatement): CountStatement {
  return new CountStatement(statement);
}

export function insert<N extends string>(table: Table<N>): InsertStatement<N> {
  return new InsertStatement(table, {});
}

export function update<N extends string>(table: Table<N>): UpdateStatement<N> {
  return new UpdateStatement(table);
}

export function deleteFrom<N extends string>(table: Table<N>): DeleteStatement<N> {
  return new DeleteStatement(table);
}

export function sql(text: string, params: readonly unknown[] = []): RawStatement {
  return new RawStatement(text, params);
}
