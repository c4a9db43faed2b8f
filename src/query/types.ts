import type { Column, Table } from '../schema/table.js';

export type ComparisonOp = '=' | '<>' | '>' | '>=' | '<' | '<=' | 'LIKE';

export type FilterNode =
  | { kind: 'compare'; column: Column; op: ComparisonOp; value: unknown }
  | { kind: 'in';      column: Column; values: readonly unknown[] }
  | { kind: 'null';    column: Column; negated: boolean }
  | { kind: 'and';     filters: readonly FilterNode[] }
  | { kind: 'or';      filters: readonly FilterNode[] }
  | { kind: 'not';     filter: FilterNode };

/** Something a SELECT or RETURNING list can name: one column, or a whole table. */
export type Selectable = Column | Table;

export interface OrderTerm {
  column: Column;
  direction: 'ASC' | 'DESC';
}

export interface SelectState {
  readonly items: readonly Selectable[];
  readonly filter: FilterNode | null;
  readonly order: readonly OrderTerm[];
  readonly limit: number | null;
  readonly offset: number | null;
}
