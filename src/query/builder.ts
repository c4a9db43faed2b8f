import type { Column, Table } from '../schema/table.js';
import { and } from './filters.js';
import type { FilterNode, OrderTerm, Selectable, SelectState } from './types.js';

function toOrderTerm(term: Column | OrderTerm): OrderTerm {
  return 'kind' in term ? { column: term, direction: 'ASC' } : term;
}

function combine(existing: FilterNode | null, filters: FilterNode[]): FilterNode | null {
  if (filters.length === 0) return existing;
  return existing === null ? and(...filters) : and(existing, ...filters);
}

function assertCount(label: string, n: number): number {
  if (!Number.isInteger(n) || n < 0) {
    throw new RangeError(`${label} must be a non-negative integer, got ${n}`);
  }
  return n;
}

/**
 * Fluent immutable SELECT. Every operation returns a new SelectStatement;
 * existing instances are never mutated. The FROM list is derived from the
 * tables of the selected items, in first-seen order.
 */
export class SelectStatement {
  readonly kind = 'select' as const;

  constructor(readonly state: SelectState) {
    if (state.items.length === 0) {
      throw new Error('select() needs at least one column or table');
    }
    Object.freeze(this);
  }

  get tables(): readonly Table[] {
    const seen: Table[] = [];
    for (const item of this.state.items) {
      const table = item.kind === 'table' ? item : item.table;
      if (!seen.includes(table)) seen.push(table);
    }
    return seen;
  }

  /** Adds filters, ANDed with any existing filter. */
  where(...filters: FilterNode[]): SelectStatement {
    return new SelectStatement({ ...this.state, filter: combine(this.state.filter, filters) });
  }

  /** Appends order terms; a bare column sorts ascending. */
  orderBy(...terms: Array<Column | OrderTerm>): SelectStatement {
    return new SelectStatement({ ...this.state, order: [...this.state.order, ...terms.map(toOrderTerm)] });
  }

  limit(n: number): SelectStatement {
    return new SelectStatement({ ...this.state, limit: assertCount('limit', n) });
  }

  offset(n: number): SelectStatement {
    return new SelectStatement({ ...this.state, offset: assertCount('offset', n) });
  }
}

/** SELECT count(*) over the full result of a SELECT, used as a subquery. */
export class CountStatement {
  readonly kind = 'count' as const;

  constructor(readonly source: SelectStatement) {
    Object.freeze(this);
  }
}

export class InsertStatement<N extends string = string> {
  readonly kind = 'insert' as const;

  constructor(
    readonly table: Table<N>,
    readonly row: { readonly [K in N]?: unknown },
    readonly returningItems: readonly Selectable[] = [],
  ) {
    Object.freeze(this);
  }

  values(row: Partial<Record<N, unknown>>): InsertStatement<N> {
    return new InsertStatement(this.table, { ...this.row, ...row }, this.returningItems);
  }

  returning(...items: Selectable[]): InsertStatement<N> {
    return new InsertStatement(this.table, this.row, [...this.returningItems, ...items]);
  }
}

export class UpdateStatement<N extends string = string> {
  readonly kind = 'update' as const;

  constructor(
    readonly table: Table<N>,
    readonly assignments: { readonly [K in N]?: unknown } = {},
    readonly filter: FilterNode | null = null,
    readonly returningItems: readonly Selectable[] = [],
  ) {
    Object.freeze(this);
  }

  set(assignments: Partial<Record<N, unknown>>): UpdateStatement<N> {
    return new UpdateStatement(this.table, { ...this.assignments, ...assignments }, this.filter, this.returningItems);
  }

  where(...filters: FilterNode[]): UpdateStatement<N> {
    return new UpdateStatement(this.table, this.assignments, combine(this.filter, filters), this.returningItems);
  }

  returning(...items: Selectable[]): UpdateStatement<N> {
    return new UpdateStatement(this.table, this.assignments, this.filter, [...this.returningItems, ...items]);
  }
}

export class DeleteStatement<N extends string = string> {
  readonly kind = 'delete' as const;

  constructor(
    readonly table: Table<N>,
    readonly filter: FilterNode | null = null,
    readonly returningItems: readonly Selectable[] = [],
  ) {
    Object.freeze(this);
  }

  where(...filters: FilterNode[]): DeleteStatement<N> {
    return new DeleteStatement(this.table, combine(this.filter, filters), this.returningItems);
  }

  returning(...items: Selectable[]): DeleteStatement<N> {
    return new DeleteStatement(this.table, this.filter, [...this.returningItems, ...items]);
  }
}

/** Hand-written SQL with $n placeholders. */
export class RawStatement {
  readonly kind = 'raw' as const;

  constructor(
    readonly text: string,
    readonly params: readonly unknown[] = [],
  ) {
    Object.freeze(this);
  }
}

export type Statement =
  | SelectStatement
  | CountStatement
  | InsertStatement
  | UpdateStatement
  | DeleteStatement
  | RawStatement;
