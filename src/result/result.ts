import { AmbiguousResultError, EmptyResultError, ResultKindError } from '../errors.js';
import { Row } from './row.js';

/**
 * What one statement execution produced.
 * - rows:     a row set (SELECT, or anything with RETURNING)
 * - scalar:   a single opaque value
 * - affected: the affected-row count of a mutation
 * - empty:    nothing at all
 */
export type ExecutionOutcome =
  | { readonly kind: 'rows';     readonly columns: readonly string[]; readonly rows: readonly Row[] }
  | { readonly kind: 'scalar';   readonly value: unknown }
  | { readonly kind: 'affected'; readonly count: number }
  | { readonly kind: 'empty' };

export type ResultKind = ExecutionOutcome['kind'];

/** Column name a scalar outcome is exposed under. */
export const SCALAR_COLUMN = 'value';
/** Column name an affected-row count is exposed under. */
export const AFFECTED_COLUMN = 'rowcount';

function normalize(outcome: ExecutionOutcome): readonly Row[] {
  switch (outcome.kind) {
    case 'rows':
      return Object.freeze([...outcome.rows]);
    case 'scalar':
      return Object.freeze([new Row([SCALAR_COLUMN], [outcome.value])]);
    case 'affected':
      return Object.freeze([new Row([AFFECTED_COLUMN], [outcome.count])]);
    case 'empty':
      return Object.freeze([]);
  }
}

function firstColumn(row: Row): unknown {
  return row.length > 0 ? row.at(0) : null;
}

/**
 * Read-only view over the first column of every row, in row order.
 */
export class ScalarResult implements Iterable<unknown> {
  private readonly values: readonly unknown[];

  constructor(rows: readonly Row[]) {
    this.values = Object.freeze(rows.map(firstColumn));
  }

  all(): readonly unknown[] {
    return this.values;
  }

  first(): unknown {
    return this.values.length > 0 ? this.values[0] : null;
  }

  [Symbol.iterator](): Iterator<unknown> {
    return this.values[Symbol.iterator]();
  }
}

/**
 * Uniform access to the outcome of one execution, whatever kind of
 * statement produced it. Holds an immutable snapshot of its rows.
 */
export class Result implements Iterable<Row> {
  private readonly rows: readonly Row[];

  constructor(private readonly outcome: ExecutionOutcome) {
    this.rows = normalize(outcome);
    Object.freeze(this);
  }

  /**
   * Normalizes one mixed value: an array of rows is a row set (columns taken
   * from the first row), null/undefined is absence, anything else a scalar.
   */
  static from(value: unknown): Result {
    if (Array.isArray(value)) {
      const items: unknown[] = value;
      if (items.every((item): item is Row => item instanceof Row)) {
        const [head] = items;
        return Result.fromRows(head === undefined ? [] : head.columns, items);
      }
    }
    return Result.fromScalar(value);
  }

  static fromRows(columns: readonly string[], rows: readonly Row[]): Result {
    return new Result({ kind: 'rows', columns: [...columns], rows });
  }

  /** null and undefined mean "no value" and give an empty result. */
  static fromScalar(value: unknown): Result {
    return value === null || value === undefined
      ? Result.empty()
      : new Result({ kind: 'scalar', value });
  }

  static fromAffected(count: number): Result {
    return new Result({ kind: 'affected', count });
  }

  static empty(): Result {
    return new Result({ kind: 'empty' });
  }

  get kind(): ResultKind {
    return this.outcome.kind;
  }

  /** Column names of the rows, in order. */
  get columns(): readonly string[] {
    switch (this.outcome.kind) {
      case 'rows':
        return this.outcome.columns;
      case 'scalar':
        return [SCALAR_COLUMN];
      case 'affected':
        return [AFFECTED_COLUMN];
      case 'empty':
        return [];
    }
  }

  /** Rows held, or the affected count for a mutation. */
  get rowCount(): number {
    return this.outcome.kind === 'affected' ? this.outcome.count : this.rows.length;
  }

  all(): readonly Row[] {
    return this.rows;
  }

  first(): Row | null {
    return this.rows[0] ?? null;
  }

  /**
   * The single row, or null when there are none.
   * @throws AmbiguousResultError when two or more rows are held
   */
  oneOrNone(): Row | null {
    if (this.rows.length > 1) {
      throw new AmbiguousResultError(this.rows.length, 'at most one');
    }
    return this.rows[0] ?? null;
  }

  /**
   * The single row.
   * @throws EmptyResultError when no row is held
   * @throws AmbiguousResultError when two or more rows are held
   */
  one(): Row {
    const [row] = this.rows;
    if (row === undefined) {
      throw new EmptyResultError();
    }
    if (this.rows.length > 1) {
      throw new AmbiguousResultError(this.rows.length, 'exactly one');
    }
    return row;
  }

  /** First column of the first row; null when there is none. */
  scalar(): unknown {
    const row = this.first();
    return row === null ? null : firstColumn(row);
  }

  scalarOneOrNone(): unknown {
    const row = this.oneOrNone();
    return row === null ? null : firstColumn(row);
  }

  scalars(): ScalarResult {
    return new ScalarResult(this.rows);
  }

  /**
   * Every row as a plain object keyed by column name, keys in column order.
   * @throws ResultKindError for a mutation's affected-row count
   */
  mappings(): Record<string, unknown>[] {
    if (this.outcome.kind === 'affected') {
      throw new ResultKindError(this.outcome.kind, 'mappings');
    }
    return this.rows.map((row) => row.toObject());
  }

  [Symbol.iterator](): Iterator<Row> {
    return this.rows[Symbol.iterator]();
  }
}
