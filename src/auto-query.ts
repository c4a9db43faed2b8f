import type { z } from 'zod';
import type { SelectStatement } from './query/builder.js';
import { selectFor } from './projection.js';
import { parseRow, type RowShape } from './schema/row-shape.js';
import type { Table } from './schema/table.js';
import type { Executor } from './types.js';

/** Narrows the projected base statement, typically with where()/orderBy(). */
export type Refine = (base: SelectStatement) => SelectStatement | Promise<SelectStatement>;

export interface AutoQueryOptions {
  /** Return the first matching row (or null) instead of every row. */
  single?: boolean;
}

export type ManyQuery<T> = (executor: Executor, refine?: Refine) => Promise<T[]>;
export type SingleQuery<T> = (executor: Executor, refine?: Refine) => Promise<T | null>;

/**
 * Composes projection, a caller-supplied refinement step and row-shape
 * reconstruction into one query function.
 *
 * @example
 * const findActive = autoQuery(Users, UserSummary);
 * const users = await engine.session((s) =>
 *   findActive(s, (base) => base.where(eq(Users.column('active'), true))),
 * );
 */
export function autoQuery<S extends RowShape>(
  table: Table,
  shape: S,
  options: AutoQueryOptions & { single: true },
): SingleQuery<z.infer<S>>;
export function autoQuery<S extends RowShape>(
  table: Table,
  shape: S,
  options?: AutoQueryOptions & { single?: false },
): ManyQuery<z.infer<S>>;
export function autoQuery<S extends RowShape>(
  table: Table,
  shape: S,
  options: AutoQueryOptions = {},
): SingleQuery<z.infer<S>> | ManyQuery<z.infer<S>> {
  const build = async (refine: Refine | undefined): Promise<SelectStatement> => {
    const base = selectFor(table, shape);
    return refine === undefined ? base : await refine(base);
  };

  if (options.single === true) {
    return async (executor: Executor, refine?: Refine) => {
      const result = await executor.execute(await build(refine));
      const row = result.first();
      return row === null ? null : parseRow(shape, row.toObject(), 0);
    };
  }

  return async (executor: Executor, refine?: Refine) => {
    const result = await executor.execute(await build(refine));
    return result.mappings().map((mapping, i) => parseRow(shape, mapping, i));
  };
}
