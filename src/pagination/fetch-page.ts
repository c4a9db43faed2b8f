import type { z } from 'zod';
import type { SelectStatement } from '../query/builder.js';
import { count } from '../query/factories.js';
import { parseRow, type RowShape } from '../schema/row-shape.js';
import type { Executor } from '../types.js';
import { PageResult } from './page-result.js';

/** Clamps a requested page number or page size to a positive integer. */
export function clampPositive(n: number): number {
  return Number.isFinite(n) ? Math.max(1, Math.trunc(n)) : 1;
}

/**
 * pg returns count(*) as a string (int8); other drivers may give a number
 * or a bigint. null/undefined count as 0.
 */
export function toCount(value: unknown): number {
  if (value === null || value === undefined) return 0;
  const n = typeof value === 'bigint' || typeof value === 'string' ? Number(value) : value;
  if (typeof n !== 'number' || !Number.isInteger(n) || n < 0) {
    throw new TypeError(`Count query returned a non-count value: ${String(value)}`);
  }
  return n;
}

/**
 * Fetches one page of `statement`, reconstructed through `shape`.
 *
 * Issues a count over the whole statement first, then, only when the
 * requested page can hold rows, the sliced statement. Page and size are
 * clamped to at least 1; a page past the end gives an empty page with the
 * real total. Executor errors propagate unchanged.
 *
 * @throws SchemaValidationError when a fetched row does not fit `shape`
 */
export async function fetchPage<S extends RowShape>(
  executor: Executor,
  statement: SelectStatement,
  shape: S,
  page: number,
  size: number,
): Promise<PageResult<z.infer<S>>> {
  const safePage = clampPositive(page);
  const safeSize = clampPositive(size);

  const total = toCount(await executor.scalar(count(statement)));

  // Overflow bound only; an empty result still counts as one (empty) page here.
  const lastPage = total > 0 ? Math.ceil(total / safeSize) : 1;

  if (total === 0 || safePage > lastPage) {
    return new PageResult<z.infer<S>>({ items: [], total, page: safePage, size: safeSize });
  }

  const offset = (safePage - 1) * safeSize;
  // No page holds more than `total` rows; keeps the bound LIMIT a plain integer
  const result = await executor.execute(statement.offset(offset).limit(Math.min(safeSize, total)));
  const items = result.mappings().map((mapping, i) => parseRow(shape, mapping, offset + i));

  return new PageResult({ items, total, page: safePage, size: safeSize });
}
