import type { Column } from '../schema/table.js';
import type { ComparisonOp, FilterNode, OrderTerm } from './types.js';

function compare(column: Column, op: ComparisonOp, value: unknown): FilterNode {
  return { kind: 'compare', column, op, value };
}

export const eq = (column: Column, value: unknown): FilterNode => compare(column, '=', value);
export const ne = (column: Column, value: unknown): FilterNode => compare(column, '<>', value);
export const gt = (column: Column, value: unknown): FilterNode => compare(column, '>', value);
export const gte = (column: Column, value: unknown): FilterNode => compare(column, '>=', value);
export const lt = (column: Column, value: unknown): FilterNode => compare(column, '<', value);
export const lte = (column: Column, value: unknown): FilterNode => compare(column, '<=', value);
export const like = (column: Column, pattern: string): FilterNode => compare(column, 'LIKE', pattern);

export function inList(column: Column, values: readonly unknown[]): FilterNode {
  return { kind: 'in', column, values: [...values] };
}

export function isNull(column: Column): FilterNode {
  return { kind: 'null', column, negated: false };
}

export function isNotNull(column: Column): FilterNode {
  return { kind: 'null', column, negated: true };
}

/**
 * Nested and-nodes are flattened, so and(and(a, b), c) compiles
 * the same as and(a, b, c).
 */
export function and(...filters: FilterNode[]): FilterNode {
  const flat = filters.flatMap((f) => (f.kind === 'and' ? f.filters : [f]));
  if (flat.length === 1 && flat[0] !== undefined) return flat[0];
  return { kind: 'and', filters: flat };
}

export function or(...filters: FilterNode[]): FilterNode {
  const flat = filters.flatMap((f) => (f.kind === 'or' ? f.filters : [f]));
  if (flat.length === 1 && flat[0] !== undefined) return flat[0];
  return { kind: 'or', filters: flat };
}

export function not(filter: FilterNode): FilterNode {
  return { kind: 'not', filter };
}

export const asc = (column: Column): OrderTerm => ({ column, direction: 'ASC' });
export const desc = (column: Column): OrderTerm => ({ column, direction: 'DESC' });
