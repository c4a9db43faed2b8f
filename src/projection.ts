import { select } from './query/factories.js';
import type { SelectStatement } from './query/builder.js';
import type { Selectable } from './query/types.js';
import type { Table } from './schema/table.js';
import { fieldNames, type RowShape } from './schema/row-shape.js';

/**
 * Columns of `table` named by the row-shape's fields, in the shape's
 * declaration order. Fields the table lacks are skipped. With no overlap
 * at all the whole table is selected instead.
 */
export function getSelectColumns(table: Table, shape: RowShape): readonly Selectable[] {
  const columns: Selectable[] = [];
  for (const name of fieldNames(shape)) {
    const column = table.findColumn(name);
    if (column !== undefined) columns.push(column);
  }
  return columns.length > 0 ? columns : [table];
}

/** A SELECT narrowed to the columns the row-shape needs. */
export function selectFor(table: Table, shape: RowShape): SelectStatement {
  return select(...getSelectColumns(table, shape));
}
