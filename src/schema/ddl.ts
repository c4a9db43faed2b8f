import type { Table } from './table.js';
import { quoteIdent } from '../query/compiler.js';

/**
 * Idempotent CREATE TABLE for a defined table. Existing tables are left
 * untouched; columns are never added or altered.
 */
export function compileCreateTable(table: Table): string {
  const lines = table.columns.map((column) => {
    const parts = [quoteIdent(column.name), column.def.sqlType];
    if (column.def.isPrimaryKey) parts.push('PRIMARY KEY');
    if (column.def.isNotNull) parts.push('NOT NULL');
    if (column.def.defaultSql !== null) parts.push(`DEFAULT ${column.def.defaultSql}`);
    return `  ${parts.join(' ')}`;
  });

  return [
    `CREATE TABLE IF NOT EXISTS ${quoteIdent(table.name)} (`,
    lines.join(',\n'),
    ')',
  ].join('\n');
}
