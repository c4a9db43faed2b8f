import type { Column, Table } from '../schema/table.js';
import type { SelectStatement, Statement } from './builder.js';
import type { FilterNode, Selectable } from './types.js';

export interface CompiledQuery {
  sql: string;
  params: unknown[];
}

/** Alias given to the subquery a count runs over. */
export const COUNT_SUBQUERY_ALIAS = 'anon_1';

/**
 * Shared parameter list and placeholder counter, threaded through
 * recursive calls so nested fragments number their $n in sequence.
 */
interface ParamSink {
  params: unknown[];
  n: number;
}

function bind(sink: ParamSink, value: unknown): string {
  sink.params.push(value);
  sink.n += 1;
  return `$${sink.n}`;
}

export function quoteIdent(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

function columnRef(column: Column): string {
  return `${quoteIdent(column.table.name)}.${quoteIdent(column.name)}`;
}

function selectableRef(item: Selectable): string {
  return item.kind === 'table' ? `${quoteIdent(item.name)}.*` : columnRef(item);
}

function assertOwnColumn(table: Table, name: string): Column {
  const column = table.findColumn(name);
  if (column === undefined) {
    throw new Error(`Table "${table.name}" has no column "${name}"`);
  }
  return column;
}

function compileFilterNode(node: FilterNode, sink: ParamSink): string {
  switch (node.kind) {
    case 'compare':
      return `${columnRef(node.column)} ${node.op} ${bind(sink, node.value)}`;

    case 'in': {
      if (node.values.length === 0) return 'FALSE';
      const refs = node.values.map((v) => bind(sink, v));
      return `${columnRef(node.column)} IN (${refs.join(', ')})`;
    }

    case 'null':
      return `${columnRef(node.column)} IS ${node.negated ? 'NOT ' : ''}NULL`;

    case 'and': {
      if (node.filters.length === 0) return 'TRUE';
      const parts = node.filters.map((f) => compileFilterNode(f, sink));
      return `(${parts.join(' AND ')})`;
    }

    case 'or': {
      if (node.filters.length === 0) return 'FALSE';
      const parts = node.filters.map((f) => compileFilterNode(f, sink));
      return `(${parts.join(' OR ')})`;
    }

    case 'not':
      return `NOT (${compileFilterNode(node.filter, sink)})`;
  }
}

function compileReturning(items: readonly Selectable[]): string[] {
  return items.length === 0 ? [] : [`RETURNING ${items.map(selectableRef).join(', ')}`];
}

function compileSelect(statement: SelectStatement, sink: ParamSink): string {
  const { items, filter, order, limit, offset } = statement.state;
  const lines = [
    `SELECT ${items.map(selectableRef).join(', ')}`,
    `FROM ${statement.tables.map((t) => quoteIdent(t.name)).join(', ')}`,
  ];
  if (filter !== null) {
    lines.push(`WHERE ${compileFilterNode(filter, sink)}`);
  }
  if (order.length > 0) {
    lines.push(`ORDER BY ${order.map((t) => `${columnRef(t.column)} ${t.direction}`).join(', ')}`);
  }
  if (limit !== null) {
    lines.push(`LIMIT ${bind(sink, limit)}`);
  }
  if (offset !== null) {
    lines.push(`OFFSET ${bind(sink, offset)}`);
  }
  return lines.join('\n');
}

function compileInto(statement: Statement, sink: ParamSink): string {
  switch (statement.kind) {
    case 'select':
      return compileSelect(statement, sink);

    case 'count':
      return [
        'SELECT count(*) AS count',
        'FROM (',
        compileSelect(statement.source, sink),
        `) AS ${COUNT_SUBQUERY_ALIAS}`,
      ].join('\n');

    case 'insert': {
      const entries = Object.entries(statement.row);
      const lines = entries.length === 0
        ? [`INSERT INTO ${quoteIdent(statement.table.name)} DEFAULT VALUES`]
        : [
            `INSERT INTO ${quoteIdent(statement.table.name)} (${entries
              .map(([name]) => quoteIdent(assertOwnColumn(statement.table, name).name))
              .join(', ')})`,
            `VALUES (${entries.map(([, value]) => bind(sink, value)).join(', ')})`,
          ];
      return [...lines, ...compileReturning(statement.returningItems)].join('\n');
    }

    case 'update': {
      const entries = Object.entries(statement.assignments);
      if (entries.length === 0) {
        throw new Error(`update(${statement.table.name}) has no assignments`);
      }
      const sets = entries.map(
        ([name, value]) => `${quoteIdent(assertOwnColumn(statement.table, name).name)} = ${bind(sink, value)}`,
      );
      const lines = [`UPDATE ${quoteIdent(statement.table.name)}`, `SET ${sets.join(', ')}`];
      if (statement.filter !== null) {
        lines.push(`WHERE ${compileFilterNode(statement.filter, sink)}`);
      }
      return [...lines, ...compileReturning(statement.returningItems)].join('\n');
    }

    case 'delete': {
      const lines = [`DELETE FROM ${quoteIdent(statement.table.name)}`];
      if (statement.filter !== null) {
        lines.push(`WHERE ${compileFilterNode(statement.filter, sink)}`);
      }
      return [...lines, ...compileReturning(statement.returningItems)].join('\n');
    }

    case 'raw':
      sink.params.push(...statement.params);
      sink.n += statement.params.length;
      return statement.text;
  }
}

/**
 * Compiles any statement into PostgreSQL text with $1..$n placeholders.
 */
export function compile(statement: Statement): CompiledQuery {
  const sink: ParamSink = { params: [], n: 0 };
  const sql = compileInto(statement, sink);
  return { sql, params: sink.params };
}

const ROW_PRODUCING_PREFIX = /^\s*(SELECT|WITH|VALUES|TABLE|SHOW|EXPLAIN)\b/i;
const RETURNING_CLAUSE = /\bRETURNING\b/i;

/**
 * Whether executing the statement yields rows (as opposed to only an
 * affected-row count). Built statements are classified by kind; raw text
 * by its leading keyword or a RETURNING clause.
 */
export function producesRows(statement: Statement): boolean {
  switch (statement.kind) {
    case 'select':
    case 'count':
      return true;
    case 'insert':
    case 'update':
    case 'delete':
      return statement.returningItems.length > 0;
    case 'raw':
      return ROW_PRODUCING_PREFIX.test(statement.text) || RETURNING_CLAUSE.test(statement.text);
  }
}
